export type TornRequestOpts = {
  baseUrl: string;
  key: string;
  comment?: string;
  timeoutMs?: number; // default 30_000
  params?: Record<string, string | number | undefined>;
};

// Torn reports "Too many requests" as error code 5 inside a 200 body.
export const RATE_LIMIT_CODES: ReadonlySet<number> = new Set([5]);

export const DEFAULT_TIMEOUT_MS = 30_000;

export class TornHttpError extends Error {
  constructor(
    readonly path: string,
    readonly status: number,
    body: string
  ) {
    super(`GET ${path} -> ${status}${body ? `\n${body.slice(0, 300)}` : ""}`);
    this.name = "TornHttpError";
  }
}

export class TornApiError extends Error {
  constructor(
    readonly path: string,
    readonly code: number,
    detail: string
  ) {
    super(`GET ${path} -> API error ${code}: ${detail}`);
    this.name = "TornApiError";
  }
}

export class TornRateLimitError extends TornApiError {
  constructor(path: string, code: number, detail: string) {
    super(path, code, detail);
    this.name = "TornRateLimitError";
  }
}

/** Network failure, timeout, or a body that is not JSON. */
export class TornTransportError extends Error {
  constructor(
    readonly path: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`GET ${path} -> ${detail}`, options);
    this.name = "TornTransportError";
  }
}

export function buildTornUrl(path: string, opts: TornRequestOpts): string {
  const u = new URL(opts.baseUrl.replace(/\/+$/, "") + path);
  for (const [k, v] of Object.entries(opts.params ?? {})) {
    if (v !== undefined) u.searchParams.set(k, String(v));
  }
  u.searchParams.set("key", opts.key);
  if (opts.comment) u.searchParams.set("comment", opts.comment);
  return u.toString();
}

type ErrorBody = { error: { code: number; error?: unknown } };

function isErrorBody(v: unknown): v is ErrorBody {
  if (typeof v !== "object" || v === null || !("error" in v)) return false;
  const err = v.error;
  return typeof err === "object" && err !== null && "code" in err && typeof err.code === "number";
}

/**
 * GET a Torn endpoint and return the parsed body.
 * Error messages carry the path only, never the key.
 */
export async function fetchTornJson(path: string, opts: TornRequestOpts): Promise<unknown> {
  const url = buildTornUrl(path, opts);
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    let res: Response;
    try {
      res = await fetch(url, {
        headers: { accept: "application/json" },
        signal: controller.signal,
      });
    } catch (e) {
      if (controller.signal.aborted) {
        throw new TornTransportError(path, `timed out after ${timeoutMs}ms`, { cause: e });
      }
      throw new TornTransportError(path, e instanceof Error ? e.message : String(e), { cause: e });
    }

    if (res.status === 429) {
      throw new TornRateLimitError(path, 5, "HTTP 429");
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new TornHttpError(path, res.status, text);
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (e) {
      throw new TornTransportError(path, "response is not valid JSON", { cause: e });
    }

    if (isErrorBody(json)) {
      const { code } = json.error;
      const detail = typeof json.error.error === "string" ? json.error.error : "unknown";
      if (RATE_LIMIT_CODES.has(code)) throw new TornRateLimitError(path, code, detail);
      throw new TornApiError(path, code, detail);
    }

    return json;
  } finally {
    clearTimeout(timeout);
  }
}
