import { baselineCounts, loadResultsSnapshot } from "../cache/resultsSnapshot";
import type { ReferenceSource } from "../config/env";
import type { ReferencePoint } from "./types";

export function resolveReferencePoint(source: ReferenceSource): ReferencePoint {
  if (source.kind === "timestamp") return source;
  return { kind: "baseline", file: source.file, counts: baselineCounts(loadResultsSnapshot(source.file)) };
}
