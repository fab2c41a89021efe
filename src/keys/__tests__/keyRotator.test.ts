import { describe, expect, it } from "vitest";
import { KeyGroupNotFoundError, KeyRotator } from "../keyRotator";

describe("KeyRotator", () => {
  it("cycles through a faction's keys in order", () => {
    const keys = new KeyRotator();
    keys.register("100", ["k1", "k2", "k3"]);

    const got = Array.from({ length: 7 }, () => keys.next("100"));
    expect(got).toEqual(["k1", "k2", "k3", "k1", "k2", "k3", "k1"]);
  });

  it("hands out each key floor(N/k) or ceil(N/k) times", () => {
    const keys = new KeyRotator();
    keys.register("100", ["k1", "k2", "k3"]);

    const counts = new Map<string, number>();
    for (let i = 0; i < 20; i++) {
      const k = keys.next("100");
      counts.set(k, (counts.get(k) ?? 0) + 1);
    }

    expect(Object.fromEntries(counts)).toEqual({ k1: 7, k2: 7, k3: 6 });
  });

  it("keeps a separate cursor per faction", () => {
    const keys = new KeyRotator();
    keys.register("100", ["a1", "a2"]);
    keys.register("200", ["b1", "b2"]);

    expect(keys.next("100")).toBe("a1");
    expect(keys.next("200")).toBe("b1");
    expect(keys.next("100")).toBe("a2");
    expect(keys.next("200")).toBe("b2");
  });

  it("does not skip positions when many workers ask at once", async () => {
    const keys = new KeyRotator();
    keys.register("100", ["k1", "k2"]);

    const got = await Promise.all(
      Array.from({ length: 6 }, async () => {
        await Promise.resolve();
        return keys.next("100");
      })
    );

    expect(got.filter((k) => k === "k1")).toHaveLength(3);
    expect(got.filter((k) => k === "k2")).toHaveLength(3);
  });

  it("throws KeyGroupNotFoundError for an unregistered faction", () => {
    const keys = new KeyRotator();
    keys.register("100", ["k1"]);

    expect(() => keys.next("999")).toThrow(KeyGroupNotFoundError);
    expect(() => keys.next("999")).toThrow("Faction ID 999 not found in the keys file.");
  });

  it("rejects a faction without usable keys", () => {
    const keys = new KeyRotator();
    expect(() => keys.register("100", [])).toThrow("Faction 100 has no API keys");
    expect(() => keys.register("100", ["", ""])).toThrow("Faction 100 has no API keys");
    expect(keys.has("100")).toBe(false);
  });

  it("drops empty keys and reports the count", () => {
    const keys = new KeyRotator();
    keys.register("100", ["", "k1", "k2"]);

    expect(keys.count("100")).toBe(2);
    expect(keys.count("200")).toBe(0);
    expect(keys.next("100")).toBe("k1");
  });
});
