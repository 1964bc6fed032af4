import { describe, it, expect } from "vitest";
import { RequestTracker } from "../requestTracker";
import type { BatchResult } from "../../domain/inference";

const resultFor = (requestId: string, marker = "x"): BatchResult => ({
  request_id: requestId,
  results: [
    { status: "failure", source: marker, error_type: "source", reason: "not_found", error_message: "missing" },
  ],
});

describe("RequestTracker", () => {
  it("returns what was stored and undefined for unknown ids", async () => {
    const tracker = new RequestTracker(10);
    await tracker.put("a", resultFor("a"));

    await expect(tracker.get("a")).resolves.toEqual(resultFor("a"));
    await expect(tracker.get("missing")).resolves.toBeUndefined();
  });

  it("keeps the last write for an id", async () => {
    const tracker = new RequestTracker(10);
    await tracker.put("a", resultFor("a", "first"));
    await tracker.put("a", resultFor("a", "second"));

    expect(tracker.size).toBe(1);
    expect((await tracker.get("a"))?.results[0].source).toBe("second");
  });

  it("evicts the least recently used entry once full", async () => {
    const tracker = new RequestTracker(2);
    await tracker.put("a", resultFor("a"));
    await tracker.put("b", resultFor("b"));
    // touching "a" makes "b" the eviction candidate
    await tracker.get("a");
    await tracker.put("c", resultFor("c"));

    expect(tracker.size).toBe(2);
    await expect(tracker.get("b")).resolves.toBeUndefined();
    await expect(tracker.get("a")).resolves.toBeDefined();
    await expect(tracker.get("c")).resolves.toBeDefined();
  });

  it("stays consistent under concurrent writers", async () => {
    const tracker = new RequestTracker(50);
    await Promise.all(Array.from({ length: 100 }, (_, i) => tracker.put(`r-${i}`, resultFor(`r-${i}`))));

    expect(tracker.size).toBe(50);
    await expect(tracker.get("r-49")).resolves.toBeUndefined();
    await expect(tracker.get("r-50")).resolves.toBeDefined();
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new RequestTracker(0)).toThrow(RangeError);
  });
});
