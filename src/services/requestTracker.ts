import type { BatchResult, RequestId } from "../domain/inference";
import { AsyncLock } from "../utils/asyncLock";

/**
 * Last result per request id, for local/self-callback testing.
 *
 * Last write wins. Entries are capped at `maxEntries`; once full the least
 * recently used entry is evicted (reads count as use). Map iteration order is
 * insertion order, so the first key is always the eviction candidate.
 */
export class RequestTracker {
  private readonly entries = new Map<RequestId, BatchResult>();
  private readonly lock = new AsyncLock();

  constructor(private readonly maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  put(requestId: RequestId, result: BatchResult): Promise<void> {
    return this.lock.runExclusive(() => {
      this.entries.delete(requestId);
      this.entries.set(requestId, result);
      while (this.entries.size > this.maxEntries) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
      }
    });
  }

  get(requestId: RequestId): Promise<BatchResult | undefined> {
    return this.lock.runExclusive(() => {
      const result = this.entries.get(requestId);
      if (result !== undefined) {
        // refresh recency
        this.entries.delete(requestId);
        this.entries.set(requestId, result);
      }
      return result;
    });
  }
}
