import type { Logger } from "pino";
import { errorMessage } from "../domain/errors";

export type TaskErrorSink = (name: string, error: unknown) => void;

/**
 * Supervised pool for detached work (callback jobs). Every spawned task is
 * tracked until it settles; rejections are logged and forwarded to the error
 * sink instead of surfacing as unhandled rejections.
 */
export class BackgroundTaskPool {
  private readonly tasks = new Map<number, { name: string; promise: Promise<void> }>();
  private nextId = 1;
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly onError?: TaskErrorSink,
    private readonly onSizeChange?: (size: number) => void,
  ) {
    this.logger = logger.child({ component: "background-tasks" });
  }

  get size(): number {
    return this.tasks.size;
  }

  spawn(name: string, task: () => Promise<void>): void {
    const id = this.nextId++;
    // started on a microtask so the entry is registered before it can settle
    const promise = Promise.resolve()
      .then(task)
      .catch((error: unknown) => {
        this.logger.error({ task: name, err: errorMessage(error) }, "Background task failed");
        this.onError?.(name, error);
      })
      .finally(() => {
        this.tasks.delete(id);
        this.onSizeChange?.(this.tasks.size);
      });
    this.tasks.set(id, { name, promise });
    this.onSizeChange?.(this.tasks.size);
  }

  /**
   * Wait for in-flight tasks. Resolves true when all settled within the
   * timeout, false otherwise (remaining task names are logged).
   */
  async drain(timeoutMs: number): Promise<boolean> {
    if (this.tasks.size === 0) return true;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const settled = (async () => {
      while (this.tasks.size > 0) {
        await Promise.all([...this.tasks.values()].map((t) => t.promise));
      }
      return true as const;
    })();

    const drained = await Promise.race([settled, timedOut]);
    clearTimeout(timer);
    if (!drained) {
      this.logger.warn(
        { remaining: [...this.tasks.values()].map((t) => t.name) },
        "Background tasks still running after drain timeout",
      );
    }
    return drained;
  }
}
