import type { Logger } from "pino";
import type { BatchResult, InferenceRequest } from "../domain/inference";
import type { BackgroundTaskPool } from "./backgroundTasks";
import type { BatchOrchestrator } from "./batchOrchestrator";
import type { CallbackDispatcher, DeliveryOutcome } from "./callback/callbackDispatcher";
import type { RequestTracker } from "./requestTracker";

export type AsyncInferenceRequest = InferenceRequest & { readonly callback_url: string };

/**
 * Request lifecycle: accepted → batch run → (returned inline | posted to callback)
 * → tracked when local mode keeps a tracker.
 */
export class InferenceJobService {
  private readonly logger: Logger;

  constructor(
    private readonly orchestrator: BatchOrchestrator,
    private readonly dispatcher: CallbackDispatcher,
    private readonly tasks: BackgroundTaskPool,
    private readonly tracker: RequestTracker | null,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "inference-jobs" });
  }

  /**
   * Accept an asynchronous job. Returns immediately; the batch and its
   * callback run in the background pool. Delivery failure is logged and
   * counted but never re-runs the batch.
   */
  submit(request: AsyncInferenceRequest): void {
    this.logger.info(
      { requestId: request.request_id, sources: request.sources.length, callbackUrl: request.callback_url },
      "Job accepted",
    );
    this.tasks.spawn(`job:${request.request_id}`, async () => {
      await this.runAndDeliver(request);
    });
  }

  async runAndDeliver(request: AsyncInferenceRequest): Promise<DeliveryOutcome> {
    const result = await this.orchestrator.run(request);
    const outcome = await this.dispatcher.deliver(result, request.callback_url);
    if (!outcome.delivered) {
      this.logger.warn(
        { requestId: request.request_id, attempts: outcome.attempts, err: outcome.error.message },
        "Job finished but its result was not delivered",
      );
    }
    await this.track(result);
    return outcome;
  }

  async runSync(request: InferenceRequest): Promise<BatchResult> {
    const result = await this.orchestrator.run(request);
    await this.track(result);
    return result;
  }

  async track(result: BatchResult): Promise<void> {
    if (this.tracker) {
      await this.tracker.put(result.request_id, result);
    }
  }

  async lookup(requestId: string): Promise<BatchResult | undefined> {
    return this.tracker ? this.tracker.get(requestId) : undefined;
  }
}
