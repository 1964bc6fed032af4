import type { Logger } from "pino";
import type {
  BatchResult,
  FailureOutcome,
  InferenceOutcome,
  InferenceParams,
  InferenceRequest,
  ResolvedImage,
} from "../domain/inference";
import { SourceError, errorMessage } from "../domain/errors";
import { Semaphore } from "../utils/asyncLock";
import type { InferenceExecutor } from "./inference/inferenceExecutor";
import type { MetricsCollector } from "./metricsCollector";
import type { ResultNormalizer } from "./resultNormalizer";

export interface ImageResolver {
  resolve(uri: string): Promise<ResolvedImage>;
}

export interface BatchOrchestratorOptions {
  /** Units allowed to hold an image buffer at once, across all batches. */
  maxFetchInflight: number;
}

export function toFailure(source: string, error: unknown): FailureOutcome {
  if (error instanceof SourceError) {
    return {
      status: "failure",
      source,
      error_type: "source",
      reason: error.reason,
      error_message: error.message,
    };
  }
  return {
    status: "failure",
    source,
    error_type: "model",
    reason: "model_error",
    error_message: errorMessage(error),
  };
}

/**
 * Runs resolve → infer → normalize for every source of a request.
 *
 * Units run concurrently; the item gate bounds buffered images and the
 * executor's admission semaphore bounds model calls. Each unit writes into its
 * own positional slot, so output order always equals input order. A failing
 * unit produces a failure outcome and never aborts its siblings.
 */
export class BatchOrchestrator {
  private readonly itemGate: Semaphore;
  private readonly logger: Logger;

  constructor(
    private readonly resolver: ImageResolver,
    private readonly executor: InferenceExecutor,
    private readonly normalizer: ResultNormalizer,
    options: BatchOrchestratorOptions,
    logger: Logger,
    private readonly metrics?: MetricsCollector,
  ) {
    this.itemGate = new Semaphore(options.maxFetchInflight);
    this.logger = logger.child({ component: "batch-orchestrator" });
  }

  async run(request: InferenceRequest): Promise<BatchResult> {
    const { request_id: requestId, sources, params } = request;
    const started = Date.now();
    this.logger.info({ requestId, sources: sources.length }, "Batch started");

    const results = new Array<InferenceOutcome>(sources.length);
    await Promise.all(
      sources.map(async (source, index) => {
        const outcome = await this.runOne(source, params);
        if (outcome.status === "failure") {
          this.logger.warn(
            { requestId, index, source, errorType: outcome.error_type, reason: outcome.reason, error: outcome.error_message },
            "Batch item failed",
          );
        }
        results[index] = outcome;
      }),
    );

    const failed = results.filter((r) => r.status === "failure").length;
    this.metrics?.recordBatch(results.length - failed, failed);
    this.logger.info(
      { requestId, succeeded: results.length - failed, failed, ms: Date.now() - started },
      "Batch complete",
    );

    return { request_id: requestId, results };
  }

  /** One source, start to finish. Never throws. */
  async runOne(source: string, params: Readonly<InferenceParams>): Promise<InferenceOutcome> {
    try {
      return await this.itemGate.run(async (): Promise<InferenceOutcome> => {
        const image = await this.resolver.resolve(source);
        const { raw, speed_ms } = await this.executor.infer(image, params);
        const normalized = this.normalizer.normalize(raw, { scoreThreshold: params.conf });
        return {
          status: "success",
          source,
          speed_ms: this.normalizer.roundSpeed(speed_ms),
          ...normalized,
        };
      });
    } catch (error) {
      return toFailure(source, error);
    }
  }
}
