import { performance } from "node:perf_hooks";
import type { Logger } from "pino";
import type { InferenceParams, RawModelOutput, ResolvedImage, SpeedMs } from "../../domain/inference";
import { ModelError, errorMessage } from "../../domain/errors";
import { Semaphore } from "../../utils/asyncLock";
import type { MetricsCollector } from "../metricsCollector";
import type { ModelCapability } from "./modelCapability";

export interface InferencePayload {
  raw: RawModelOutput;
  speed_ms: SpeedMs;
}

export interface InferenceExecutorOptions {
  maxInflight: number;
  device?: string;
}

const nonNegative = (value: number | undefined): number | undefined =>
  value === undefined ? undefined : Number.isFinite(value) && value > 0 ? value : 0;

/**
 * Stage timings. The model's own report wins; stages it leaves out fall back
 * to the measured wall time (inference) or zero.
 */
export function resolveSpeed(reported: RawModelOutput["speed"], measuredMs: number): SpeedMs {
  return {
    preprocess: nonNegative(reported?.preprocess) ?? 0,
    inference: nonNegative(reported?.inference) ?? nonNegative(measuredMs) ?? 0,
    postprocess: nonNegative(reported?.postprocess) ?? 0,
  };
}

/**
 * Runs model predictions behind a global admission semaphore. At most
 * `maxInflight` predict calls are outstanding at any moment; callers past the
 * budget wait their turn.
 */
export class InferenceExecutor {
  private readonly admission: Semaphore;
  private readonly logger: Logger;

  constructor(
    private readonly model: ModelCapability,
    private readonly options: InferenceExecutorOptions,
    logger: Logger,
    private readonly metrics?: MetricsCollector,
  ) {
    this.admission = new Semaphore(options.maxInflight);
    this.logger = logger.child({ component: "inference-executor", model: model.name });
  }

  get modelCapability(): ModelCapability {
    return this.model;
  }

  get inFlight(): number {
    return this.admission.inFlight;
  }

  get waiting(): number {
    return this.admission.waiting;
  }

  get maxInflight(): number {
    return this.admission.permits;
  }

  async infer(image: ResolvedImage, params: InferenceParams): Promise<InferencePayload> {
    await this.admission.acquire();
    this.metrics?.setInferenceConcurrency(this.admission.inFlight, this.admission.waiting);
    const started = performance.now();
    try {
      const raw = await this.model.predict(image, { ...params, device: this.options.device });
      const measuredMs = performance.now() - started;
      this.metrics?.recordInferenceLatency(measuredMs);
      this.logger.debug({ source: image.source, ms: Math.round(measuredMs) }, "Inference complete");
      return { raw, speed_ms: resolveSpeed(raw.speed, measuredMs) };
    } catch (error) {
      if (error instanceof ModelError) throw error;
      throw new ModelError(`Model prediction failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      this.admission.release();
      this.metrics?.setInferenceConcurrency(this.admission.inFlight, this.admission.waiting);
    }
  }
}
