/**
 * AppContext: composition root.
 *
 * Builds every component from the validated runtime config and wires them
 * together. server.ts and the route modules only ever see the finished
 * context; tests build one with fakes through `ContextOverrides`.
 */

import pino, { type Logger } from "pino";
import axios, { type AxiosInstance } from "axios";

import type { RuntimeConfig } from "../config";
import { ImageSourceResolver } from "../services/imageSource/imageSourceResolver";
import { S3ObjectStore, type ObjectStore } from "../services/imageSource/objectStore";
import { loadModelManifest, type ModelCapability } from "../services/inference/modelCapability";
import { RemoteModel } from "../services/inference/remoteModel";
import { InferenceExecutor } from "../services/inference/inferenceExecutor";
import { ResultNormalizer } from "../services/resultNormalizer";
import { BatchOrchestrator, type ImageResolver } from "../services/batchOrchestrator";
import { CallbackDispatcher } from "../services/callback/callbackDispatcher";
import { BackgroundTaskPool } from "../services/backgroundTasks";
import { RequestTracker } from "../services/requestTracker";
import { InferenceJobService } from "../services/inferenceJobs";
import { MetricsCollector } from "../services/metricsCollector";

// -----------------------------------------------------------------------------
// AppContext interface
// -----------------------------------------------------------------------------

export interface AppContext {
  config: RuntimeConfig;
  logger: Logger;
  model: ModelCapability;
  resolver: ImageResolver;
  executor: InferenceExecutor;
  normalizer: ResultNormalizer;
  orchestrator: BatchOrchestrator;
  dispatcher: CallbackDispatcher;
  tasks: BackgroundTaskPool;
  tracker: RequestTracker | null;
  jobs: InferenceJobService;
  metricsCollector: MetricsCollector;
  close: () => Promise<void>;
}

export interface ContextOverrides {
  logger?: Logger;
  /** Skip the manifest and use this capability. */
  model?: ModelCapability;
  /** Replaces the image resolver entirely. */
  resolver?: ImageResolver;
  /** HTTP client for image fetches and callbacks. */
  http?: AxiosInstance;
  /** `null` disables object-store sources. */
  objectStore?: ObjectStore | null;
}

// -----------------------------------------------------------------------------
// Logger factory
// -----------------------------------------------------------------------------

export function createLogger(level: RuntimeConfig["logLevel"]): Logger {
  const destination = pino.destination({ sync: process.env.NODE_ENV !== "production" });
  destination.on("error", (err: NodeJS.ErrnoException) => {
    if (err?.code === "EINTR") return;
    console.error("pino destination error", err);
  });
  return pino({ level, base: { service: "batch-inference" } }, destination);
}

// -----------------------------------------------------------------------------
// Context factory
// -----------------------------------------------------------------------------

export async function createContext(config: RuntimeConfig, overrides: ContextOverrides = {}): Promise<AppContext> {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const metricsCollector = new MetricsCollector();

  // Model first: a bad artifact throws ConfigError before anything else starts
  let model: ModelCapability;
  if (overrides.model) {
    model = overrides.model;
  } else {
    const manifest = await loadModelManifest(config.modelPath);
    model = new RemoteModel(manifest, logger);
  }
  logger.info({ model: model.name, device: config.device ?? "(model default)" }, "[startup] Model capability ready");

  const http = overrides.http ?? axios.create();

  let s3Store: S3ObjectStore | null = null;
  let objectStore: ObjectStore | null;
  if (overrides.objectStore !== undefined) {
    objectStore = overrides.objectStore;
  } else if (config.s3.enabled) {
    s3Store = new S3ObjectStore({ region: config.s3.region, endpoint: config.s3.endpoint }, logger);
    objectStore = s3Store;
  } else {
    objectStore = null;
  }

  const resolver =
    overrides.resolver ??
    new ImageSourceResolver({ http, objectStore, fetchTimeoutMs: config.fetchTimeoutMs, logger });

  const executor = new InferenceExecutor(
    model,
    { maxInflight: config.maxInflight, device: config.device },
    logger,
    metricsCollector,
  );

  const normalizer = new ResultNormalizer({
    classNames: model.classNames,
    topK: config.topK,
    roundDigits: config.roundDigits,
  });

  const orchestrator = new BatchOrchestrator(
    resolver,
    executor,
    normalizer,
    { maxFetchInflight: config.maxFetchInflight },
    logger,
    metricsCollector,
  );

  const dispatcher = new CallbackDispatcher(
    http,
    {
      sharedSecret: config.sharedSecret,
      timeoutMs: config.callback.timeoutMs,
      maxRetries: config.callback.maxRetries,
      retryBaseMs: config.callback.retryBaseMs,
    },
    logger,
    metricsCollector,
  );

  const tasks = new BackgroundTaskPool(
    logger,
    () => metricsCollector.recordBackgroundTaskError(),
    (size) => metricsCollector.setBackgroundTasksInFlight(size),
  );

  const tracker = config.localMode ? new RequestTracker(config.trackerMaxEntries) : null;
  const jobs = new InferenceJobService(orchestrator, dispatcher, tasks, tracker, logger);

  logger.info(
    {
      maxInflight: config.maxInflight,
      maxFetchInflight: config.maxFetchInflight,
      objectStore: objectStore !== null,
      signing: config.sharedSecret !== "",
      inboundAuth: config.inboundToken !== "",
      localMode: config.localMode,
    },
    "[startup] Context created",
  );

  const close = async (): Promise<void> => {
    await model.close?.();
    s3Store?.destroy();
  };

  return {
    config,
    logger,
    model,
    resolver,
    executor,
    normalizer,
    orchestrator,
    dispatcher,
    tasks,
    tracker,
    jobs,
    metricsCollector,
    close,
  };
}
