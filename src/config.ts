import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "path";
import { fileURLToPath } from "url";
import { ConfigError } from "./domain/errors";

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

// Empty strings count as unset so `FOO=` in .env falls back to the default
const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().trim().optional(),
);

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const projectRoot = path.resolve(__dirname, "..");

/**
 * Load .env from the project root, regardless of process.cwd().
 * Variables already present in the environment win.
 */
export function loadEnvFile(envPath = path.join(projectRoot, ".env")): void {
  const envResult = loadEnv({ path: envPath });
  if (envResult.error) {
    console.warn(`[config] No .env loaded from ${envPath}: ${envResult.error.message}`);
  } else {
    console.log(`[config] Loaded environment from ${envPath}`);
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  // Model artifact: JSON manifest naming the predict endpoint and class names
  MODEL_PATH: z.string().default("models/model.json"),
  DEVICE: optionalString,
  IMGSZ: z.coerce.number().int().positive().default(640),
  CONF: z.coerce.number().min(0).max(1).default(0.25),
  IOU: z.coerce.number().min(0).max(1).default(0.45),
  // Concurrency budgets
  MAX_INFLIGHT: z.coerce.number().int().min(1).default(2),
  MAX_FETCH_INFLIGHT: z.coerce.number().int().min(1).default(8),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  // Object store
  ENABLE_S3: boolFromEnv(true),
  AWS_REGION: optionalString,
  S3_ENDPOINT: optionalString,
  // Auth / signing
  INBOUND_TOKEN: z.string().default(""),
  SHARED_SECRET: z.string().default(""),
  // Callback delivery
  CALLBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  CALLBACK_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(0),
  CALLBACK_RETRY_BASE_MS: z.coerce.number().int().min(0).default(1500),
  // Normalizer
  ROUND_DIGITS: z.coerce.number().int().min(0).max(15).default(5),
  TOP_K: z.coerce.number().int().min(1).default(5),
  // Local/test mode
  LOCAL_MODE: boolFromEnv(false),
  TRACKER_MAX_ENTRIES: z.coerce.number().int().min(1).default(1000),
  GRACEFUL_SHUTDOWN_MS: z.coerce.number().int().min(0).default(10000),
});

export type RuntimeConfig = Readonly<{
  port: number;
  host: string;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
  modelPath: string;
  device: string | undefined;
  defaults: Readonly<{ imgsz: number; conf: number; iou: number }>;
  maxInflight: number;
  maxFetchInflight: number;
  fetchTimeoutMs: number;
  s3: Readonly<{ enabled: boolean; region: string | undefined; endpoint: string | undefined }>;
  inboundToken: string;
  sharedSecret: string;
  callback: Readonly<{ timeoutMs: number; maxRetries: number; retryBaseMs: number }>;
  roundDigits: number;
  topK: number;
  localMode: boolean;
  trackerMaxEntries: number;
  gracefulShutdownMs: number;
}>;

/**
 * Parse and freeze the runtime configuration. Called once at startup; the
 * result is injected into every component.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${details}`);
  }
  const parsed = result.data;

  return Object.freeze({
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    modelPath: path.resolve(projectRoot, parsed.MODEL_PATH),
    device: parsed.DEVICE,
    defaults: Object.freeze({ imgsz: parsed.IMGSZ, conf: parsed.CONF, iou: parsed.IOU }),
    maxInflight: parsed.MAX_INFLIGHT,
    maxFetchInflight: parsed.MAX_FETCH_INFLIGHT,
    fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
    s3: Object.freeze({
      enabled: parsed.ENABLE_S3,
      region: parsed.AWS_REGION,
      endpoint: parsed.S3_ENDPOINT,
    }),
    inboundToken: parsed.INBOUND_TOKEN.trim(),
    sharedSecret: parsed.SHARED_SECRET,
    callback: Object.freeze({
      timeoutMs: parsed.CALLBACK_TIMEOUT_MS,
      maxRetries: parsed.CALLBACK_MAX_RETRIES,
      retryBaseMs: parsed.CALLBACK_RETRY_BASE_MS,
    }),
    roundDigits: parsed.ROUND_DIGITS,
    topK: parsed.TOP_K,
    localMode: parsed.LOCAL_MODE,
    trackerMaxEntries: parsed.TRACKER_MAX_ENTRIES,
    gracefulShutdownMs: parsed.GRACEFUL_SHUTDOWN_MS,
  });
}
