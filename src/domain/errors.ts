import type { SourceErrorReason } from "./inference";

export type ServiceErrorCode =
  | "SOURCE_ERROR"
  | "MODEL_ERROR"
  | "DELIVERY_ERROR"
  | "AUTH_ERROR"
  | "CONFIG_ERROR";

export abstract class ServiceError extends Error {
  abstract readonly code: ServiceErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Fetch or decode failure for one image. Scoped to that item. */
export class SourceError extends ServiceError {
  readonly code = "SOURCE_ERROR" as const;

  constructor(
    readonly uri: string,
    readonly reason: SourceErrorReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The model capability threw or returned something unusable. Scoped to one item. */
export class ModelError extends ServiceError {
  readonly code = "MODEL_ERROR" as const;
}

export class DeliveryError extends ServiceError {
  readonly code = "DELIVERY_ERROR" as const;

  constructor(
    message: string,
    readonly attempts: number,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class AuthError extends ServiceError {
  readonly code = "AUTH_ERROR" as const;
}

/** Invalid environment or model artifact at startup. Fatal. */
export class ConfigError extends ServiceError {
  readonly code = "CONFIG_ERROR" as const;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
