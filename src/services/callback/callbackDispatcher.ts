/**
 * Callback Dispatcher
 *
 * Posts a finished BatchResult to the caller's callback URL.
 * - Body is serialized once; the HMAC signature covers exactly those bytes
 * - No shared secret → payload goes out unsigned (degraded mode, warned once)
 * - Each attempt has its own timeout; retries are opt-in (default 0) with
 *   linear backoff
 * - Failures are returned as a DeliveryOutcome, never thrown
 */

import axios, { type AxiosInstance } from "axios";
import type { Logger } from "pino";
import type { BatchResult } from "../../domain/inference";
import { DeliveryError, errorMessage } from "../../domain/errors";
import type { MetricsCollector } from "../metricsCollector";
import { SIGNATURE_HEADER, signPayload } from "./signing";

export interface CallbackDispatcherOptions {
  sharedSecret: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
}

export type DeliveryOutcome =
  | { delivered: true; attempts: number; status: number }
  | { delivered: false; attempts: number; error: DeliveryError };

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function serializeBatchResult(result: BatchResult): string {
  return JSON.stringify(result);
}

export class CallbackDispatcher {
  private readonly logger: Logger;

  constructor(
    private readonly http: AxiosInstance,
    private readonly options: CallbackDispatcherOptions,
    logger: Logger,
    private readonly metrics?: MetricsCollector,
    private readonly wait: (ms: number) => Promise<void> = sleep,
  ) {
    this.logger = logger.child({ component: "callback-dispatcher" });
    if (!options.sharedSecret) {
      this.logger.warn("SHARED_SECRET not configured; callbacks will be sent unsigned");
    }
  }

  async deliver(result: BatchResult, callbackUrl: string): Promise<DeliveryOutcome> {
    const body = serializeBatchResult(result);
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.sharedSecret) {
      headers[SIGNATURE_HEADER] = signPayload(body, this.options.sharedSecret);
    }

    const maxAttempts = this.options.maxRetries + 1;
    let lastError: DeliveryError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const response = await this.http.post(callbackUrl, body, {
          headers,
          timeout: this.options.timeoutMs,
          // send the signed bytes untouched
          transformRequest: [(data: unknown) => data],
          validateStatus: (status) => status >= 200 && status < 300,
        });
        this.metrics?.recordCallbackDelivered();
        this.logger.info(
          { requestId: result.request_id, callbackUrl, status: response.status, attempt },
          "Callback delivered",
        );
        return { delivered: true, attempts: attempt, status: response.status };
      } catch (error) {
        lastError = this.toDeliveryError(error, attempt);
        this.logger.warn(
          { requestId: result.request_id, callbackUrl, attempt, maxAttempts, status: lastError.status, err: lastError.message },
          "Callback attempt failed",
        );
        if (attempt < maxAttempts) {
          this.metrics?.recordCallbackRetry();
          await this.wait(this.options.retryBaseMs * attempt);
        }
      }
    }

    const error = lastError ?? new DeliveryError("Callback not attempted", 0);
    this.metrics?.recordCallbackFailed();
    this.logger.error(
      { requestId: result.request_id, callbackUrl, attempts: maxAttempts, err: error.message },
      "Callback delivery failed",
    );
    return { delivered: false, attempts: maxAttempts, error };
  }

  private toDeliveryError(error: unknown, attempt: number): DeliveryError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status !== undefined) {
        return new DeliveryError(`Callback endpoint responded ${status}`, attempt, status, { cause: error });
      }
      if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
        return new DeliveryError(`Callback timed out after ${this.options.timeoutMs}ms`, attempt, undefined, {
          cause: error,
        });
      }
    }
    return new DeliveryError(`Callback transport error: ${errorMessage(error)}`, attempt, undefined, { cause: error });
  }
}
