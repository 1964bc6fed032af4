import { describe, it, expect } from "vitest";
import { AxiosError, type InternalAxiosRequestConfig } from "axios";
import { CallbackDispatcher, serializeBatchResult, type CallbackDispatcherOptions } from "../callbackDispatcher";
import { signPayload, verifySignature } from "../signing";
import { MetricsCollector } from "../../metricsCollector";
import type { BatchResult } from "../../../domain/inference";
import { silentLogger, stubHttp, type StubReply } from "../../../__tests__/support";

const result: BatchResult = {
  request_id: "req-42",
  results: [
    {
      status: "failure",
      source: "http://bad",
      error_type: "source",
      reason: "transport",
      error_message: "Failed to fetch http://bad: HTTP 502",
    },
  ],
};

const baseOptions: CallbackDispatcherOptions = {
  sharedSecret: "test-secret",
  timeoutMs: 1000,
  maxRetries: 0,
  retryBaseMs: 100,
};

function harness(replies: Array<StubReply | "timeout">, options: Partial<CallbackDispatcherOptions> = {}) {
  const requests: InternalAxiosRequestConfig[] = [];
  const waits: number[] = [];
  const metrics = new MetricsCollector();
  const http = stubHttp((config) => {
    requests.push(config);
    const reply = replies[Math.min(requests.length - 1, replies.length - 1)];
    if (reply === "timeout") {
      throw new AxiosError("timeout of 1000ms exceeded", AxiosError.ECONNABORTED, config);
    }
    return reply;
  });
  const dispatcher = new CallbackDispatcher(
    http,
    { ...baseOptions, ...options },
    silentLogger(),
    metrics,
    async (ms) => {
      waits.push(ms);
    },
  );
  return { dispatcher, requests, waits, metrics };
}

describe("CallbackDispatcher", () => {
  it("posts the serialized result with a signature over those bytes", async () => {
    const { dispatcher, requests } = harness([{ status: 200 }]);

    const outcome = await dispatcher.deliver(result, "https://client.test/hook");

    expect(outcome).toEqual({ delivered: true, attempts: 1, status: 200 });
    expect(requests).toHaveLength(1);
    const [request] = requests;
    expect(request.url).toBe("https://client.test/hook");
    expect(request.method).toBe("post");
    expect(request.data).toBe(serializeBatchResult(result));
    expect(request.headers.get("Content-Type")).toBe("application/json");

    const signature = request.headers.get("X-Signature");
    expect(signature).toBe(signPayload(JSON.stringify(result), "test-secret"));
    expect(typeof signature === "string" && verifySignature(JSON.stringify(result), signature, "test-secret")).toBe(
      true,
    );
  });

  it("applies the callback timeout to each attempt", async () => {
    const { dispatcher, requests } = harness([{ status: 204 }], { timeoutMs: 2500 });
    await dispatcher.deliver(result, "https://client.test/hook");
    expect(requests[0].timeout).toBe(2500);
  });

  it("sends unsigned payloads when no secret is configured", async () => {
    const { dispatcher, requests } = harness([{ status: 200 }], { sharedSecret: "" });

    const outcome = await dispatcher.deliver(result, "https://client.test/hook");

    expect(outcome.delivered).toBe(true);
    expect(requests[0].headers.has("X-Signature")).toBe(false);
  });

  it("makes a single attempt by default and reports the failure", async () => {
    const { dispatcher, requests, waits, metrics } = harness([{ status: 500 }]);

    const outcome = await dispatcher.deliver(result, "https://client.test/hook");

    expect(requests).toHaveLength(1);
    expect(waits).toEqual([]);
    expect(outcome.delivered).toBe(false);
    if (outcome.delivered) return;
    expect(outcome.attempts).toBe(1);
    expect(outcome.error.status).toBe(500);
    expect(outcome.error.message).toBe("Callback endpoint responded 500");
    expect(metrics.getMetrics().counters.callbacks_failed_total).toBe(1);
  });

  it("retries with linear backoff until an attempt succeeds", async () => {
    const { dispatcher, requests, waits, metrics } = harness([{ status: 502 }, { status: 503 }, { status: 200 }], {
      maxRetries: 3,
    });

    const outcome = await dispatcher.deliver(result, "https://client.test/hook");

    expect(outcome).toEqual({ delivered: true, attempts: 3, status: 200 });
    expect(requests).toHaveLength(3);
    expect(waits).toEqual([100, 200]);
    expect(metrics.getMetrics().counters).toMatchObject({
      callbacks_delivered_total: 1,
      callback_retries_total: 2,
      callbacks_failed_total: 0,
    });
  });

  it("signs every retry with the same bytes", async () => {
    const { dispatcher, requests } = harness([{ status: 500 }, { status: 200 }], { maxRetries: 1 });

    await dispatcher.deliver(result, "https://client.test/hook");

    expect(requests.map((r) => r.data)).toEqual([JSON.stringify(result), JSON.stringify(result)]);
    expect(requests[0].headers.get("X-Signature")).toBe(requests[1].headers.get("X-Signature"));
  });

  it("gives up after the configured retries", async () => {
    const { dispatcher, requests, waits } = harness([{ status: 500 }], { maxRetries: 2 });

    const outcome = await dispatcher.deliver(result, "https://client.test/hook");

    expect(requests).toHaveLength(3);
    expect(waits).toEqual([100, 200]);
    expect(outcome).toMatchObject({ delivered: false, attempts: 3 });
  });

  it("reports timeouts as delivery failures", async () => {
    const { dispatcher } = harness(["timeout"]);

    const outcome = await dispatcher.deliver(result, "https://client.test/hook");

    if (outcome.delivered) throw new Error("expected failure");
    expect(outcome.error.message).toBe("Callback timed out after 1000ms");
    expect(outcome.error.status).toBeUndefined();
  });
});
