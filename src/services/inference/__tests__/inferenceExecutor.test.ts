import { describe, it, expect } from "vitest";
import { InferenceExecutor, resolveSpeed } from "../inferenceExecutor";
import { ModelError } from "../../../domain/errors";
import { MetricsCollector } from "../../metricsCollector";
import { FakeModel, delay, fakeImage, probsOutput, silentLogger } from "../../../__tests__/support";

const params = { imgsz: 640, conf: 0.25, iou: 0.45 };

describe("InferenceExecutor", () => {
  it("never exceeds the admission budget", async () => {
    const model = new FakeModel(["a"], async () => {
      await delay(5);
      return probsOutput([1]);
    });
    const executor = new InferenceExecutor(model, { maxInflight: 2 }, silentLogger());

    await Promise.all(Array.from({ length: 8 }, (_, i) => executor.infer(fakeImage(`img-${i}`), params)));

    expect(model.calls).toHaveLength(8);
    expect(model.peak).toBe(2);
    expect(executor.inFlight).toBe(0);
  });

  it("serializes predictions when the budget is one", async () => {
    const model = new FakeModel(["a"], async () => {
      await delay(2);
      return probsOutput([1]);
    });
    const executor = new InferenceExecutor(model, { maxInflight: 1 }, silentLogger());

    await Promise.all(Array.from({ length: 5 }, (_, i) => executor.infer(fakeImage(`img-${i}`), params)));

    expect(model.peak).toBe(1);
  });

  it("wraps model failures in ModelError and frees the slot", async () => {
    const model = new FakeModel(["a"], async () => {
      throw new Error("CUDA out of memory");
    });
    const executor = new InferenceExecutor(model, { maxInflight: 1 }, silentLogger());

    const failure = executor.infer(fakeImage("x"), params);
    await expect(failure).rejects.toBeInstanceOf(ModelError);
    await expect(executor.infer(fakeImage("y"), params)).rejects.toThrow(
      "Model prediction failed: CUDA out of memory",
    );
    expect(executor.inFlight).toBe(0);
  });

  it("passes params and the configured device to the model", async () => {
    const model = new FakeModel(["a"], async () => probsOutput([1]));
    const executor = new InferenceExecutor(model, { maxInflight: 1, device: "cuda:0" }, silentLogger());

    await executor.infer(fakeImage("x"), { imgsz: 320, conf: 0.5, iou: 0.7 });

    expect(model.calls[0]).toEqual({ source: "x", params: { imgsz: 320, conf: 0.5, iou: 0.7, device: "cuda:0" } });
  });

  it("returns the model's reported timings", async () => {
    const model = new FakeModel(["a"], async () => probsOutput([1]));
    const executor = new InferenceExecutor(model, { maxInflight: 1 }, silentLogger());

    const { speed_ms } = await executor.infer(fakeImage("x"), params);
    expect(speed_ms).toEqual({ preprocess: 1.25, inference: 10.5, postprocess: 0.75 });
  });

  it("records latency and concurrency in the metrics collector", async () => {
    const metrics = new MetricsCollector();
    const model = new FakeModel(["a"], async () => probsOutput([1]));
    const executor = new InferenceExecutor(model, { maxInflight: 3 }, silentLogger(), metrics);

    await executor.infer(fakeImage("x"), params);

    const snapshot = metrics.getMetrics();
    expect(snapshot.histograms.inference_latency_ms.count).toBe(1);
    expect(snapshot.gauges.inference_in_flight).toBe(0);
  });
});

describe("resolveSpeed", () => {
  it("falls back to measured wall time for inference", () => {
    expect(resolveSpeed(undefined, 12.5)).toEqual({ preprocess: 0, inference: 12.5, postprocess: 0 });
  });

  it("clamps negative or non-finite stage timings to zero", () => {
    expect(resolveSpeed({ preprocess: -3, inference: Number.NaN, postprocess: 2 }, 8)).toEqual({
      preprocess: 0,
      inference: 0,
      postprocess: 2,
    });
  });
});
