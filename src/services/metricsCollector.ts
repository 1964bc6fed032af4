/**
 * MetricsCollector - in-process counters for the /metrics endpoint (JSON format)
 */

interface Histogram {
  count: number;
  sum: number;
  min: number;
  max: number;
  p50: number;
  p95: number;
  p99: number;
}

export class MetricsCollector {
  private batches = 0;
  private itemsSucceeded = 0;
  private itemsFailed = 0;
  private callbacksDelivered = 0;
  private callbacksFailed = 0;
  private callbackRetries = 0;
  private backgroundTaskErrors = 0;
  private inferenceInFlight = 0;
  private inferenceWaiting = 0;
  private backgroundTasksInFlight = 0;
  private inferenceLatencies: number[] = [];
  private readonly maxHistogramSamples = 1000;

  recordBatch(succeeded: number, failed: number): void {
    this.batches++;
    this.itemsSucceeded += succeeded;
    this.itemsFailed += failed;
  }

  recordCallbackDelivered(): void {
    this.callbacksDelivered++;
  }

  recordCallbackFailed(): void {
    this.callbacksFailed++;
  }

  recordCallbackRetry(): void {
    this.callbackRetries++;
  }

  recordBackgroundTaskError(): void {
    this.backgroundTaskErrors++;
  }

  recordInferenceLatency(ms: number): void {
    this.inferenceLatencies.push(ms);
    // Keep only recent samples to avoid unbounded memory growth
    if (this.inferenceLatencies.length > this.maxHistogramSamples) {
      this.inferenceLatencies.shift();
    }
  }

  setInferenceConcurrency(inFlight: number, waiting: number): void {
    this.inferenceInFlight = inFlight;
    this.inferenceWaiting = waiting;
  }

  setBackgroundTasksInFlight(count: number): void {
    this.backgroundTasksInFlight = count;
  }

  getMetrics() {
    return {
      counters: {
        batches_total: this.batches,
        items_succeeded_total: this.itemsSucceeded,
        items_failed_total: this.itemsFailed,
        callbacks_delivered_total: this.callbacksDelivered,
        callbacks_failed_total: this.callbacksFailed,
        callback_retries_total: this.callbackRetries,
        background_task_errors_total: this.backgroundTaskErrors,
      },
      gauges: {
        inference_in_flight: this.inferenceInFlight,
        inference_waiting: this.inferenceWaiting,
        background_tasks_in_flight: this.backgroundTasksInFlight,
      },
      histograms: {
        inference_latency_ms: this.computeHistogram(this.inferenceLatencies),
      },
    };
  }

  private computeHistogram(samples: number[]): Histogram {
    if (samples.length === 0) {
      return { count: 0, sum: 0, min: 0, max: 0, p50: 0, p95: 0, p99: 0 };
    }

    const sorted = [...samples].sort((a, b) => a - b);
    const sum = sorted.reduce((acc, val) => acc + val, 0);

    return {
      count: sorted.length,
      sum,
      min: sorted[0],
      max: sorted[sorted.length - 1],
      p50: this.percentile(sorted, 0.5),
      p95: this.percentile(sorted, 0.95),
      p99: this.percentile(sorted, 0.99),
    };
  }

  private percentile(sorted: number[], p: number): number {
    const index = Math.ceil(sorted.length * p) - 1;
    return sorted[Math.max(0, index)];
  }
}
