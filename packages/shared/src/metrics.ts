import * as promClient from "prom-client";

export const register = new promClient.Registry();

const logCounter = new promClient.Counter({
  name: "log_messages_total",
  help: "Total number of log messages by namespace and level",
  labelNames: ["namespace", "level"],
  registers: [register],
});

const errorLogCounter = new promClient.Counter({
  name: "log_errors_total",
  help: "Total number of error logs by namespace",
  labelNames: ["namespace", "error_type"],
  registers: [register],
});

const streamCounter = new promClient.Counter({
  name: "bigram_streams_total",
  help: "Streams processed, by outcome",
  labelNames: ["outcome"],
  registers: [register],
});

const bytesReadCounter = new promClient.Counter({
  name: "bigram_bytes_read_total",
  help: "Bytes read from all sources",
  registers: [register],
});

const streamDurationHistogram = new promClient.Histogram({
  name: "bigram_stream_duration_seconds",
  help: "Time spent processing one stream",
  labelNames: ["outcome"],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [register],
});

export type StreamOutcome = "succeeded" | "failed";

export function recordLog(namespace: string, level: string, error?: Error) {
  logCounter.labels(namespace, level).inc();

  if (level === "error" && error) {
    errorLogCounter.labels(namespace, error.name || "UnknownError").inc();
  }
}

export function recordStream(outcome: StreamOutcome, durationMS: number) {
  streamCounter.labels(outcome).inc();
  streamDurationHistogram.labels(outcome).observe(durationMS / 1000); // Seconds
}

export function recordBytesRead(bytes: number) {
  if (bytes > 0) bytesReadCounter.inc(bytes);
}

/**
 * Render every registered metric in the Prometheus text format.
 */
export function renderMetrics(): Promise<string> {
  return register.metrics();
}
