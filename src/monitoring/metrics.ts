// Prometheus-compatible metrics collection
// Tracks HTTP traffic, transfer outcomes, lock contention and latency

import type { MiddlewareHandler } from "hono";

type Labels = Record<string, string>;

interface HistogramSummary {
  count: number;
  sum: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  min: number;
  max: number;
}

export interface MetricsSnapshot {
  timestamp: string;
  counters: Record<string, number>;
  histograms: Record<string, HistogramSummary>;
}

const MAX_SAMPLES = 1000;

export class MetricsCollector {
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();

  incrementCounter(name: string, value: number = 1, labels?: Labels): void {
    const key = this.makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  observe(name: string, value: number, labels?: Labels): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    if (values.length > MAX_SAMPLES) {
      values.shift();
    }
    this.histograms.set(key, values);
  }

  counterValue(name: string, labels?: Labels): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  private makeKey(name: string, labels?: Labels): string {
    if (!labels) return name;
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return `${name}{${labelStr}}`;
  }

  private percentile(values: number[], p: number): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, index)];
  }

  exportPrometheus(): string {
    const lines: string[] = [];

    for (const [key, value] of this.counters.entries()) {
      lines.push(`# TYPE ${key.split("{")[0]} counter`);
      lines.push(`${key} ${value}`);
    }

    for (const [key, values] of this.histograms.entries()) {
      const baseName = key.split("{")[0];
      const labelStr = key.includes("{") ? key.slice(key.indexOf("{")) : "";
      lines.push(`# TYPE ${baseName} summary`);
      lines.push(`${baseName}_sum${labelStr} ${values.reduce((a, b) => a + b, 0)}`);
      lines.push(`${baseName}_count${labelStr} ${values.length}`);
    }

    return lines.join("\n") + "\n";
  }

  exportJSON(): MetricsSnapshot {
    const snapshot: MetricsSnapshot = {
      timestamp: new Date().toISOString(),
      counters: Object.fromEntries(this.counters),
      histograms: {},
    };

    for (const [key, values] of this.histograms.entries()) {
      const sum = values.reduce((a, b) => a + b, 0);
      snapshot.histograms[key] = {
        count: values.length,
        sum,
        avg: values.length > 0 ? sum / values.length : 0,
        p50: this.percentile(values, 50),
        p95: this.percentile(values, 95),
        p99: this.percentile(values, 99),
        min: values.length > 0 ? Math.min(...values) : 0,
        max: values.length > 0 ? Math.max(...values) : 0,
      };
    }

    return snapshot;
  }

  getSummary() {
    let totalRequests = 0;
    let totalErrors = 0;
    let totalTransfers = 0;
    let concurrencyConflicts = 0;

    for (const [key, value] of this.counters.entries()) {
      if (key.startsWith("http_requests_total")) totalRequests += value;
      if (key.startsWith("http_errors_total")) totalErrors += value;
      if (key.startsWith("transfers_total")) totalTransfers += value;
      if (key.startsWith("concurrency_conflicts_total")) concurrencyConflicts += value;
    }

    const requestDurations: number[] = [];
    for (const [key, values] of this.histograms.entries()) {
      if (key.startsWith("http_request_duration_ms")) {
        requestDurations.push(...values);
      }
    }

    const avgRequestDuration =
      requestDurations.length > 0
        ? requestDurations.reduce((a, b) => a + b, 0) / requestDurations.length
        : 0;

    return {
      totalRequests,
      totalErrors,
      errorRate: totalRequests > 0 ? (totalErrors / totalRequests) * 100 : 0,
      totalTransfers,
      concurrencyConflicts,
      avgRequestDuration: Math.round(avgRequestDuration * 100) / 100,
      p95RequestDuration: this.percentile(requestDurations, 95),
    };
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }
}

export const metrics = new MetricsCollector();

export function trackRequest(method: string, path: string, status: number, duration: number): void {
  metrics.incrementCounter("http_requests_total", 1, { method, path, status: status.toString() });
  metrics.observe("http_request_duration_ms", duration, { method, path });

  if (status >= 400) {
    metrics.incrementCounter("http_errors_total", 1, { method, path, status: status.toString() });
  }
}

export function trackTransfer(
  type: "TRANSFER" | "DEPOSIT",
  status: "COMPLETED" | "FAILED" | "REPLAYED",
  durationMs?: number,
): void {
  metrics.incrementCounter("transfers_total", 1, { type, status });
  if (durationMs !== undefined) {
    metrics.observe("transfer_duration_ms", durationMs, { type });
  }
}

export function trackConcurrencyConflict(type: "TRANSFER" | "DEPOSIT"): void {
  metrics.incrementCounter("concurrency_conflicts_total", 1, { type });
}

export function metricsMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    const start = performance.now();

    await next();

    trackRequest(c.req.method, c.req.routePath, c.res.status, performance.now() - start);
  };
}
