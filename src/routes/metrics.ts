import { Hono } from "hono";
import { metrics } from "../monitoring/metrics";
import { logger } from "../utils/logger";

export interface MetricsRoutesOptions {
  /** Resolves when the backing store answers; used by the readiness probe. */
  readinessCheck?: () => Promise<void>;
}

export function createMetricsRoutes(options: MetricsRoutesOptions = {}) {
  const metricsRoutes = new Hono();

  // Prometheus-compatible metrics endpoint
  metricsRoutes.get("/", (c) => {
    const prometheusMetrics = metrics.exportPrometheus();
    return c.text(prometheusMetrics, 200, {
      "Content-Type": "text/plain; version=0.0.4",
    });
  });

  metricsRoutes.get("/json", (c) => c.json(metrics.exportJSON()));

  // Summary dashboard endpoint
  metricsRoutes.get("/summary", (c) => c.json(metrics.getSummary()));

  metricsRoutes.get("/health", (c) => {
    const summary = metrics.getSummary();

    const isHealthy =
      summary.errorRate < 10 && // Less than 10% errors
      summary.avgRequestDuration < 1000; // Avg response < 1s

    return c.json(
      {
        status: isHealthy ? "healthy" : "degraded",
        timestamp: new Date().toISOString(),
        metrics: summary,
      },
      isHealthy ? 200 : 503,
    );
  });

  // Readiness check (for Kubernetes)
  metricsRoutes.get("/ready", async (c) => {
    try {
      await options.readinessCheck?.();
    } catch (err) {
      logger.warn({ err }, "Readiness check failed");
      return c.json({ status: "not_ready", timestamp: new Date().toISOString() }, 503);
    }
    return c.json({ status: "ready", timestamp: new Date().toISOString() });
  });

  // Liveness check (for Kubernetes)
  metricsRoutes.get("/live", (c) => {
    return c.json({
      status: "alive",
      timestamp: new Date().toISOString(),
    });
  });

  return metricsRoutes;
}
