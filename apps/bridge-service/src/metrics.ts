import { createMetricsRegistry } from "@idbridge/shared";

export const createServiceMetrics = () => {
  const metrics = createMetricsRegistry({ service: "bridge-service" });
  metrics.incCounter("bridge_messages_total", { type: "verification", outcome: "accepted" }, 0);
  metrics.incCounter("bridge_credentials_total", { op: "store" }, 0);
  metrics.incCounter("bridge_credentials_total", { op: "revoke" }, 0);
  return metrics;
};

export const metrics = createServiceMetrics();
