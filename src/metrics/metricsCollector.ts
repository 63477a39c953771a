import { Counter, Gauge, Histogram, Registry } from "prom-client";
import type { IEventReporter } from "../core/interfaces";
import type { Algorithm, HealthEvent, RequestEvent } from "../core/models";
import type { ServerPool } from "../pool/serverPool";

export const RESPONSE_DURATION_BUCKETS_SECONDS = [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

/**
 * Prometheus metrics fed by request and health events. Active connections
 * are read from the pool at scrape time.
 */
export class MetricsCollector implements IEventReporter {
  readonly registry: Registry;
  readonly requestsTotal: Counter<"backend" | "algorithm" | "status">;
  readonly responseDuration: Histogram<"backend" | "algorithm">;
  readonly activeConnections: Gauge<"backend">;
  readonly backendHealth: Gauge<"backend">;

  constructor(pool: ServerPool, private algorithm: Algorithm, registry: Registry = new Registry()) {
    this.registry = registry;

    this.requestsTotal = new Counter({
      name: "lb_requests_total",
      help: "Total number of requests processed by the load balancer",
      labelNames: ["backend", "algorithm", "status"],
      registers: [registry],
    });

    this.responseDuration = new Histogram({
      name: "lb_response_duration_seconds",
      help: "Response time distribution",
      labelNames: ["backend", "algorithm"],
      buckets: RESPONSE_DURATION_BUCKETS_SECONDS,
      registers: [registry],
    });

    this.activeConnections = new Gauge({
      name: "lb_active_connections",
      help: "Number of active connections per backend",
      labelNames: ["backend"],
      registers: [registry],
      collect() {
        for (const backend of pool) {
          this.set({ backend: backend.address }, backend.getActiveConnections());
        }
      },
    });

    this.backendHealth = new Gauge({
      name: "lb_backend_health",
      help: "Health status of backends (1=healthy, 0=unhealthy)",
      labelNames: ["backend"],
      registers: [registry],
    });
  }

  reportRequest(event: RequestEvent): void {
    // Requests that never reached a backend carry no backend label
    if (!event.backendAddress) return;

    this.requestsTotal.inc({
      backend: event.backendAddress,
      algorithm: this.algorithm,
      status: String(event.statusCode),
    });
    this.responseDuration.observe(
      { backend: event.backendAddress, algorithm: this.algorithm },
      event.latencyMs / 1000
    );
  }

  reportHealth(event: HealthEvent): void {
    this.backendHealth.set({ backend: event.backendAddress }, event.alive ? 1 : 0);
  }

  /** Prometheus text exposition of every registered metric. */
  async metrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
