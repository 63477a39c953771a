import type { IEventReporter, IHealthChecker, IHealthProbe } from "../core/interfaces";
import type { HealthCheckOptions, HealthEvent, ProbeResult } from "../core/models";
import { errorMessage } from "../core/utils";
import type { Backend } from "../pool/backend";
import type { ServerPool } from "../pool/serverPool";

export const DEFAULT_HEALTH_CHECK_OPTIONS: HealthCheckOptions = {
  intervalMs: 5000,
  timeoutMs: 2000,
  path: "/health",
};

/**
 * Periodically probes every backend in the pool and flips its liveness.
 *
 * Each round fans out one probe per backend. Probes are independent: a
 * backend that hangs only holds up its own result, bounded by the probe
 * timeout. A backend whose previous probe is still running is skipped for
 * that round.
 */
export class HttpHealthChecker implements IHealthChecker {
  private intervalId: NodeJS.Timeout | null = null;
  private readonly inFlight = new Map<Backend, AbortController>();
  private readonly options: HealthCheckOptions;

  constructor(
    private pool: ServerPool,
    private healthProbe: IHealthProbe,
    private reporters: IEventReporter[] = [],
    options: Partial<HealthCheckOptions> = {}
  ) {
    this.options = { ...DEFAULT_HEALTH_CHECK_OPTIONS, ...options };
  }

  /**
   * Probes one backend and applies the result. A single failed probe is
   * enough to mark the backend DEAD; the next round is the retry.
   *
   * @returns the backend's liveness after the probe
   */
  async checkHealth(backend: Backend): Promise<boolean> {
    const controller = new AbortController();
    this.inFlight.set(backend, controller);

    try {
      const result = await this.probe(backend, controller.signal);

      // stop() aborted this probe; leave liveness as it was
      if (controller.signal.aborted) {
        return backend.isAlive();
      }

      const changed = backend.setAlive(result.ok);
      if (changed) {
        const detail = result.ok ? "" : ` (${result.error ?? `status ${result.statusCode}`})`;
        console.log(`🔍 ${backend.address} is now ${result.ok ? "ALIVE" : "DEAD"}${detail}`);
      }

      this.report({ backendAddress: backend.address, alive: result.ok, latencyMs: result.latencyMs });
      return result.ok;
    } finally {
      if (this.inFlight.get(backend) === controller) {
        this.inFlight.delete(backend);
      }
    }
  }

  async runRound(): Promise<void> {
    const probes: Promise<boolean>[] = [];
    for (const backend of this.pool) {
      if (this.inFlight.has(backend)) continue;
      probes.push(this.checkHealth(backend));
    }

    const results = await Promise.allSettled(probes);
    for (const result of results) {
      if (result.status === "rejected") {
        console.error(`🔍 Health check crashed: ${errorMessage(result.reason)}`);
      }
    }
  }

  /**
   * Runs a first round right away, then one per interval. Backends stay
   * ALIVE until a probe says otherwise, so the pool is usable immediately.
   */
  startPeriodicChecks(): void {
    if (this.intervalId) return;

    console.log(
      `🔍 Health checks every ${this.options.intervalMs}ms (timeout ${this.options.timeoutMs}ms, path ${this.options.path}) for ${this.pool.size} backends`
    );

    this.intervalId = setInterval(() => this.tick(), this.options.intervalMs);
    this.tick();
  }

  private tick(): void {
    this.runRound().catch((error) => {
      console.error(`🔍 Health check round failed: ${errorMessage(error)}`);
    });
  }

  isRunning(): boolean {
    return this.intervalId !== null;
  }

  getOptions(): HealthCheckOptions {
    return { ...this.options };
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    for (const controller of this.inFlight.values()) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  private async probe(backend: Backend, signal: AbortSignal): Promise<ProbeResult> {
    const startedAt = Date.now();
    try {
      return await this.healthProbe.probe(backend, this.options.path, this.options.timeoutMs, signal);
    } catch (error) {
      return { ok: false, latencyMs: Date.now() - startedAt, error: errorMessage(error) };
    }
  }

  private report(event: HealthEvent): void {
    for (const reporter of this.reporters) {
      try {
        reporter.reportHealth(event);
      } catch (error) {
        console.error(`🔍 Health event reporter failed: ${errorMessage(error)}`);
      }
    }
  }
}
