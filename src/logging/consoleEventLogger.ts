import type { IEventReporter } from "../core/interfaces";
import type { HealthEvent, RequestEvent } from "../core/models";

export interface ConsoleEventLoggerOptions {
  /** Also print health probes that did not change anything. */
  verboseHealth?: boolean;
}

export class ConsoleEventLogger implements IEventReporter {
  private lastLiveness = new Map<string, boolean>();

  constructor(private options: ConsoleEventLoggerOptions = {}) { }

  reportRequest(event: RequestEvent): void {
    const target = event.backendAddress || "none";
    console.log(
      `🌐 ${event.clientAddr} ${event.method} ${event.path} -> ${target} [${event.statusCode}] ${event.latencyMs}ms`
    );
  }

  reportHealth(event: HealthEvent): void {
    const previous = this.lastLiveness.get(event.backendAddress);
    this.lastLiveness.set(event.backendAddress, event.alive);

    if (previous === event.alive && !this.options.verboseHealth) return;

    const state = event.alive ? "✅ healthy" : "❌ unhealthy";
    console.log(`🔍 ${event.backendAddress} ${state} (${event.latencyMs}ms)`);
  }
}
