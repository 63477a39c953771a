import type { URL } from "node:url";
import { parseBackendAddress } from "../core/utils";

/**
 * One upstream target.
 *
 * All mutations are synchronous, so on Node's single-threaded event loop each
 * one completes before any other request handler or health probe callback can
 * observe the backend. No read ever sees a partially applied update.
 */
export class Backend {
  readonly address: string;
  readonly url: URL;

  private alive = true;
  private activeConnections = 0;
  private requestCount = 0;

  constructor(address: string) {
    this.url = parseBackendAddress(address);
    this.address = address.trim();
  }

  recordStart(): void {
    this.activeConnections++;
    this.requestCount++;
  }

  recordEnd(): void {
    if (this.activeConnections === 0) {
      throw new Error(`recordEnd() without matching recordStart() on ${this.address}`);
    }
    this.activeConnections--;
  }

  isAlive(): boolean {
    return this.alive;
  }

  /** @returns whether the liveness flag changed */
  setAlive(alive: boolean): boolean {
    const changed = this.alive !== alive;
    this.alive = alive;
    return changed;
  }

  getActiveConnections(): number {
    return this.activeConnections;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  toJSON() {
    return {
      address: this.address,
      alive: this.alive,
      activeConnections: this.activeConnections,
      requestCount: this.requestCount,
    };
  }
}
