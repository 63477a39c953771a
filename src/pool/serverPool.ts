import { Backend } from "./backend";

// Membership is fixed once built; liveness and counters live on each Backend.
export class ServerPool implements Iterable<Backend> {
  private readonly backends: readonly Backend[];

  constructor(backends: Backend[]) {
    this.backends = Object.freeze([...backends]);
  }

  /**
   * Builds a pool from configured addresses, keeping their order.
   * Any malformed address aborts construction of the whole pool.
   */
  static fromAddresses(addresses: string[]): ServerPool {
    return new ServerPool(addresses.map((address) => new Backend(address)));
  }

  get size(): number {
    return this.backends.length;
  }

  isEmpty(): boolean {
    return this.backends.length === 0;
  }

  at(index: number): Backend | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.backends.length) {
      return null;
    }
    return this.backends[index];
  }

  find(address: string): Backend | null {
    return this.backends.find((backend) => backend.address === address) ?? null;
  }

  aliveCount(): number {
    return this.backends.filter((backend) => backend.isAlive()).length;
  }

  toArray(): Backend[] {
    return [...this.backends];
  }

  [Symbol.iterator](): Iterator<Backend> {
    return this.backends[Symbol.iterator]();
  }
}
