import type { ILoadBalancer, ISelector } from "../core/interfaces";
import { Algorithm } from "../core/models";
import type { Backend } from "../pool/backend";
import type { ServerPool } from "../pool/serverPool";
import { LeastConnectionsLoadBalancer } from "./leastConnLb";
import { RandomLB, type RandomSource } from "./randomLb";
import { RoundRobinLoadBalancer } from "./roundRobinLb";

/**
 * Maps a configured algorithm name onto an {@link Algorithm}.
 * Unrecognized names select {@link Algorithm.RANDOM} so a typo in the
 * configuration still yields a working balancer.
 */
export function parseAlgorithm(name: string): Algorithm {
  switch (name.trim().toLowerCase()) {
    case Algorithm.ROUND_ROBIN:
      return Algorithm.ROUND_ROBIN;
    case Algorithm.LEAST_CONN:
      return Algorithm.LEAST_CONN;
    default:
      return Algorithm.RANDOM;
  }
}

export function isKnownAlgorithm(name: string): boolean {
  const normalized = name.trim().toLowerCase();
  return Object.values(Algorithm).some((algorithm) => algorithm === normalized);
}

export interface BackendSelectorOptions {
  random?: RandomSource;
}

/**
 * Owns one instance of each strategy, and with it the round-robin cursor,
 * for the lifetime of the process. Selection is a pure decision: it reads
 * liveness and connection counts but never changes them.
 */
export class BackendSelector implements ISelector {
  private readonly strategies: Record<Algorithm, ILoadBalancer>;

  constructor(options: BackendSelectorOptions = {}) {
    this.strategies = {
      [Algorithm.ROUND_ROBIN]: new RoundRobinLoadBalancer(),
      [Algorithm.LEAST_CONN]: new LeastConnectionsLoadBalancer(),
      [Algorithm.RANDOM]: new RandomLB(options.random),
    };
  }

  selectBackend(pool: ServerPool, algorithm: Algorithm): Backend | null {
    return this.strategies[algorithm].selectBackend(pool);
  }
}
