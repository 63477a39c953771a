import type { ILoadBalancer } from "../core/interfaces";
import { Algorithm } from "../core/models";
import type { Backend } from "../pool/backend";
import type { ServerPool } from "../pool/serverPool";

export type RandomSource = () => number;

export class RandomLB implements ILoadBalancer {
  readonly name = Algorithm.RANDOM;

  constructor(private random: RandomSource = Math.random) { }

  selectBackend(pool: ServerPool): Backend | null {
    const total = pool.size;
    if (total === 0) {
      return null;
    }

    let index = 0;
    for (let attempt = 0; attempt < total; attempt++) {
      index = this.sampleIndex(total);
      const candidate = pool.at(index);
      if (candidate?.isAlive()) {
        return candidate;
      }
    }

    // Every sample hit a dead backend. Walk the pool from the last sample so a
    // live backend is still found when one exists.
    for (let step = 1; step < total; step++) {
      const candidate = pool.at((index + step) % total);
      if (candidate?.isAlive()) {
        return candidate;
      }
    }

    return null;
  }

  private sampleIndex(total: number): number {
    const index = Math.floor(this.random() * total);
    if (!Number.isFinite(index)) return 0;
    return Math.min(Math.max(index, 0), total - 1);
  }
}
