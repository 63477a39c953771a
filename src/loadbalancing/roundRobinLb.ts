import type { ILoadBalancer } from "../core/interfaces";
import { Algorithm } from "../core/models";
import type { Backend } from "../pool/backend";
import type { ServerPool } from "../pool/serverPool";

const UINT32_RANGE = 2 ** 32;

export class RoundRobinLoadBalancer implements ILoadBalancer {
  readonly name = Algorithm.ROUND_ROBIN;
  private cursor = 0;

  selectBackend(pool: ServerPool): Backend | null {
    const total = pool.size;
    const start = this.advance();
    if (total === 0) {
      return null;
    }

    // Scan from the cursor position so dead backends are skipped without
    // shifting the rotation of the live ones.
    for (let step = 0; step < total; step++) {
      const candidate = pool.at((start + step) % total);
      if (candidate?.isAlive()) {
        return candidate;
      }
    }

    return null;
  }

  /** Current cursor value; the next selection starts from it. */
  getCursor(): number {
    return this.cursor;
  }

  // Read-then-advance in one synchronous step, wrapping like an unsigned 32-bit counter.
  private advance(): number {
    const value = this.cursor;
    this.cursor = (this.cursor + 1) % UINT32_RANGE;
    return value;
  }
}
