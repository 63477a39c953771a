import type { ILoadBalancer } from "../core/interfaces";
import { Algorithm } from "../core/models";
import type { Backend } from "../pool/backend";
import type { ServerPool } from "../pool/serverPool";

export class LeastConnectionsLoadBalancer implements ILoadBalancer {
  readonly name = Algorithm.LEAST_CONN;

  selectBackend(pool: ServerPool): Backend | null {
    let selected: Backend | null = null;
    let minConnections = Number.POSITIVE_INFINITY;

    // Strict less-than keeps the first backend in pool order on ties.
    for (const backend of pool) {
      if (!backend.isAlive()) continue;

      const connections = backend.getActiveConnections();
      if (connections < minConnections) {
        selected = backend;
        minConnections = connections;
      }
    }

    return selected;
  }
}
