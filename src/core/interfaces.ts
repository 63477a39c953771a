import type http from "node:http";
import type { Backend } from "../pool/backend";
import type { ServerPool } from "../pool/serverPool";
import type { Algorithm, HealthEvent, ProbeResult, RequestEvent, RequestOutcome } from "./models";

export interface ILoadBalancer {
  readonly name: Algorithm;
  selectBackend(pool: ServerPool): Backend | null;
}

export interface ISelector {
  selectBackend(pool: ServerPool, algorithm: Algorithm): Backend | null;
}

export interface IHealthProbe {
  probe(backend: Backend, path: string, timeoutMs: number, signal?: AbortSignal): Promise<ProbeResult>;
}

export interface IHealthChecker {
  checkHealth(backend: Backend): Promise<boolean>;
  runRound(): Promise<void>;
  startPeriodicChecks(): void;
  stop(): void;
}

export interface IProxyClient {
  /**
   * Streams `req` to `backend` and the upstream response back into `res`.
   * Resolves with the status code written to the client.
   */
  forward(req: http.IncomingMessage, res: http.ServerResponse, backend: Backend): Promise<number>;
}

export interface IRequestHandler {
  handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<RequestOutcome>;
}

/** Logging and metrics sinks. Implementations must not throw into the caller's path. */
export interface IEventReporter {
  reportRequest(event: RequestEvent): void;
  reportHealth(event: HealthEvent): void;
}

export interface IHttpServer {
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface ParsedUpstreamOptions {
  protocol: string;
  hostname: string;
  port: number;
  path: string;
  method: string;
}
