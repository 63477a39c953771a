import type http from "node:http";
import { ClientAbortedError, NoBackendAvailableError, ProxyError } from "../core/errors";
import type { IEventReporter, IProxyClient, IRequestHandler, ISelector } from "../core/interfaces";
import type { Algorithm, RequestEvent, RequestOutcome } from "../core/models";
import { errorMessage } from "../core/utils";
import type { Backend } from "../pool/backend";
import type { ServerPool } from "../pool/serverPool";

export class ProxyRequestHandler implements IRequestHandler {
  constructor(
    private pool: ServerPool,
    private selector: ISelector,
    private algorithm: Algorithm,
    private proxyClient: IProxyClient,
    private reporters: IEventReporter[] = []
  ) { }

  /**
   * Picks a live backend and forwards the request to it. Answers 503 when
   * nothing is alive. A failed forward is reported as-is: there is no retry
   * on another backend.
   */
  async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<RequestOutcome> {
    const startedAt = performance.now();

    const target = this.selector.selectBackend(this.pool, this.algorithm);
    if (!target) {
      const error = new NoBackendAvailableError();
      console.error(`⚖️ No alive backends for ${req.method} ${req.url}`);
      this.sendError(res, error.statusCode, error.message);
      return this.complete(req, null, error.statusCode, startedAt);
    }

    target.recordStart();
    let statusCode: number;
    try {
      statusCode = await this.proxyClient.forward(req, res, target);
    } catch (error) {
      statusCode = this.handleForwardError(res, target, error);
    } finally {
      target.recordEnd();
    }

    return this.complete(req, target, statusCode, startedAt);
  }

  getAlgorithm(): Algorithm {
    return this.algorithm;
  }

  private handleForwardError(res: http.ServerResponse, target: Backend, error: unknown): number {
    if (error instanceof ClientAbortedError) {
      return error.statusCode;
    }

    const statusCode = error instanceof ProxyError ? error.statusCode : 502;
    console.error(`⚖️ Request to backend ${target.address} failed: ${errorMessage(error)}`);

    if (res.headersSent) {
      // Status already went out; cut the body short so the client sees the failure
      res.destroy();
    } else {
      this.sendError(res, statusCode, statusCode === 504 ? "Gateway timeout" : "Bad gateway");
    }
    return statusCode;
  }

  private sendError(res: http.ServerResponse, statusCode: number, message: string): void {
    if (!res.headersSent && !res.destroyed) {
      res.writeHead(statusCode, { "Content-Type": "text/plain" });
      res.end(message);
    }
  }

  private complete(
    req: http.IncomingMessage,
    target: Backend | null,
    statusCode: number,
    startedAt: number
  ): RequestOutcome {
    const latencyMs = Math.round(performance.now() - startedAt);
    const backendAddress = target?.address ?? "";

    this.report({
      clientAddr: req.socket.remoteAddress ?? "unknown",
      method: req.method ?? "GET",
      path: this.pathOf(req),
      backendAddress,
      latencyMs,
      statusCode,
    });

    return { backendAddress: target?.address ?? null, statusCode, latencyMs };
  }

  private pathOf(req: http.IncomingMessage): string {
    const url = req.url || "/";
    const queryStart = url.indexOf("?");
    return queryStart === -1 ? url : url.slice(0, queryStart);
  }

  private report(event: RequestEvent): void {
    for (const reporter of this.reporters) {
      try {
        reporter.reportRequest(event);
      } catch (error) {
        console.error(`⚖️ Request event reporter failed: ${errorMessage(error)}`);
      }
    }
  }
}
