import http from "node:http";
import https from "node:https";
import { ClientAbortedError, ProxyError, UpstreamError, UpstreamTimeoutError } from "../core/errors";
import type { IProxyClient } from "../core/interfaces";
import { parseUpstream } from "../core/utils";
import type { Backend } from "../pool/backend";

// RFC 7230 §6.1 hop-by-hop headers; never forwarded in either direction.
const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
]);

export interface HttpProxyClientOptions {
  /** Socket inactivity limit for an upstream request. */
  timeoutMs?: number;
}

export class HttpProxyClient implements IProxyClient {
  private httpAgent: http.Agent;
  private httpsAgent: https.Agent;
  private timeoutMs: number;

  constructor(options: HttpProxyClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;

    // Connection pooling per upstream
    this.httpAgent = new http.Agent({
      keepAlive: true,
      keepAliveMsecs: 30000,
      maxSockets: 50,
      maxFreeSockets: 10,
      scheduling: "fifo",
    });

    this.httpsAgent = new https.Agent({
      keepAlive: true,
      keepAliveMsecs: 30000,
      maxSockets: 50,
      maxFreeSockets: 10,
      scheduling: "fifo",
    });
  }

  /**
   * Streams the client request to the backend and the backend's response,
   * status included, back to the client.
   *
   * Resolves once the response has been fully written. Rejects with
   * {@link UpstreamError} or {@link UpstreamTimeoutError} when the backend
   * fails, and with {@link ClientAbortedError} when the client goes away
   * first; the upstream request is torn down in every failure case.
   */
  forward(req: http.IncomingMessage, res: http.ServerResponse, backend: Backend): Promise<number> {
    const options = parseUpstream(backend.url, req.url || "/", req.method || "GET");
    const useHttps = options.protocol === "https:";
    const requestModule = useHttps ? https : http;

    return new Promise<number>((resolve, reject) => {
      let settled = false;
      const succeed = (statusCode: number) => {
        if (settled) return;
        settled = true;
        resolve(statusCode);
      };
      const fail = (error: ProxyError) => {
        if (settled) return;
        settled = true;
        reject(error);
      };

      const upstreamReq = requestModule.request({
        hostname: options.hostname,
        port: options.port,
        path: options.path,
        method: options.method,
        headers: this.buildRequestHeaders(req, backend),
        agent: useHttps ? this.httpsAgent : this.httpAgent,
      });

      upstreamReq.setTimeout(this.timeoutMs, () => {
        upstreamReq.destroy(new UpstreamTimeoutError(backend.address, this.timeoutMs));
      });

      upstreamReq.on("response", (upstreamRes) => {
        if (res.destroyed) {
          upstreamRes.resume();
          return;
        }

        res.writeHead(upstreamRes.statusCode ?? 502, this.stripHopByHop(upstreamRes.headers));
        upstreamRes.pipe(res);

        upstreamRes.on("error", (err) => {
          res.destroy();
          fail(new UpstreamError(backend.address, err));
        });
      });

      upstreamReq.on("error", (err) => {
        fail(err instanceof ProxyError ? err : new UpstreamError(backend.address, err));
      });

      res.on("finish", () => succeed(res.statusCode));

      res.on("close", () => {
        if (res.writableFinished) return;
        upstreamReq.destroy();
        fail(new ClientAbortedError(backend.address));
      });

      req.pipe(upstreamReq);
    });
  }

  private buildRequestHeaders(req: http.IncomingMessage, backend: Backend): http.OutgoingHttpHeaders {
    const headers: http.OutgoingHttpHeaders = {};
    for (const [name, value] of Object.entries(req.headers)) {
      if (value === undefined || HOP_BY_HOP_HEADERS.has(name)) continue;
      headers[name] = value;
    }

    const clientAddr = req.socket.remoteAddress;
    const priorForwardedFor = req.headers["x-forwarded-for"];
    if (clientAddr) {
      headers["x-forwarded-for"] = priorForwardedFor ? `${priorForwardedFor}, ${clientAddr}` : clientAddr;
    }
    if (req.headers.host) {
      headers["x-forwarded-host"] = req.headers.host;
    }
    headers.host = backend.url.host;

    return headers;
  }

  private stripHopByHop(headers: http.IncomingHttpHeaders): http.OutgoingHttpHeaders {
    const result: http.OutgoingHttpHeaders = {};
    for (const [name, value] of Object.entries(headers)) {
      if (value === undefined || HOP_BY_HOP_HEADERS.has(name)) continue;
      result[name] = value;
    }
    return result;
  }

  // Graceful shutdown - destroy all connections
  public destroy(): void {
    console.log("🔗 Destroying connection pools...");
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
