import http from "node:http";
import https from "node:https";
import type { IHealthProbe } from "../core/interfaces";
import type { ProbeResult } from "../core/models";
import { errorMessage, parseUpstream } from "../core/utils";
import type { Backend } from "../pool/backend";

export class HttpHealthProbe implements IHealthProbe {
  private healthCheckAgent: http.Agent;
  private healthCheckHttpsAgent: https.Agent;

  constructor() {
    // Dedicated agents so probes never queue behind proxied traffic
    this.healthCheckAgent = new http.Agent({ keepAlive: true, keepAliveMsecs: 60000, maxSockets: 5, maxFreeSockets: 2 });
    this.healthCheckHttpsAgent = new https.Agent({ keepAlive: true, keepAliveMsecs: 60000, maxSockets: 5, maxFreeSockets: 2 });
  }

  /**
   * Issues `GET <backend><path>` and succeeds only on a 200 answer received
   * within `timeoutMs`. Never rejects: every failure is reported as `ok: false`.
   */
  async probe(backend: Backend, path: string, timeoutMs: number, signal?: AbortSignal): Promise<ProbeResult> {
    const startedAt = performance.now();
    const elapsed = () => Math.round(performance.now() - startedAt);

    try {
      const statusCode = await this.makeHealthCheckRequest(backend, path, timeoutMs, signal);
      const ok = statusCode === 200;
      return { ok, statusCode, latencyMs: elapsed() };
    } catch (error) {
      return { ok: false, latencyMs: elapsed(), error: errorMessage(error) };
    }
  }

  private makeHealthCheckRequest(
    backend: Backend,
    path: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<number | undefined> {
    const options = parseUpstream(backend.url, path);
    const useHttps = options.protocol === "https:";
    const requestModule = useHttps ? https : http;

    return new Promise<number | undefined>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new Error("Health check aborted"));
        return;
      }

      const req = requestModule.request({
        hostname: options.hostname,
        port: options.port,
        path: options.path,
        method: options.method,
        agent: useHttps ? this.healthCheckHttpsAgent : this.healthCheckAgent,
        signal,
      });

      // Hard deadline covering connect, headers and body; setTimeout on the
      // request only fires on socket inactivity.
      const deadline = setTimeout(() => {
        req.destroy(new Error(`Health check timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      req.on("response", (res) => {
        // Drain so the keep-alive socket returns to the agent
        res.resume();
        res.on("end", () => {
          clearTimeout(deadline);
          resolve(res.statusCode);
        });
        res.on("error", (err) => {
          clearTimeout(deadline);
          reject(err);
        });
      });

      req.on("error", (err) => {
        clearTimeout(deadline);
        reject(err);
      });

      req.end();
    });
  }

  // Cleanup method for graceful shutdown
  public destroy(): void {
    this.healthCheckAgent.destroy();
    this.healthCheckHttpsAgent.destroy();
  }
}
