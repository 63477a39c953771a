import type http from "node:http";
import express, { type Express } from "express";
import type { IHttpServer } from "../core/interfaces";
import type { ServerPool } from "../pool/serverPool";
import type { MetricsCollector } from "./metricsCollector";

export function createMetricsApp(collector: MetricsCollector, pool: ServerPool): Express {
  const app = express();

  app.get("/metrics", (_req, res, next) => {
    collector
      .metrics()
      .then((body) => {
        res.set("Content-Type", collector.contentType);
        res.end(body);
      })
      .catch(next);
  });

  // 503 once the pool has nothing left to route to
  app.get("/healthz", (_req, res) => {
    const alive = pool.aliveCount();
    res.status(alive > 0 ? 200 : 503).json({
      status: alive > 0 ? "ok" : "unavailable",
      alive,
      total: pool.size,
    });
  });

  return app;
}

export class MetricsServer implements IHttpServer {
  private server?: http.Server;

  constructor(
    private port: number,
    private app: Express,
    private host: string = "0.0.0.0"
  ) { }

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        console.log(`📊 Metrics server running on http://${this.host}:${this.port}/metrics`);
        resolve();
      });
      server.once("error", reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    console.log("📊 Metrics server stopped");
  }
}
