import http from "node:http";
import type { IHttpServer, IRequestHandler } from "../core/interfaces";
import { errorMessage } from "../core/utils";

export class HttpServer implements IHttpServer {
  private httpServer?: http.Server;

  constructor(
    private port: number,
    private requestHandler: IRequestHandler,
    private host: string = "0.0.0.0"
  ) { }

  async start(): Promise<void> {
    const server = this.createServer();
    this.httpServer = server;

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.port, this.host, () => {
        server.off("error", reject);
        console.log(`🌐 Load balancer running on http://${this.host}:${this.port}`);
        resolve();
      });
    });
  }

  /** Every path is proxied; the server exposes no endpoints of its own. */
  createServer(): http.Server {
    return http.createServer((req, res) => {
      this.requestHandler.handleRequest(req, res).catch((error) => {
        console.error(`🌐 Error handling request: ${errorMessage(error)}`);
        this.sendErrorResponse(res, 500, "Internal server error");
      });
    });
  }

  private sendErrorResponse(res: http.ServerResponse, statusCode: number, message: string): void {
    if (!res.headersSent && !res.destroyed) {
      res.writeHead(statusCode, { "Content-Type": "text/plain" });
      res.end(message);
    }
  }

  getAddress(): string | null {
    const address = this.httpServer?.address();
    if (!address || typeof address === "string") return address ?? null;
    return `${address.address}:${address.port}`;
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    this.httpServer = undefined;

    await new Promise<void>((resolve) => {
      server.close(() => {
        console.log("🌐 HTTP server stopped");
        resolve();
      });
      server.closeIdleConnections();
    });
  }
}
