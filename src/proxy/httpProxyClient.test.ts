import http from "node:http";
import request from "supertest";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { ClientAbortedError, UpstreamError, UpstreamTimeoutError } from "../core/errors";
import { Backend } from "../pool/backend";
import { close, listen } from "../testing/httpTestServer";
import { HttpProxyClient } from "./httpProxyClient";

interface Echo {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

describe("HttpProxyClient", () => {
  let upstream: http.Server;
  let upstreamPort: number;
  let upstreamHits: number;

  let front: http.Server;
  let frontUrl: string;
  let backend: Backend;
  let client: HttpProxyClient;
  let settled: Array<number | Error>;

  beforeAll(async () => {
    upstream = http.createServer((req, res) => {
      upstreamHits++;
      if (req.url?.endsWith("/hang")) return;

      const chunks: Buffer[] = [];
      req.on("data", (chunk: Buffer) => chunks.push(chunk));
      req.on("end", () => {
        const echo: Echo = {
          method: req.method ?? "",
          url: req.url ?? "",
          headers: req.headers,
          body: Buffer.concat(chunks).toString("utf8"),
        };
        res.writeHead(req.url?.endsWith("/missing") ? 404 : 207, {
          "Content-Type": "application/json",
          "X-Upstream": "yes",
        });
        res.end(JSON.stringify(echo));
      });
    });
    upstreamPort = await listen(upstream);
  });

  afterAll(async () => {
    await close(upstream);
  });

  async function startFront(target: Backend, proxyClient: HttpProxyClient): Promise<void> {
    front = http.createServer((req, res) => {
      proxyClient.forward(req, res, target).then(
        (statusCode) => settled.push(statusCode),
        (error: Error) => {
          settled.push(error);
          if (!res.headersSent && !res.destroyed) {
            res.writeHead(502);
            res.end("failed");
          }
        }
      );
    });
    frontUrl = `http://127.0.0.1:${await listen(front)}`;
  }

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    upstreamHits = 0;
    settled = [];
    backend = new Backend(`http://127.0.0.1:${upstreamPort}`);
    client = new HttpProxyClient();
    await startFront(backend, client);
  });

  afterEach(async () => {
    client.destroy();
    await close(front);
    vi.restoreAllMocks();
  });

  it("relays the method, path, body and status", async () => {
    const res = await request(frontUrl).put("/items/7?full=1").set("Content-Type", "text/plain").send("widget");

    expect(res.status).toBe(207);
    expect(res.headers["x-upstream"]).toBe("yes");
    const echo: Echo = JSON.parse(res.text);
    expect(echo.method).toBe("PUT");
    expect(echo.url).toBe("/items/7?full=1");
    expect(echo.body).toBe("widget");
    await vi.waitFor(() => expect(settled).toEqual([207]));
  });

  it("passes non-success statuses through untouched", async () => {
    const res = await request(frontUrl).get("/missing");

    expect(res.status).toBe(404);
    await vi.waitFor(() => expect(settled).toEqual([404]));
  });

  it("rewrites host and adds forwarding headers", async () => {
    const res = await request(frontUrl)
      .get("/")
      .set("X-Forwarded-For", "10.0.0.1")
      .set("X-Request-Id", "req-1")
      .set("Proxy-Authorization", "Basic test-secret");

    const echo: Echo = JSON.parse(res.text);
    expect(echo.headers.host).toBe(`127.0.0.1:${upstreamPort}`);
    expect(echo.headers["x-forwarded-host"]).toBe(frontUrl.slice("http://".length));
    expect(echo.headers["x-forwarded-for"]).toBe("10.0.0.1, 127.0.0.1");
    expect(echo.headers["x-request-id"]).toBe("req-1");
    expect(echo.headers["proxy-authorization"]).toBeUndefined();
  });

  it("prefixes the backend's base path", async () => {
    client.destroy();
    await close(front);
    client = new HttpProxyClient();
    await startFront(new Backend(`http://127.0.0.1:${upstreamPort}/api/`), client);

    const res = await request(frontUrl).get("/users?page=2");

    const echo: Echo = JSON.parse(res.text);
    expect(echo.url).toBe("/api/users?page=2");
  });

  it("rejects with an upstream error when the backend refuses connections", async () => {
    const closed = http.createServer();
    const deadPort = await listen(closed);
    await close(closed);

    client.destroy();
    await close(front);
    client = new HttpProxyClient();
    await startFront(new Backend(`http://127.0.0.1:${deadPort}`), client);

    const res = await request(frontUrl).get("/");

    expect(res.status).toBe(502);
    expect(settled).toHaveLength(1);
    const [error] = settled;
    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ statusCode: 502 });
  });

  it("rejects with a timeout error when the backend stalls", async () => {
    client.destroy();
    await close(front);
    client = new HttpProxyClient({ timeoutMs: 100 });
    await startFront(backend, client);

    await request(frontUrl).get("/hang");

    const [error] = settled;
    expect(error).toBeInstanceOf(UpstreamTimeoutError);
    expect(error).toMatchObject({
      statusCode: 504,
      message: `Upstream ${backend.address} did not respond within 100ms`,
    });
  });

  it("rejects with a client-aborted error when the caller disconnects", async () => {
    const caller = http.get(`${frontUrl}/hang`);
    caller.on("error", () => undefined);

    await vi.waitFor(() => expect(upstreamHits).toBe(1));
    caller.destroy();

    await vi.waitFor(() => expect(settled).toHaveLength(1));
    const [error] = settled;
    expect(error).toBeInstanceOf(ClientAbortedError);
    expect(error).toMatchObject({ statusCode: 499 });
  });
});
