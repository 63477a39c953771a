import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { ConsoleEventLogger } from "./consoleEventLogger";

describe("ConsoleEventLogger", () => {
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    log = vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints one line per request", () => {
    new ConsoleEventLogger().reportRequest({
      clientAddr: "10.0.0.5",
      method: "GET",
      path: "/users",
      backendAddress: "http://localhost:9001",
      latencyMs: 8,
      statusCode: 200,
    });

    expect(log).toHaveBeenCalledWith("🌐 10.0.0.5 GET /users -> http://localhost:9001 [200] 8ms");
  });

  it("shows none when no backend served the request", () => {
    new ConsoleEventLogger().reportRequest({
      clientAddr: "10.0.0.5",
      method: "GET",
      path: "/",
      backendAddress: "",
      latencyMs: 0,
      statusCode: 503,
    });

    expect(log).toHaveBeenCalledWith("🌐 10.0.0.5 GET / -> none [503] 0ms");
  });

  it("prints health only when liveness changes", () => {
    const logger = new ConsoleEventLogger();
    const address = "http://localhost:9000";

    logger.reportHealth({ backendAddress: address, alive: true, latencyMs: 3 });
    logger.reportHealth({ backendAddress: address, alive: true, latencyMs: 4 });
    logger.reportHealth({ backendAddress: address, alive: false, latencyMs: 2000 });

    expect(log.mock.calls.map(([line]) => line)).toEqual([
      `🔍 ${address} ✅ healthy (3ms)`,
      `🔍 ${address} ❌ unhealthy (2000ms)`,
    ]);
  });

  it("prints every probe when verbose", () => {
    const logger = new ConsoleEventLogger({ verboseHealth: true });

    logger.reportHealth({ backendAddress: "http://a:1", alive: true, latencyMs: 1 });
    logger.reportHealth({ backendAddress: "http://a:1", alive: true, latencyMs: 1 });

    expect(log).toHaveBeenCalledTimes(2);
  });
});
