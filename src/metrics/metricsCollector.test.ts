import { beforeEach, describe, expect, it } from "vitest";
import { Algorithm, type RequestEvent } from "../core/models";
import { ServerPool } from "../pool/serverPool";
import { MetricsCollector } from "./metricsCollector";

const A = "http://a:9000";
const B = "http://b:9001";

function labelValue(labels: object, name: string): unknown {
  return Object.entries(labels).find(([key]) => key === name)?.[1];
}

function served(backendAddress: string, statusCode: number, latencyMs: number): RequestEvent {
  return { clientAddr: "127.0.0.1", method: "GET", path: "/", backendAddress, statusCode, latencyMs };
}

describe("MetricsCollector", () => {
  let pool: ServerPool;
  let collector: MetricsCollector;

  beforeEach(() => {
    pool = ServerPool.fromAddresses([A, B]);
    collector = new MetricsCollector(pool, Algorithm.LEAST_CONN);
  });

  it("counts requests by backend, algorithm and status", async () => {
    collector.reportRequest(served(A, 200, 5));
    collector.reportRequest(served(A, 200, 7));
    collector.reportRequest(served(A, 502, 30));
    collector.reportRequest(served(B, 200, 1));

    const { values } = await collector.requestsTotal.get();
    expect(values.map(({ labels, value }) => [labels, value])).toEqual([
      [{ backend: A, algorithm: "leastconn", status: "200" }, 2],
      [{ backend: A, algorithm: "leastconn", status: "502" }, 1],
      [{ backend: B, algorithm: "leastconn", status: "200" }, 1],
    ]);
  });

  it("records nothing for requests no backend served", async () => {
    collector.reportRequest(served("", 503, 0));

    expect((await collector.requestsTotal.get()).values).toEqual([]);
    expect((await collector.responseDuration.get()).values).toEqual([]);
  });

  it("observes response times in seconds", async () => {
    for (const latency of [5, 10, 60, 20000]) {
      collector.reportRequest(served(A, 200, latency));
    }

    const { values } = await collector.responseDuration.get();
    const buckets = values
      .filter((v) => v.metricName === "lb_response_duration_seconds_bucket")
      .map((v) => [labelValue(v.labels, "le"), v.value]);
    expect(buckets).toEqual([
      [0.01, 2],
      [0.05, 2],
      [0.1, 3],
      [0.25, 3],
      [0.5, 3],
      [1, 3],
      [2.5, 3],
      [5, 3],
      [10, 3],
      ["+Inf", 4],
    ]);
    expect(values.find((v) => v.metricName === "lb_response_duration_seconds_count")?.value).toBe(4);
    expect(values.find((v) => v.metricName === "lb_response_duration_seconds_sum")?.value).toBeCloseTo(20.075);
  });

  it("sets the health gauge from the latest probe", async () => {
    collector.reportHealth({ backendAddress: B, alive: true, latencyMs: 3 });
    collector.reportHealth({ backendAddress: B, alive: false, latencyMs: 2000 });
    collector.reportHealth({ backendAddress: A, alive: true, latencyMs: 3 });

    const { values } = await collector.backendHealth.get();
    expect(values.map(({ labels, value }) => [labels.backend, value])).toEqual([
      [B, 0],
      [A, 1],
    ]);
  });

  it("reads active connections from the pool at scrape time", async () => {
    pool.at(0)?.recordStart();
    pool.at(0)?.recordStart();
    pool.at(1)?.recordStart();
    pool.at(1)?.recordEnd();

    const { values } = await collector.activeConnections.get();
    expect(values.map(({ labels, value }) => [labels.backend, value])).toEqual([
      [A, 2],
      [B, 0],
    ]);
  });

  it("renders the Prometheus text format", async () => {
    collector.reportRequest(served(A, 200, 5));

    const lines = (await collector.metrics()).split("\n");

    expect(lines).toContain("# TYPE lb_requests_total counter");
    expect(lines).toContain(`lb_requests_total{backend="${A}",algorithm="leastconn",status="200"} 1`);
    expect(lines).toContain("# TYPE lb_response_duration_seconds histogram");
    expect(lines).toContain(`lb_active_connections{backend="${B}"} 0`);
    expect(collector.contentType).toMatch(/^text\/plain/);
  });
});
