import { healthCheckOptions } from "../core/config";
import type { IEventReporter, IHealthProbe, IProxyClient } from "../core/interfaces";
import type { Algorithm } from "../core/models";
import { errorMessage } from "../core/utils";
import { ProxyRequestHandler } from "../handlers/proxyRequestHandler";
import { HttpHealthChecker } from "../health/httpHealthChecker";
import { HttpHealthProbe } from "../health/httpHealthProbe";
import { BackendSelector, isKnownAlgorithm, parseAlgorithm } from "../loadbalancing/selector";
import { ConsoleEventLogger } from "../logging/consoleEventLogger";
import { SqliteEventStore } from "../logging/sqliteEventStore";
import { MetricsCollector } from "../metrics/metricsCollector";
import { createMetricsApp, MetricsServer } from "../metrics/metricsServer";
import { ServerPool } from "../pool/serverPool";
import { HttpProxyClient } from "../proxy/httpProxyClient";
import type { RootConfig } from "../schemas/config-schema";
import { HttpServer } from "../server/httpServer";

export interface ProxyService {
  pool: ServerPool;
  algorithm: Algorithm;
  requestHandler: ProxyRequestHandler;
  healthChecker: HttpHealthChecker;
  metrics: MetricsCollector;
  httpServer: HttpServer;
  metricsServer: MetricsServer | null;
  eventStore: SqliteEventStore | null;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface ProxyServiceOverrides {
  proxyClient?: IProxyClient;
  healthProbe?: IHealthProbe;
  eventStore?: SqliteEventStore | null;
}

export class ProxyServiceFactory {
  /** Resolves the configured algorithm name, warning when it falls back to random. */
  static resolveAlgorithm(name: string): Algorithm {
    const algorithm = parseAlgorithm(name);
    if (!isKnownAlgorithm(name)) {
      console.warn(`⚖️ Unknown algorithm "${name}", falling back to ${algorithm}`);
    }
    return algorithm;
  }

  /**
   * Wires the pool, selector, health checker and dispatcher from a validated
   * config. Throws InvalidBackendAddressError for a malformed backend.
   */
  static create(config: RootConfig, overrides: ProxyServiceOverrides = {}): ProxyService {
    const pool = ServerPool.fromAddresses(config.backends);
    const algorithm = this.resolveAlgorithm(config.algorithm);

    const metrics = new MetricsCollector(pool, algorithm);
    const eventStore = overrides.eventStore !== undefined
      ? overrides.eventStore
      : config.logging.database
        ? SqliteEventStore.open(config.logging.database)
        : null;

    const reporters: IEventReporter[] = [new ConsoleEventLogger(), metrics];
    if (eventStore) reporters.push(eventStore);

    // Agents open no sockets until used, so unused defaults cost nothing
    const ownedProbe = new HttpHealthProbe();
    const ownedProxyClient = new HttpProxyClient();
    const healthProbe = overrides.healthProbe ?? ownedProbe;
    const proxyClient = overrides.proxyClient ?? ownedProxyClient;

    const healthChecker = new HttpHealthChecker(pool, healthProbe, reporters, healthCheckOptions(config));
    const requestHandler = new ProxyRequestHandler(pool, new BackendSelector(), algorithm, proxyClient, reporters);
    const httpServer = new HttpServer(config.server.port, requestHandler, config.server.host);
    const metricsServer = config.metrics.enabled
      ? new MetricsServer(config.metrics.port, createMetricsApp(metrics, pool), config.server.host)
      : null;

    return {
      pool,
      algorithm,
      requestHandler,
      healthChecker,
      metrics,
      httpServer,
      metricsServer,
      eventStore,

      async start() {
        console.log(`⚖️ Balancing ${pool.size} backends with ${algorithm}`);
        healthChecker.startPeriodicChecks();
        await httpServer.start();
        if (metricsServer) {
          await metricsServer.start();
        }
      },

      async stop() {
        healthChecker.stop();
        const results = await Promise.allSettled([
          httpServer.stop(),
          metricsServer ? metricsServer.stop() : Promise.resolve(),
        ]);
        for (const result of results) {
          if (result.status === "rejected") {
            console.error(`🏭 Shutdown error: ${errorMessage(result.reason)}`);
          }
        }
        ownedProbe.destroy();
        ownedProxyClient.destroy();
        eventStore?.close();
      },
    };
  }
}
