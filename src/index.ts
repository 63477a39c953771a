#!/usr/bin/env node
import { Command } from "commander";
import { parseYAMLConfig, validateConfig } from "./core/config";
import { errorMessage } from "./core/utils";
import { type ProxyService, ProxyServiceFactory } from "./factory/proxyServiceFactory";
import type { RootConfig } from "./schemas/config-schema";

export interface CliOptions {
  config: string;
  port?: string;
  algorithm?: string;
}

export async function createServer(config: RootConfig): Promise<ProxyService> {
  const service = ProxyServiceFactory.create(config);
  await service.start();
  return service;
}

export async function loadConfig(options: CliOptions): Promise<RootConfig> {
  const parsedConfig = await parseYAMLConfig(options.config);
  const validatedConfig = await validateConfig(parsedConfig);

  // CLI flags win over the file; re-validate so overrides get the same checks
  return validateConfig({
    ...validatedConfig,
    server: { ...validatedConfig.server, ...(options.port !== undefined ? { port: options.port } : {}) },
    ...(options.algorithm !== undefined ? { algorithm: options.algorithm } : {}),
  });
}

export function buildProgram(): Command {
  return new Command()
    .name("pool-balancer")
    .description("HTTP load balancer with health-checked backends")
    .requiredOption("-c, --config <path>", "path to the YAML config file")
    .option("-p, --port <port>", "override server.port")
    .option("-a, --algorithm <name>", "override algorithm (roundrobin, leastconn, random)");
}

async function main(): Promise<void> {
  const program = buildProgram();
  program.parse();

  const config = await loadConfig(program.opts<CliOptions>());
  const service = await createServer(config);

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`🏭 Received ${signal}, shutting down...`);
    service
      .stop()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error(`🏭 Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

if (require.main === module) {
  main().catch((error) => {
    console.error(`❌ ${errorMessage(error)}`);
    process.exit(1);
  });
}
