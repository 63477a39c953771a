import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { type RootConfig, rootConfigSchema } from "../schemas/config-schema";
import { ConfigError } from "./errors";
import type { HealthCheckOptions } from "./models";
import { errorMessage } from "./utils";

export async function parseYAMLConfig(filepath: string): Promise<unknown> {
  let contents: string;
  try {
    contents = await readFile(filepath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filepath}: ${errorMessage(error)}`);
  }
  return parseYAMLString(contents);
}

export function parseYAMLString(contents: string): unknown {
  try {
    return parse(contents);
  } catch (error) {
    throw new ConfigError(`Invalid config YAML: ${errorMessage(error)}`);
  }
}

export async function validateConfig(config: unknown): Promise<RootConfig> {
  const result = await rootConfigSchema.safeParseAsync(config ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError("Invalid configuration", issues);
  }
  return result.data;
}

export function healthCheckOptions(config: RootConfig): HealthCheckOptions {
  return {
    intervalMs: config.health_check.interval,
    timeoutMs: config.health_check.timeout,
    path: config.health_check.path,
  };
}
