import { URL } from "node:url";
import { InvalidBackendAddressError } from "./errors";
import type { ParsedUpstreamOptions } from "./interfaces";

const SUPPORTED_PROTOCOLS = new Set(["http:", "https:"]);

/**
 * Parses a backend address into a URL. Addresses without a scheme are
 * treated as plain HTTP (`localhost:9000` -> `http://localhost:9000`).
 *
 * @throws InvalidBackendAddressError when the address cannot be used as an upstream
 */
export function parseBackendAddress(address: string): URL {
  const trimmed = address.trim();
  if (trimmed.length === 0) {
    throw new InvalidBackendAddressError(address, "address is empty");
  }

  const normalized = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `http://${trimmed}`;

  let url: URL;
  try {
    url = new URL(normalized);
  } catch {
    throw new InvalidBackendAddressError(address, "not a valid URL");
  }

  if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
    throw new InvalidBackendAddressError(address, `unsupported protocol ${url.protocol}`);
  }
  if (!url.hostname) {
    throw new InvalidBackendAddressError(address, "missing host");
  }

  return url;
}

export function parseUpstream(
  upstream: URL,
  path: string,
  method: string = "GET"
): ParsedUpstreamOptions {
  return {
    protocol: upstream.protocol,
    hostname: upstream.hostname,
    port: upstream.port ? parseInt(upstream.port, 10) : upstream.protocol === "https:" ? 443 : 80,
    path: joinPath(upstream.pathname, path),
    method,
  };
}

// Backends may be mounted under a prefix, e.g. http://host:9000/api.
function joinPath(basePath: string, path: string): string {
  const base = basePath.endsWith("/") ? basePath.slice(0, -1) : basePath;
  const suffix = path.startsWith("/") ? path : `/${path}`;
  return `${base}${suffix}`;
}

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Converts `"5s"`, `"250ms"`, `"1m30s"` or a bare millisecond count into milliseconds.
 * Returns null for anything else.
 */
export function parseDuration(value: string | number): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }

  const input = value.trim();
  if (/^\d+$/.test(input)) {
    return parseInt(input, 10);
  }

  const pattern = /(\d+(?:\.\d+)?)(ms|s|m|h)/gy;
  let total = 0;
  let consumed = 0;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(input)) !== null) {
    total += parseFloat(match[1]) * DURATION_UNITS[match[2]];
    consumed = pattern.lastIndex;
  }

  if (consumed === 0 || consumed !== input.length) {
    return null;
  }
  return Math.round(total);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
