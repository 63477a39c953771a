export const Algorithm = {
  ROUND_ROBIN: "roundrobin",
  LEAST_CONN: "leastconn",
  RANDOM: "random",
} as const;

export type Algorithm = (typeof Algorithm)[keyof typeof Algorithm];

export interface HealthCheckOptions {
  intervalMs: number;
  timeoutMs: number;
  path: string;
}

export interface ProbeResult {
  ok: boolean;
  latencyMs: number;
  statusCode?: number;
  error?: string;
}

export interface RequestEvent {
  clientAddr: string;
  method: string;
  path: string;
  /** Empty when no backend could be selected. */
  backendAddress: string;
  latencyMs: number;
  statusCode: number;
}

export interface HealthEvent {
  backendAddress: string;
  alive: boolean;
  latencyMs: number;
}

export interface RequestOutcome {
  backendAddress: string | null;
  statusCode: number;
  latencyMs: number;
}
