export class ProxyError extends Error {
  constructor(message: string, public statusCode: number = 500) {
    super(message);
    this.name = "ProxyError";
  }
}

export class InvalidBackendAddressError extends ProxyError {
  constructor(public address: string, reason: string) {
    super(`Invalid backend address "${address}": ${reason}`);
    this.name = "InvalidBackendAddressError";
  }
}

export class ConfigError extends ProxyError {
  constructor(message: string, public issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
  }
}

export class NoBackendAvailableError extends ProxyError {
  constructor() {
    super("Service unavailable", 503);
    this.name = "NoBackendAvailableError";
  }
}

export class UpstreamError extends ProxyError {
  constructor(backendAddress: string, originalError: Error) {
    super(`Upstream ${backendAddress} failed: ${originalError.message}`, 502);
    this.name = "UpstreamError";
  }
}

export class UpstreamTimeoutError extends ProxyError {
  constructor(backendAddress: string, timeoutMs: number) {
    super(`Upstream ${backendAddress} did not respond within ${timeoutMs}ms`, 504);
    this.name = "UpstreamTimeoutError";
  }
}

// 499 mirrors nginx's "client closed request".
export class ClientAbortedError extends ProxyError {
  constructor(backendAddress: string) {
    super(`Client closed the connection while forwarding to ${backendAddress}`, 499);
    this.name = "ClientAbortedError";
  }
}
