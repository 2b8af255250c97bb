export class StressError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The target never answered the startup probe. */
export class ConnectivityError extends StressError {
  serverUri: string;
  attempts: number;

  constructor(serverUri: string, attempts: number, cause?: unknown) {
    super(`Could not connect to ${serverUri} after ${attempts} attempts`, { cause });
    this.serverUri = serverUri;
    this.attempts = attempts;
  }
}

export class ClientAlreadyRunningError extends StressError {
  constructor() {
    super('Stress client already running');
  }
}

export class ClientDisposedError extends StressError {
  constructor() {
    super('Stress client has been stopped and cannot be restarted');
  }
}

export class ConfigError extends StressError {
  option: string;

  constructor(option: string, message: string) {
    super(`Invalid ${option}: ${message}`);
    this.option = option;
  }
}

export class HttpStatusError extends StressError {
  statusCode: number;
  method: string;
  path: string;

  constructor(method: string, path: string, statusCode: number) {
    super(`${method} ${path} returned ${statusCode}`);
    this.statusCode = statusCode;
    this.method = method;
    this.path = path;
  }
}

/** Abort reason for a request that outlived the per-request timeout. */
export class RequestTimeoutError extends StressError {
  timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}
