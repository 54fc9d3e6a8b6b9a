/**
 * Base class of every failure the control plane raises on purpose. The HTTP
 * layer maps subclasses to status codes; anything else is a 500.
 */
export abstract class ControlPlaneError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or unsupported configuration. Never retried. */
export class ConfigError extends ControlPlaneError {}

export class SecretResolutionError extends ConfigError {}

export class AuthError extends ControlPlaneError {
  public readonly details?: unknown;

  public constructor(message: string, options: ErrorOptions & { details?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.details = options.details;
  }
}

export class GraphRequestError extends ControlPlaneError {
  public readonly statusCode: number;
  public readonly body: string;
  public readonly code?: string;
  public readonly requestId?: string;

  public constructor(
    message: string,
    details: { statusCode: number; body: string; code?: string; requestId?: string } & ErrorOptions,
  ) {
    super(message, { cause: details.cause });
    this.statusCode = details.statusCode;
    this.body = details.body;
    this.code = details.code;
    this.requestId = details.requestId;
  }
}

export class RetryExhaustedError extends ControlPlaneError {
  public constructor(
    public readonly url: string,
    public readonly attempts: number,
    public readonly lastStatus: number,
  ) {
    super(`Gave up on ${url} after ${attempts} attempts (last status ${lastStatus})`);
  }
}

export class NotFoundError extends ControlPlaneError {
  public constructor(public readonly tenantId: string) {
    super(`Tenant ${tenantId} is not configured`);
  }
}
