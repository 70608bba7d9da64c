import { ZodError } from 'zod';

export type ErrorKind =
  | 'InvalidArguments'
  | 'Authentication'
  | 'RateLimit'
  | 'Upstream'
  | 'Network'
  | 'NotFound'
  | 'InvalidRequest'
  | 'UnknownTool'
  | 'Cancelled'
  | 'Internal';

export interface ErrorEnvelope {
  kind: ErrorKind;
  message: string;
  detail?: string;
}

export abstract class GatewayError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    public readonly detail?: string,
  ) {
    super(message);
  }
}

export class InvalidArgumentsError extends GatewayError {
  readonly kind = 'InvalidArguments';

  constructor(message: string, detail?: string) {
    super(message, detail);
    this.name = 'InvalidArgumentsError';
  }

  static fromZod(error: ZodError): InvalidArgumentsError {
    const problems = error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : '(arguments)';
      return `${field}: ${issue.message}`;
    });
    return new InvalidArgumentsError(`Invalid arguments: ${problems.join('; ')}`);
  }
}

export class AuthenticationError extends GatewayError {
  readonly kind = 'Authentication';

  constructor(message: string, detail?: string) {
    super(message, detail);
    this.name = 'AuthenticationError';
  }
}

export class RateLimitError extends GatewayError {
  readonly kind = 'RateLimit';

  constructor(
    public readonly retryAfterMs: number,
    detail?: string,
  ) {
    super(`Rate limited by TickTick. Retry after ${Math.ceil(retryAfterMs / 1000)} seconds.`, detail);
    this.name = 'RateLimitError';
  }
}

export class UpstreamError extends GatewayError {
  readonly kind = 'Upstream';

  constructor(
    message: string,
    public readonly status?: number,
    detail?: string,
  ) {
    super(status === undefined ? message : `TickTick API error (${status}): ${message}`, detail);
    this.name = 'UpstreamError';
  }
}

export class NetworkError extends GatewayError {
  readonly kind = 'Network';

  constructor(message: string, detail?: string) {
    super(message, detail);
    this.name = 'NetworkError';
  }
}

export class NotFoundError extends GatewayError {
  readonly kind = 'NotFound';

  constructor(resource: string, detail?: string) {
    super(`Not found: ${resource}`, detail);
    this.name = 'NotFoundError';
  }
}

export class InvalidRequestError extends GatewayError {
  readonly kind = 'InvalidRequest';

  constructor(
    public readonly status: number,
    detail?: string,
  ) {
    super(`TickTick rejected the request (${status})`, detail);
    this.name = 'InvalidRequestError';
  }
}

export class UnknownToolError extends GatewayError {
  readonly kind = 'UnknownTool';

  constructor(public readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

export class CancelledError extends GatewayError {
  readonly kind = 'Cancelled';

  constructor(message = 'Request was cancelled.') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function isAbortError(e: unknown): boolean {
  return e instanceof Error && (e.name === 'AbortError' || e.name === 'TimeoutError');
}

export function toErrorEnvelope(e: unknown): ErrorEnvelope {
  if (e instanceof GatewayError) {
    return e.detail === undefined
      ? { kind: e.kind, message: e.message }
      : { kind: e.kind, message: e.message, detail: e.detail };
  }
  if (e instanceof ZodError) {
    return toErrorEnvelope(InvalidArgumentsError.fromZod(e));
  }
  if (e instanceof Error && e.name === 'TimeoutError') {
    return { kind: 'Network', message: 'Request timed out. Try again.' };
  }
  if (e instanceof Error && e.name === 'AbortError') {
    return { kind: 'Cancelled', message: 'Request was cancelled.' };
  }
  if (e instanceof Error) {
    return { kind: 'Internal', message: `Unexpected error: ${e.message}` };
  }
  return { kind: 'Internal', message: `Unexpected error: ${String(e)}` };
}
