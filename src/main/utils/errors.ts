import type { Response } from 'express';
import type { Logger } from 'pino';
import type { BackendName } from '../types/models/Backend';
import type { SectionError } from '../types/models/Dashboard';

export type AuthErrorKind = 'Expired' | 'Malformed' | 'Invalid';
export type AuthzErrorKind = 'Forbidden' | 'NoActiveOrganization';
export type ProxyErrorKind = 'Timeout' | 'Unreachable' | 'BackendError' | 'TrustRejected';

export class GatewayError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message, code: this.code };
  }
}

export class AuthError extends GatewayError {
  readonly kind: AuthErrorKind;

  constructor(kind: AuthErrorKind, message: string) {
    super(message, 401, kind);
    this.kind = kind;
  }
}

export class AuthzError extends GatewayError {
  readonly kind: AuthzErrorKind;

  constructor(kind: AuthzErrorKind, message: string) {
    super(message, 403, kind);
    this.kind = kind;
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string) {
    super(message, 404, 'NotFound');
  }
}

export class InvalidDataError extends GatewayError {
  constructor(message: string) {
    super(message, 400, 'InvalidData');
  }
}

export class ConflictError extends GatewayError {
  constructor(message: string) {
    super(message, 409, 'Conflict');
  }
}

export class InvalidStateError extends GatewayError {
  constructor(message: string) {
    super(message, 409, 'InvalidState');
  }
}

const PROXY_STATUS: Record<ProxyErrorKind, number> = {
  Timeout: 504,
  Unreachable: 502,
  BackendError: 502,
  TrustRejected: 502,
};

export class ProxyError extends GatewayError {
  readonly kind: ProxyErrorKind;
  readonly service: BackendName;
  readonly backendStatus?: number;
  readonly backendBody?: unknown;

  constructor(
    kind: ProxyErrorKind,
    service: BackendName,
    message: string,
    backend?: { status: number; body: unknown }
  ) {
    super(message, kind === 'BackendError' && backend ? backend.status : PROXY_STATUS[kind], kind);
    this.kind = kind;
    this.service = service;
    this.backendStatus = backend?.status;
    this.backendBody = backend?.body;
  }

  /** Connection-level failures that a repeated idempotent call may get past. */
  isTransient(): boolean {
    return this.kind === 'Timeout' || this.kind === 'Unreachable';
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message, code: this.code, service: this.service };
  }
}

export class AggregateUnavailableError extends GatewayError {
  readonly sections: Partial<Record<string, SectionError>>;

  constructor(sections: Partial<Record<string, SectionError>>) {
    super('Every dashboard section failed; no backend data is available', 503, 'AggregateUnavailable');
    this.sections = sections;
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message, code: this.code, sections: this.sections };
  }
}

/**
 * Writes the HTTP response for an error raised inside a controller. Backend
 * application errors are passed through with the backend's own status and body.
 */
export function sendError(res: Response, err: unknown, logger?: Logger): Response {
  if (err instanceof ProxyError && err.kind === 'BackendError' && err.backendStatus !== undefined) {
    const body = err.backendBody ?? { error: err.message };
    return res.status(err.backendStatus).json(body);
  }

  if (err instanceof GatewayError) {
    return res.status(err.status).json(err.toJSON());
  }

  logger?.error({ err }, 'Unhandled error while processing request');
  const message = err instanceof Error ? err.message : 'Internal server error';
  return res.status(500).json({ error: message, code: 'Internal' });
}
