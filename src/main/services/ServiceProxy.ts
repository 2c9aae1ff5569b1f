import type { RequestInit, Response } from 'node-fetch';
import type { Logger } from 'pino';
import type { Cradle } from '../config/container';
import type { BackendName, ProxyResponse } from '../types/models/Backend';
import type { OrganizationContext } from '../types/models/Organization';
import type { HttpMethod } from '../types/permissions';
import { ProxyError } from '../utils/errors';
import { createDeadline, sleep } from '../utils/http/deadline';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface CallOptions {
  query?: QueryParams;
  /** Overrides the configured per-attempt timeout. */
  timeoutMs?: number;
  /** Overrides the configured retry count. Only GET and HEAD are ever retried. */
  retries?: number;
  /** Abandons the call (and any pending retry) when the caller goes away. */
  signal?: AbortSignal;
}

const IDEMPOTENT_METHODS: ReadonlySet<HttpMethod> = new Set<HttpMethod>(['GET', 'HEAD']);

function parseBody(text: string): unknown {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function buildQuery(query?: QueryParams): string {
  if (!query) {
    return '';
  }
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      params.append(key, String(value));
    }
  }
  const encoded = params.toString();
  return encoded ? `?${encoded}` : '';
}

class ServiceProxy {
  private readonly settings: Cradle['settings'];
  private readonly credentialService: Cradle['credentialService'];
  private readonly httpFetch: FetchLike;
  private readonly logger: Logger;

  constructor({ settings, credentialService, httpFetch, logger }: Pick<Cradle, 'settings' | 'credentialService' | 'httpFetch' | 'logger'>) {
    this.settings = settings;
    this.credentialService = credentialService;
    this.httpFetch = httpFetch;
    this.logger = logger.child({ component: 'service-proxy' });
  }

  baseUrl(service: BackendName): string {
    return this.settings.backends[service];
  }

  /**
   * Issues one call to a backend on behalf of `context`. Transient failures of
   * GET and HEAD calls are retried a bounded number of times; every other
   * failure, and any failure of a non-idempotent call, surfaces immediately.
   */
  async call(
    service: BackendName,
    path: string,
    method: HttpMethod,
    body: unknown,
    context: OrganizationContext | null,
    options: CallOptions = {}
  ): Promise<ProxyResponse> {
    const retries = IDEMPOTENT_METHODS.has(method) ? (options.retries ?? this.settings.proxy.maxRetries) : 0;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.attempt(service, path, method, body, context, options);
      } catch (err) {
        const retryable =
          err instanceof ProxyError && err.isTransient() && attempt < retries && !options.signal?.aborted;
        if (!retryable) {
          throw err;
        }

        this.logger.warn(
          { service, path, method, attempt: attempt + 1, kind: err.kind },
          'Transient backend failure, retrying'
        );
        await sleep(this.settings.proxy.retryDelayMs * (attempt + 1), options.signal);
        if (options.signal?.aborted) {
          throw new ProxyError('Timeout', service, `Call to ${service} was abandoned by the caller`);
        }
      }
    }
  }

  private async attempt(
    service: BackendName,
    path: string,
    method: HttpMethod,
    body: unknown,
    context: OrganizationContext | null,
    options: CallOptions
  ): Promise<ProxyResponse> {
    const timeoutMs = options.timeoutMs ?? this.settings.proxy.timeoutMs;
    const deadline = createDeadline(timeoutMs, options.signal);
    const url = `${this.baseUrl(service)}${path}${buildQuery(options.query)}`;

    let response: Response;
    let text: string;
    try {
      response = await this.httpFetch(url, {
        method,
        headers: this.headers(service, context, body !== undefined && body !== null),
        body: body !== undefined && body !== null ? JSON.stringify(body) : undefined,
        signal: deadline.signal,
      });
      text = method === 'HEAD' ? '' : await response.text();
    } catch (err) {
      if (deadline.expired()) {
        throw new ProxyError('Timeout', service, `${service} did not respond within ${timeoutMs}ms`);
      }
      if (options.signal?.aborted) {
        throw new ProxyError('Timeout', service, `Call to ${service} was abandoned by the caller`);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new ProxyError('Unreachable', service, `${service} is unreachable: ${reason}`);
    } finally {
      deadline.dispose();
    }

    const payload = parseBody(text);

    if (response.status === 401) {
      this.logger.error(
        { service, path, status: response.status },
        'Backend rejected the gateway service credential; check SERVICE_SECRET and SERVICE_NAME'
      );
      throw new ProxyError('TrustRejected', service, `${service} rejected the gateway service credential`);
    }

    if (!response.ok) {
      throw new ProxyError('BackendError', service, `${service} responded with status ${response.status}`, {
        status: response.status,
        body: payload,
      });
    }

    return { status: response.status, body: payload };
  }

  private headers(service: BackendName, context: OrganizationContext | null, hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'X-Service-Token': this.credentialService.issueServiceCredential(service, context),
      'X-Service-Name': this.settings.serviceName,
    };

    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }

    if (context) {
      headers['X-User-Id'] = context.userId;
      headers['X-Organization-Id'] = context.organizationId;
      headers['X-User-Role'] = context.role;
    }

    return headers;
  }
}

export default ServiceProxy;
