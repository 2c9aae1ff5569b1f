import type { Logger } from 'pino';
import { BACKEND_ENDPOINTS } from '../config/backends';
import type { Cradle } from '../config/container';
import type { PathParams, ProxyGuard, ProxyRoute } from '../config/proxyRoutes';
import type { ProxyResponse } from '../types/models/Backend';
import type { OrganizationContext } from '../types/models/Organization';
import { InvalidDataError, NotFoundError, ProxyError } from '../utils/errors';
import { recordListPayloadSchema } from '../utils/proxy/backendPayloads';
import { hasAtLeastRole } from '../utils/roles';
import {
  filterByOrganization,
  filterListBody,
  isRecord,
  ORGANIZATION_MARKERS,
  referencedId,
  scopeResponseBody,
} from '../utils/tenancy';
import type { CallOptions, QueryParams } from './ServiceProxy';

export interface ProxiedRequest {
  params: PathParams;
  query: QueryParams;
  body: unknown;
}

/**
 * Relays the routes of config/proxyRoutes on behalf of a request scope and
 * keeps what comes back inside the caller's organization.
 */
class TenantProxyService {
  private readonly serviceProxy: Cradle['serviceProxy'];
  private readonly organizationService: Cradle['organizationService'];
  private readonly logger: Logger;

  constructor({ serviceProxy, organizationService, logger }: Pick<Cradle, 'serviceProxy' | 'organizationService' | 'logger'>) {
    this.serviceProxy = serviceProxy;
    this.organizationService = organizationService;
    this.logger = logger.child({ component: 'tenant-proxy' });
  }

  async forward(
    route: ProxyRoute,
    request: ProxiedRequest,
    context: OrganizationContext,
    signal?: AbortSignal
  ): Promise<ProxyResponse> {
    const options: CallOptions = { signal };

    if (route.guard) {
      await this.checkGuard(route.guard, request, context, options);
    }

    const body = route.method === 'POST' ? this.scopedBody(route, request.body, context) : null;
    const response = await this.serviceProxy.call(
      route.service,
      route.target(request.params, context),
      route.method,
      body,
      context,
      { ...options, query: request.query }
    );

    let scoped = scopeResponseBody(response.body, context.organizationId, route.resource);
    if (route.labScoped) {
      const labIds = await this.visibleLabIds(context, options);
      scoped = filterListBody(scoped, record => {
        const labId = referencedId(record, 'lab_id', 'labId');
        return labId !== null && labIds.has(labId);
      });
    }

    return { status: response.status, body: scoped };
  }

  private async checkGuard(
    guard: ProxyGuard,
    request: ProxiedRequest,
    context: OrganizationContext,
    options: CallOptions
  ): Promise<void> {
    switch (guard.kind) {
      case 'parent': {
        const path = guard.target(request.params, request.body);
        if (path === null) {
          throw new InvalidDataError(guard.missing ?? `${guard.resource} reference is required`);
        }
        const parent = await this.serviceProxy.call(guard.service, path, 'GET', null, context, options);
        scopeResponseBody(parent.body, context.organizationId, guard.resource);
        return;
      }
      case 'ownOrganization':
        if (request.params[guard.param] !== context.organizationId) {
          throw new NotFoundError(`Organization with ID ${request.params[guard.param]} not found`);
        }
        return;
      case 'organizationMember': {
        const userId = request.params[guard.param];
        if (userId === context.userId) {
          return;
        }
        this.organizationService.authorize(context, 'manager');
        const membership = await this.organizationService.membership(userId, context.organizationId);
        if (!membership) {
          throw new NotFoundError(`User with ID ${userId} not found`);
        }
        return;
      }
    }
  }

  private async visibleLabIds(context: OrganizationContext, options: CallOptions): Promise<Set<string>> {
    const response = await this.serviceProxy.call('labs', BACKEND_ENDPOINTS.labs.labs, 'GET', null, context, options);
    const parsed = recordListPayloadSchema.safeParse(response.body);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues.length }, 'Labs service returned an unexpected payload');
      throw new ProxyError('BackendError', 'labs', 'Labs service returned an unexpected payload');
    }

    const ids = filterByOrganization(parsed.data, context.organizationId)
      .map(lab => referencedId(lab, 'id'))
      .filter((id): id is string => id !== null);
    return new Set(ids);
  }

  /** Copy of `body` whose organization markers name the caller's organization. */
  private scopedBody(route: ProxyRoute, body: unknown, context: OrganizationContext): Record<string, unknown> {
    const scoped: Record<string, unknown> = isRecord(body) ? { ...body } : {};
    for (const marker of ORGANIZATION_MARKERS) {
      delete scoped[marker];
    }
    scoped.organization_id = context.organizationId;
    if (route.stampUser) {
      delete scoped.userId;
      scoped.user_id = context.userId;
    }
    return scoped;
  }
}

export default TenantProxyService;
