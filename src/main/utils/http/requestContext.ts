import type { Request } from 'express';
import type { OrganizationContext } from '../../types/models/Organization';
import type { Principal } from '../../types/models/User';
import { AuthError, AuthzError } from '../errors';

export function requirePrincipal(req: Request): Principal {
  if (!req.principal) {
    throw new AuthError('Invalid', 'Authentication required');
  }
  return req.principal;
}

export function requireScope(req: Request): OrganizationContext {
  if (!req.scope) {
    throw new AuthzError('NoActiveOrganization', 'No organization is selected for this request');
  }
  return req.scope;
}

/** String-valued query parameters of the request; repeated and nested ones are dropped. */
export function plainQuery(req: Request): Record<string, string> {
  const query: Record<string, string> = {};
  for (const [key, value] of Object.entries(req.query)) {
    if (typeof value === 'string') {
      query[key] = value;
    }
  }
  return query;
}
