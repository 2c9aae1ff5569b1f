import type { NextFunction, Request, Response } from 'express';
import container from '../config/container';
import { DEFAULT_PERMISSION_DENIED_MESSAGE, ROUTE_PERMISSIONS } from '../config/permissions';
import { HTTP_METHODS } from '../types/permissions';
import { AuthError, AuthzError, sendError } from '../utils/errors';
import { hasAtLeastRole } from '../utils/roles';
import { extractApiPath, matchPath } from '../utils/routeMatcher';

function bearerToken(header: string): string {
  const [scheme, token, ...rest] = header.trim().split(/\s+/);
  if (scheme.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
    throw new AuthError('Malformed', 'Authorization header must have the form "Bearer <token>"');
  }
  return token;
}

/**
 * Middleware to authenticate bearer tokens
 *
 * Sets req.principal when the request carries a valid token. Requests without
 * a token continue unauthenticated and are judged by checkPermissions.
 */
const authenticateBearerToken = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const header = req.headers.authorization;
    if (header) {
      const credentialService = container.resolve('credentialService');
      req.principal = credentialService.validateToken(bearerToken(header));
    }

    await checkPermissions(req, res, next);
  } catch (err) {
    if (!res.headersSent) {
      sendError(res, err, container.resolve('logger'));
    }
  }
};

/**
 * Middleware to verify permissions based on route configuration
 *
 * Finds the first rule of ROUTE_PERMISSIONS matching the request and, unless
 * the route is public, requires a principal. Scoped routes resolve the
 * principal's organization into req.scope before the role check.
 *
 * Must be used AFTER authenticateBearerToken.
 */
const checkPermissions = async (req: Request, res: Response, next: NextFunction) => {
  const settings = container.resolve('settings');
  const method = HTTP_METHODS.find(candidate => candidate === req.method.toUpperCase());
  const apiPath = extractApiPath(req.path, settings.baseUrlPath);

  const matchingRule = method
    ? ROUTE_PERMISSIONS.find(rule => rule.methods.includes(method) && matchPath(rule.path, apiPath))
    : undefined;

  // If no rule matches, deny by default
  if (!matchingRule) {
    return res.status(403).json({
      error: DEFAULT_PERMISSION_DENIED_MESSAGE,
      code: 'Forbidden',
      details: `No permission rule found for ${req.method} ${apiPath}`,
    });
  }

  if (matchingRule.isPublic) {
    return next();
  }

  if (!req.principal) {
    throw new AuthError('Invalid', 'Authentication required. Send a bearer token in the Authorization header');
  }

  if (matchingRule.requiresScope === false) {
    return next();
  }

  const scope = await container.resolve('organizationService').resolveScope(req.principal);
  req.scope = scope;

  if (matchingRule.minimumRole && !hasAtLeastRole(scope.role, matchingRule.minimumRole)) {
    throw new AuthzError(
      'Forbidden',
      `Your organization role (${scope.role}) does not have permission to ${req.method} ${apiPath}`
    );
  }

  next();
};

export { authenticateBearerToken, checkPermissions };
