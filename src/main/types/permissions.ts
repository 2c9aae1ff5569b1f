export const HTTP_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'PATCH'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * Organization roles, lowest privilege first. The position in this list is the
 * role's rank; compare roles through `utils/roles`, never as strings.
 */
export const ROLES = ['member', 'manager', 'admin'] as const;

export type Role = (typeof ROLES)[number];

export interface RoutePermission {
  path: string;
  methods: HttpMethod[];
  isPublic?: boolean; // No bearer token required
  requiresScope?: boolean; // Resolve the token's organization before the controller runs (default: true)
  minimumRole?: Role;
}
