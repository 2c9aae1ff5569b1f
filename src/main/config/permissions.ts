/**
 * Access rules for the gateway's routes.
 *
 * Paths are relative to BASE_URL_PATH and use the wildcards of utils/routeMatcher.
 * Rules are evaluated in order and the first rule matching both path and method
 * wins. A request that matches no rule is denied.
 */

import type { RoutePermission } from '../types/permissions';

export const ROUTE_PERMISSIONS: RoutePermission[] = [
  // ============================================
  // Public
  // ============================================
  { path: '/auth/register', methods: ['POST'], isPublic: true },
  { path: '/auth/login', methods: ['POST'], isPublic: true },
  { path: '/health', methods: ['GET'], isPublic: true },
  { path: '/services', methods: ['GET'], isPublic: true },

  // ============================================
  // Authenticated, not bound to the token's organization
  // ============================================
  { path: '/auth/me', methods: ['GET'], requiresScope: false },
  { path: '/auth/switch-organization', methods: ['POST'], requiresScope: false },
  { path: '/organizations', methods: ['GET', 'POST'], requiresScope: false },
  { path: '/invitations/mine', methods: ['GET'], requiresScope: false },
  { path: '/invitations/*/accept', methods: ['POST'], requiresScope: false },
  { path: '/invitations/*/reject', methods: ['POST'], requiresScope: false },

  // ============================================
  // Tenant directory
  // ============================================
  { path: '/organizations/current', methods: ['GET'], minimumRole: 'member' },
  { path: '/organizations/*', methods: ['GET'], minimumRole: 'member' },
  { path: '/organizations/*/members', methods: ['GET'], minimumRole: 'member' },
  { path: '/organizations/*/members/*', methods: ['PUT', 'DELETE'], minimumRole: 'admin' },
  { path: '/organizations/*/invitations', methods: ['GET', 'POST'], minimumRole: 'manager' },

  // ============================================
  // Aggregation
  // ============================================
  { path: '/dashboard', methods: ['GET'], minimumRole: 'member' },

  // ============================================
  // Collaboration
  // ============================================
  { path: '/collaborations/suggestions', methods: ['GET'], minimumRole: 'member' },
  { path: '/collaborations/active', methods: ['GET'], minimumRole: 'member' },
  { path: '/collaborations/*/*/accept', methods: ['POST'], minimumRole: 'manager' },
  { path: '/collaborations/*/*/email', methods: ['POST'], minimumRole: 'member' },

  // ============================================
  // Proxied backend resources
  // ============================================
  { path: '/projects', methods: ['POST'], minimumRole: 'manager' },
  { path: '/projects/tasks', methods: ['POST'], minimumRole: 'member' },
  { path: '/projects/**', methods: ['GET'], minimumRole: 'member' },
  { path: '/monitoring/activity/log', methods: ['POST'], minimumRole: 'member' },
  { path: '/monitoring/team', methods: ['GET'], minimumRole: 'manager' },
  { path: '/monitoring/**', methods: ['GET'], minimumRole: 'member' },
  { path: '/performance/team/*/performance', methods: ['GET'], minimumRole: 'manager' },
  { path: '/performance/**', methods: ['GET'], minimumRole: 'member' },
  { path: '/research/labs', methods: ['POST'], minimumRole: 'manager' },
  { path: '/research/researchers', methods: ['POST'], minimumRole: 'manager' },
  { path: '/research/**', methods: ['GET'], minimumRole: 'member' },
];

export const DEFAULT_PERMISSION_DENIED_MESSAGE = 'You do not have permission to access this resource';
