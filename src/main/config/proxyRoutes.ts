import type { BackendName } from '../types/models/Backend';
import type { OrganizationContext } from '../types/models/Organization';
import { referencedId } from '../utils/tenancy';
import { BACKEND_ENDPOINTS } from './backends';

export type PathParams = Record<string, string>;

/**
 * Check run before a route is relayed.
 *
 * - `parent`: the record `target` points at is fetched first and must belong
 *   to the caller's organization. A null target means the request did not
 *   name the parent at all.
 * - `ownOrganization`: the path parameter must name the caller's organization.
 * - `organizationMember`: the path parameter must name the caller, or a member
 *   of the caller's organization when the caller is a manager or above.
 */
export type ProxyGuard =
  | {
      kind: 'parent';
      service: BackendName;
      resource: string;
      target: (params: PathParams, body: unknown) => string | null;
      missing?: string;
    }
  | { kind: 'ownOrganization'; param: string }
  | { kind: 'organizationMember'; param: string };

export interface ProxyRoute {
  method: 'GET' | 'POST';
  /** Express path below BASE_URL_PATH. */
  path: string;
  service: BackendName;
  target: (params: PathParams, context: OrganizationContext) => string;
  /** Noun used when a single record of another organization is hidden. */
  resource: string;
  guard?: ProxyGuard;
  /** Drops records that do not reference a lab visible to the caller. */
  labScoped?: boolean;
  /** Forwarded bodies carry the caller as `user_id`. */
  stampUser?: boolean;
}

const projectParent = (target: (params: PathParams, body: unknown) => string | null): ProxyGuard => ({
  kind: 'parent',
  service: 'projects',
  resource: 'Project',
  target,
  missing: 'project_id is required',
});

const labParent = (target: (params: PathParams, body: unknown) => string | null): ProxyGuard => ({
  kind: 'parent',
  service: 'labs',
  resource: 'Lab',
  target,
  missing: 'lab_id is required',
});

const bodyReference = (endpoint: (id: string) => string, ...fields: string[]) => (_params: PathParams, body: unknown) => {
  const id = referencedId(body, ...fields);
  return id === null ? null : endpoint(id);
};

/**
 * Backend resources the gateway exposes one to one. Access rules for these
 * paths live in config/permissions.
 */
export const PROXY_ROUTES: ProxyRoute[] = [
  // Projects
  { method: 'GET', path: '/projects', service: 'projects', resource: 'Project', target: () => BACKEND_ENDPOINTS.projects.projects },
  { method: 'POST', path: '/projects', service: 'projects', resource: 'Project', target: () => BACKEND_ENDPOINTS.projects.projects },
  {
    method: 'POST',
    path: '/projects/tasks',
    service: 'projects',
    resource: 'Task',
    target: () => BACKEND_ENDPOINTS.projects.tasks,
    guard: projectParent(bodyReference(BACKEND_ENDPOINTS.projects.project, 'project_id', 'projectId')),
  },
  {
    method: 'GET',
    path: '/projects/:projectId',
    service: 'projects',
    resource: 'Project',
    target: params => BACKEND_ENDPOINTS.projects.project(params.projectId),
  },
  {
    method: 'GET',
    path: '/projects/:projectId/tasks',
    service: 'projects',
    resource: 'Task',
    target: params => BACKEND_ENDPOINTS.projects.projectTasks(params.projectId),
    guard: projectParent(params => BACKEND_ENDPOINTS.projects.project(params.projectId)),
  },
  {
    method: 'GET',
    path: '/projects/:projectId/issues',
    service: 'projects',
    resource: 'Issue',
    target: params => BACKEND_ENDPOINTS.projects.projectIssues(params.projectId),
    guard: projectParent(params => BACKEND_ENDPOINTS.projects.project(params.projectId)),
  },

  // Monitoring
  {
    method: 'GET',
    path: '/monitoring/activity/today',
    service: 'activity',
    resource: 'Activity summary',
    target: (_params, context) => BACKEND_ENDPOINTS.activity.todayForUser(context.userId),
  },
  {
    method: 'POST',
    path: '/monitoring/activity/log',
    service: 'activity',
    resource: 'Activity',
    target: () => BACKEND_ENDPOINTS.activity.activityLog,
    stampUser: true,
  },
  {
    method: 'GET',
    path: '/monitoring/team',
    service: 'activity',
    resource: 'Team activity',
    target: (_params, context) => BACKEND_ENDPOINTS.activity.team(context.organizationId),
  },
  {
    method: 'GET',
    path: '/monitoring/stats/:userId/productivity',
    service: 'activity',
    resource: 'Productivity stats',
    target: params => BACKEND_ENDPOINTS.activity.productivityForUser(params.userId),
    guard: { kind: 'organizationMember', param: 'userId' },
  },

  // Performance
  {
    method: 'GET',
    path: '/performance/goals',
    service: 'performance',
    resource: 'Goal',
    target: (_params, context) => BACKEND_ENDPOINTS.performance.goalsForUser(context.userId),
  },
  {
    method: 'GET',
    path: '/performance/reviews',
    service: 'performance',
    resource: 'Review',
    target: (_params, context) => BACKEND_ENDPOINTS.performance.reviewsForUser(context.userId),
  },
  {
    method: 'GET',
    path: '/performance/score',
    service: 'performance',
    resource: 'Performance score',
    target: (_params, context) => BACKEND_ENDPOINTS.performance.scoreForUser(context.userId),
  },
  {
    method: 'GET',
    path: '/performance/feedback',
    service: 'performance',
    resource: 'Feedback',
    target: (_params, context) => BACKEND_ENDPOINTS.performance.feedbackForUser(context.userId),
  },
  {
    method: 'GET',
    path: '/performance/skills',
    service: 'performance',
    resource: 'Skill',
    target: (_params, context) => BACKEND_ENDPOINTS.performance.skillsForUser(context.userId),
  },
  {
    method: 'GET',
    path: '/performance/team/:organizationId/performance',
    service: 'performance',
    resource: 'Team performance',
    target: (_params, context) => BACKEND_ENDPOINTS.performance.team(context.organizationId),
    guard: { kind: 'ownOrganization', param: 'organizationId' },
  },

  // Research
  { method: 'GET', path: '/research/labs', service: 'labs', resource: 'Lab', target: () => BACKEND_ENDPOINTS.labs.labs },
  { method: 'POST', path: '/research/labs', service: 'labs', resource: 'Lab', target: () => BACKEND_ENDPOINTS.labs.labs },
  {
    method: 'GET',
    path: '/research/labs/:labId',
    service: 'labs',
    resource: 'Lab',
    target: params => BACKEND_ENDPOINTS.labs.lab(params.labId),
  },
  {
    method: 'GET',
    path: '/research/labs/:labId/researchers',
    service: 'labs',
    resource: 'Researcher',
    target: params => BACKEND_ENDPOINTS.labs.labResearchers(params.labId),
    guard: labParent(params => BACKEND_ENDPOINTS.labs.lab(params.labId)),
  },
  {
    method: 'GET',
    path: '/research/researchers',
    service: 'labs',
    resource: 'Researcher',
    target: () => BACKEND_ENDPOINTS.labs.researchers,
    labScoped: true,
  },
  {
    method: 'POST',
    path: '/research/researchers',
    service: 'labs',
    resource: 'Researcher',
    target: () => BACKEND_ENDPOINTS.labs.researchers,
    guard: labParent(bodyReference(BACKEND_ENDPOINTS.labs.lab, 'lab_id', 'labId')),
  },
];
