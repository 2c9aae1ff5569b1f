import type { BackendName } from '../types/models/Backend';

/**
 * Paths of the backend REST contracts the gateway relies on. Backends read the
 * acting organization from the X-Organization-Id header.
 */
export const BACKEND_ENDPOINTS = {
  projects: {
    health: '/health',
    projects: '/api/v1/projects',
    project: (projectId: string) => `/api/v1/projects/${encodeURIComponent(projectId)}`,
    projectTasks: (projectId: string) => `/api/v1/projects/${encodeURIComponent(projectId)}/tasks`,
    projectIssues: (projectId: string) => `/api/v1/issues/project/${encodeURIComponent(projectId)}`,
    tasks: '/api/v1/internal/tasks',
    userTasks: (userId: string) => `/api/v1/internal/user/${encodeURIComponent(userId)}/tasks`,
    userSync: '/api/v1/internal/users/sync',
  },
  activity: {
    health: '/health',
    todayForUser: (userId: string) => `/api/v1/activity/user/${encodeURIComponent(userId)}/today`,
    team: (organizationId: string) => `/api/v1/activity/team/${encodeURIComponent(organizationId)}`,
    activityLog: '/api/v1/activity/',
    productivityForUser: (userId: string) => `/api/v1/productivity/user/${encodeURIComponent(userId)}/stats`,
    userSync: '/api/v1/users/sync',
  },
  performance: {
    health: '/health',
    goalsForUser: (userId: string) => `/api/v1/goals/user/${encodeURIComponent(userId)}`,
    reviewsForUser: (userId: string) => `/api/v1/reviews/user/${encodeURIComponent(userId)}`,
    scoreForUser: (userId: string) => `/api/v1/analytics/user/${encodeURIComponent(userId)}/performance`,
    feedbackForUser: (userId: string) => `/api/v1/feedback/user/${encodeURIComponent(userId)}`,
    skillsForUser: (userId: string) => `/api/v1/skills/user/${encodeURIComponent(userId)}`,
    team: (organizationId: string) => `/api/v1/analytics/team/${encodeURIComponent(organizationId)}/performance`,
    userSync: '/api/v1/employees',
  },
  labs: {
    health: '/health',
    labs: '/labs',
    lab: (labId: string) => `/labs/${encodeURIComponent(labId)}`,
    researchers: '/researchers',
    labResearchers: (labId: string) => `/researchers/by-lab/${encodeURIComponent(labId)}`,
    userSync: '/users/sync',
  },
} as const;

export const USER_SYNC_PATHS: Record<BackendName, string> = {
  projects: BACKEND_ENDPOINTS.projects.userSync,
  activity: BACKEND_ENDPOINTS.activity.userSync,
  performance: BACKEND_ENDPOINTS.performance.userSync,
  labs: BACKEND_ENDPOINTS.labs.userSync,
};
