import type { Logger } from 'pino';
import { ZodError } from 'zod';
import { BACKEND_ENDPOINTS } from '../config/backends';
import type { Cradle } from '../config/container';
import type { AggregateHealthReport, BackendHealth, BackendName, ServiceDescriptor } from '../types/models/Backend';
import { BACKEND_NAMES } from '../types/models/Backend';
import type {
  ActivitySection,
  BackendRecord,
  DashboardSectionName,
  DashboardView,
  LabsSection,
  PerformanceSection,
  ProjectsSection,
  SectionError,
  TeamSection,
} from '../types/models/Dashboard';
import type { OrganizationContext } from '../types/models/Organization';
import { AggregateUnavailableError, NotFoundError, ProxyError } from '../utils/errors';
import { createDeadline, type Deadline } from '../utils/http/deadline';
import { activitySummarySchema, recordListPayloadSchema } from '../utils/proxy/backendPayloads';
import { hasAtLeastRole } from '../utils/roles';
import { filterByOrganization, scopeResponseBody } from '../utils/tenancy';
import type { CallOptions } from './ServiceProxy';

const RECENT_PROJECTS = 5;
const RECENT_TASKS = 5;
const RECENT_GOALS = 3;
const RECENT_REVIEWS = 3;
const RECENT_LABS = 5;
const RECENT_TEAM_ENTRIES = 5;

type SectionErrors = Partial<Record<DashboardSectionName, SectionError>>;

function countWhere(records: BackendRecord[], field: string, value: string): number {
  return records.filter(record => record[field] === value).length;
}

class AggregationService {
  private readonly settings: Cradle['settings'];
  private readonly serviceProxy: Cradle['serviceProxy'];
  private readonly logger: Logger;

  constructor({ settings, serviceProxy, logger }: Pick<Cradle, 'settings' | 'serviceProxy' | 'logger'>) {
    this.settings = settings;
    this.serviceProxy = serviceProxy;
    this.logger = logger.child({ component: 'aggregation' });
  }

  async health(): Promise<AggregateHealthReport> {
    const [projects, activity, performance, labs] = await Promise.all([
      this.probe('projects'),
      this.probe('activity'),
      this.probe('performance'),
      this.probe('labs'),
    ]);

    return {
      gateway: 'healthy',
      timestamp: new Date().toISOString(),
      services: { projects, activity, performance, labs },
    };
  }

  async listServices(): Promise<ServiceDescriptor[]> {
    const report = await this.health();
    return BACKEND_NAMES.map(name => ({
      name,
      url: report.services[name].url,
      status: report.services[name].status,
    }));
  }

  /**
   * Builds the unified dashboard of `context`. Sections load concurrently into
   * their own slots; a failed section is left null and described in `errors`.
   */
  async dashboard(context: OrganizationContext, signal?: AbortSignal): Promise<DashboardView> {
    const deadline = createDeadline(this.settings.dashboardDeadlineMs, signal);
    const options: CallOptions = { signal: deadline.signal };
    const errors: SectionErrors = {};
    const includeTeam = hasAtLeastRole(context.role, 'manager');

    try {
      const [projects, activity, performance, labs, team] = await Promise.all([
        this.runSection('projects', 'projects', errors, deadline, () => this.projectsSection(context, options)),
        this.runSection('activity', 'activity', errors, deadline, () => this.activitySection(context, options)),
        this.runSection('performance', 'performance', errors, deadline, () =>
          this.performanceSection(context, options)
        ),
        this.runSection('labs', 'labs', errors, deadline, () => this.labsSection(context, options)),
        includeTeam
          ? this.runSection('team', 'activity', errors, deadline, () => this.teamSection(context, options))
          : Promise.resolve(null),
      ]);

      const requested = includeTeam ? 5 : 4;
      const failed = Object.keys(errors).length;
      if (failed === requested) {
        throw new AggregateUnavailableError(errors);
      }

      return {
        user: { id: context.userId, role: context.role },
        organization: { id: context.organizationId },
        projects,
        activity,
        performance,
        labs,
        team,
        errors,
        partial: failed > 0,
      };
    } finally {
      deadline.dispose();
    }
  }

  private async probe(service: BackendName): Promise<BackendHealth> {
    const url = this.serviceProxy.baseUrl(service);
    const started = Date.now();
    try {
      await this.serviceProxy.call(service, BACKEND_ENDPOINTS[service].health, 'GET', null, null, {
        retries: 0,
        timeoutMs: this.settings.healthTimeoutMs,
      });
      return { status: 'healthy', url, latencyMs: Date.now() - started };
    } catch (err) {
      const latencyMs = Date.now() - started;
      if (err instanceof ProxyError && (err.kind === 'BackendError' || err.kind === 'TrustRejected')) {
        return { status: 'degraded', url, latencyMs, detail: err.message };
      }
      return { status: 'unreachable', url, latencyMs, detail: err instanceof Error ? err.message : String(err) };
    }
  }

  private async runSection<T>(
    name: DashboardSectionName,
    service: BackendName,
    errors: SectionErrors,
    deadline: Deadline,
    load: () => Promise<T>
  ): Promise<T | null> {
    try {
      return await load();
    } catch (err) {
      const sectionError = this.toSectionError(err, service, deadline);
      this.logger.warn({ section: name, service, kind: sectionError.kind }, sectionError.message);
      errors[name] = sectionError;
      return null;
    }
  }

  private toSectionError(err: unknown, service: BackendName, deadline: Deadline): SectionError {
    if (err instanceof ProxyError) {
      const message =
        err.kind === 'Timeout' && deadline.expired()
          ? `Dashboard deadline of ${this.settings.dashboardDeadlineMs}ms exceeded`
          : err.message;
      return { kind: err.kind, service, status: err.backendStatus, message };
    }
    if (err instanceof ZodError) {
      return { kind: 'InvalidPayload', service, message: `Unexpected payload from ${service}` };
    }
    if (err instanceof NotFoundError) {
      return { kind: 'InvalidPayload', service, message: `${service} returned data of another organization` };
    }
    throw err;
  }

  private async fetchList(
    service: BackendName,
    path: string,
    context: OrganizationContext,
    options: CallOptions
  ): Promise<BackendRecord[]> {
    const response = await this.serviceProxy.call(service, path, 'GET', null, context, options);
    return filterByOrganization(recordListPayloadSchema.parse(response.body), context.organizationId);
  }

  private async projectsSection(context: OrganizationContext, options: CallOptions): Promise<ProjectsSection> {
    const [projects, tasks] = await Promise.all([
      this.fetchList('projects', BACKEND_ENDPOINTS.projects.projects, context, options),
      this.fetchList('projects', BACKEND_ENDPOINTS.projects.userTasks(context.userId), context, options),
    ]);
    const completed = countWhere(tasks, 'status', 'Done');

    return {
      total: projects.length,
      active: countWhere(projects, 'status', 'active'),
      recent: projects.slice(0, RECENT_PROJECTS),
      tasks: {
        total: tasks.length,
        completed,
        pending: tasks.length - completed,
        recent: tasks.slice(0, RECENT_TASKS),
      },
    };
  }

  private async activitySection(context: OrganizationContext, options: CallOptions): Promise<ActivitySection> {
    const response = await this.serviceProxy.call(
      'activity',
      BACKEND_ENDPOINTS.activity.todayForUser(context.userId),
      'GET',
      null,
      context,
      options
    );
    const summary = activitySummarySchema.parse(
      scopeResponseBody(response.body, context.organizationId, 'Activity summary')
    );

    return {
      productiveHoursToday: summary.productive_hours,
      idleHoursToday: summary.idle_hours,
      productivityScore: summary.productivity_score,
      isOnline: summary.is_online,
    };
  }

  private async performanceSection(context: OrganizationContext, options: CallOptions): Promise<PerformanceSection> {
    const [goals, reviews] = await Promise.all([
      this.fetchList('performance', BACKEND_ENDPOINTS.performance.goalsForUser(context.userId), context, options),
      this.fetchList('performance', BACKEND_ENDPOINTS.performance.reviewsForUser(context.userId), context, options),
    ]);

    return {
      goals: {
        total: goals.length,
        inProgress: countWhere(goals, 'status', 'in_progress'),
        achieved: countWhere(goals, 'status', 'achieved'),
        recent: goals.slice(0, RECENT_GOALS),
      },
      reviews: {
        total: reviews.length,
        recent: reviews.slice(0, RECENT_REVIEWS),
      },
    };
  }

  private async labsSection(context: OrganizationContext, options: CallOptions): Promise<LabsSection> {
    const labs = await this.fetchList('labs', BACKEND_ENDPOINTS.labs.labs, context, options);
    return { total: labs.length, recent: labs.slice(0, RECENT_LABS) };
  }

  private async teamSection(context: OrganizationContext, options: CallOptions): Promise<TeamSection> {
    const entries = await this.fetchList(
      'activity',
      BACKEND_ENDPOINTS.activity.team(context.organizationId),
      context,
      options
    );
    const members = new Set(
      entries.map(entry => entry.user_id ?? entry.userId).filter(id => id !== undefined && id !== null)
    );

    return {
      entries: entries.length,
      members: members.size,
      recent: entries.slice(0, RECENT_TEAM_ENTRIES),
    };
  }
}

export default AggregationService;
