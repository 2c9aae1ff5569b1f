import type { Role } from '../permissions';
import type { ProxyErrorKind } from '../../utils/errors';
import type { BackendName } from './Backend';

export type BackendRecord = Record<string, unknown>;

export interface ProjectsSection {
  total: number;
  active: number;
  recent: BackendRecord[];
  tasks: {
    total: number;
    completed: number;
    pending: number;
    recent: BackendRecord[];
  };
}

export interface ActivitySection {
  productiveHoursToday: number;
  idleHoursToday: number;
  productivityScore: number;
  isOnline: boolean;
}

export interface PerformanceSection {
  goals: {
    total: number;
    inProgress: number;
    achieved: number;
    recent: BackendRecord[];
  };
  reviews: {
    total: number;
    recent: BackendRecord[];
  };
}

export interface LabsSection {
  total: number;
  recent: BackendRecord[];
}

export interface TeamSection {
  entries: number;
  members: number;
  recent: BackendRecord[];
}

export type DashboardSectionName = 'projects' | 'activity' | 'performance' | 'labs' | 'team';

export interface SectionError {
  kind: ProxyErrorKind | 'InvalidPayload';
  service: BackendName;
  status?: number;
  message: string;
}

export interface DashboardView {
  user: { id: string; role: Role };
  organization: { id: string };
  projects: ProjectsSection | null;
  activity: ActivitySection | null;
  performance: PerformanceSection | null;
  labs: LabsSection | null;
  team: TeamSection | null;
  errors: Partial<Record<DashboardSectionName, SectionError>>;
  partial: boolean;
}
