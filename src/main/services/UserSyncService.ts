import type { Logger } from 'pino';
import { USER_SYNC_PATHS } from '../config/backends';
import type { Cradle } from '../config/container';
import { BACKEND_NAMES, type BackendName } from '../types/models/Backend';
import type { OrganizationContext } from '../types/models/Organization';
import type { PublicUser } from '../types/models/User';

class UserSyncService {
  private readonly serviceProxy: Cradle['serviceProxy'];
  private readonly logger: Logger;

  constructor({ serviceProxy, logger }: Pick<Cradle, 'serviceProxy' | 'logger'>) {
    this.serviceProxy = serviceProxy;
    this.logger = logger.child({ component: 'user-sync' });
  }

  /**
   * Pushes a newly registered user to every backend at once. Failures are
   * logged and otherwise ignored; resolves to the backends that accepted it.
   */
  async syncUser(user: PublicUser, context: OrganizationContext): Promise<BackendName[]> {
    const payload = {
      id: user.id,
      email: user.email,
      name: user.name,
      organization_id: context.organizationId,
      role: context.role,
    };

    const results = await Promise.allSettled(
      BACKEND_NAMES.map(service => this.serviceProxy.call(service, USER_SYNC_PATHS[service], 'POST', payload, context))
    );

    const synced: BackendName[] = [];
    results.forEach((result, index) => {
      const service = BACKEND_NAMES[index];
      if (result.status === 'fulfilled') {
        synced.push(service);
      } else {
        const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
        this.logger.warn({ service, userId: user.id }, `User sync failed: ${reason}`);
      }
    });
    return synced;
  }
}

export default UserSyncService;
