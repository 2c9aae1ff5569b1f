import type { Logger } from 'pino';
import { z, ZodError } from 'zod';
import { BACKEND_ENDPOINTS } from '../config/backends';
import type { Cradle } from '../config/container';
import type {
  AcceptedCollaboration,
  CollaborationEmail,
  CollaborationScope,
  CollaborationSuggestion,
  Lab,
  Researcher,
  ScopedResult,
} from '../types/models/Collaboration';
import type { OrganizationContext } from '../types/models/Organization';
import { generateCollaborationEmail } from '../utils/collaboration/email';
import { compareIds, pairKey, scorePair, suggestCollaborations } from '../utils/collaboration/scoring';
import { InvalidDataError, NotFoundError, ProxyError } from '../utils/errors';
import { labPayloadSchema, recordListPayloadSchema, researcherPayloadSchema } from '../utils/proxy/backendPayloads';
import { filterByOrganization } from '../utils/tenancy';
import type { CallOptions } from './ServiceProxy';

const GLOBAL_SCOPE_KEY = '*';

interface LabSnapshot {
  labs: Lab[];
  researchers: Researcher[];
}

class CollaborationService {
  private readonly settings: Cradle['settings'];
  private readonly serviceProxy: Cradle['serviceProxy'];
  private readonly collaborationRepository: Cradle['collaborationRepository'];
  private readonly organizationService: Cradle['organizationService'];
  private readonly logger: Logger;

  constructor({
    settings,
    serviceProxy,
    collaborationRepository,
    organizationService,
    logger,
  }: Pick<Cradle, 'settings' | 'serviceProxy' | 'collaborationRepository' | 'organizationService' | 'logger'>) {
    this.settings = settings;
    this.serviceProxy = serviceProxy;
    this.collaborationRepository = collaborationRepository;
    this.organizationService = organizationService;
    this.logger = logger.child({ component: 'collaboration' });
  }

  get scope(): CollaborationScope {
    return this.settings.collaboration.scope;
  }

  /** Key under which accepted decisions are stored for `context`. */
  scopeKey(context: OrganizationContext): string {
    return this.scope === 'global' ? GLOBAL_SCOPE_KEY : context.organizationId;
  }

  async suggestions(context: OrganizationContext, signal?: AbortSignal): Promise<ScopedResult<CollaborationSuggestion[]>> {
    const [{ labs, researchers }, accepted] = await Promise.all([
      this.snapshot(context, { signal }),
      this.collaborationRepository.findByScope(this.scopeKey(context)),
    ]);
    const acceptedPairs = new Set(accepted.map(decision => pairKey(decision.labAId, decision.labBId)));

    return { scope: this.scope, data: suggestCollaborations(labs, researchers, acceptedPairs) };
  }

  async active(context: OrganizationContext): Promise<ScopedResult<AcceptedCollaboration[]>> {
    const accepted = await this.collaborationRepository.findByScope(this.scopeKey(context));
    return { scope: this.scope, data: accepted };
  }

  /**
   * Records the decision to collaborate. Accepting an already accepted pair
   * returns the stored decision unchanged.
   */
  async accept(
    context: OrganizationContext,
    labAId: string,
    labBId: string
  ): Promise<ScopedResult<AcceptedCollaboration>> {
    this.organizationService.authorize(context, 'manager');
    const [first, second] = this.orderedPair(labAId, labBId);

    const { labs } = await this.snapshot(context, {}, false);
    this.findLab(labs, first);
    this.findLab(labs, second);

    const decision = await this.collaborationRepository.markAccepted({
      scopeKey: this.scopeKey(context),
      labAId: first,
      labBId: second,
      acceptedBy: context.userId,
      acceptedAt: new Date(),
    });
    this.logger.info({ labAId: first, labBId: second, scopeKey: decision.scopeKey }, 'Collaboration accepted');

    return { scope: this.scope, data: decision };
  }

  async email(
    context: OrganizationContext,
    labAId: string,
    labBId: string,
    now: Date = new Date()
  ): Promise<ScopedResult<CollaborationEmail>> {
    const [first, second] = this.orderedPair(labAId, labBId);
    const { labs, researchers } = await this.snapshot(context, {});
    const labA = this.findLab(labs, first);
    const labB = this.findLab(labs, second);

    const pair = scorePair(
      labA,
      labB,
      researchers.filter(r => r.labId === labA.id),
      researchers.filter(r => r.labId === labB.id)
    );
    return { scope: this.scope, data: generateCollaborationEmail(pair, this.settings.collaboration.mailbox, now) };
  }

  private orderedPair(labAId: string, labBId: string): [string, string] {
    if (labAId === labBId) {
      throw new InvalidDataError('A lab cannot collaborate with itself');
    }
    return compareIds(labAId, labBId) < 0 ? [labAId, labBId] : [labBId, labAId];
  }

  private findLab(labs: Lab[], labId: string): Lab {
    const lab = labs.find(candidate => candidate.id === labId);
    if (!lab) {
      throw new NotFoundError(`Lab with ID ${labId} not found`);
    }
    return lab;
  }

  /**
   * Labs and researchers visible in the configured scope. In organization scope
   * labs marked with another organization are left out, together with their
   * researchers.
   */
  private async snapshot(
    context: OrganizationContext,
    options: CallOptions,
    withResearchers = true
  ): Promise<LabSnapshot> {
    const query = this.scope === 'global' ? { scope: 'all' } : undefined;
    const [labsResponse, researchersResponse] = await Promise.all([
      this.serviceProxy.call('labs', BACKEND_ENDPOINTS.labs.labs, 'GET', null, context, { ...options, query }),
      withResearchers
        ? this.serviceProxy.call('labs', BACKEND_ENDPOINTS.labs.researchers, 'GET', null, context, {
            ...options,
            query,
          })
        : Promise.resolve(null),
    ]);

    try {
      const rawLabs = recordListPayloadSchema.parse(labsResponse.body);
      const visible = this.scope === 'global' ? rawLabs : filterByOrganization(rawLabs, context.organizationId);
      const labs = z.array(labPayloadSchema).parse(visible);

      const labIds = new Set(labs.map(lab => lab.id));
      const researchers = researchersResponse
        ? z
            .array(researcherPayloadSchema)
            .parse(recordListPayloadSchema.parse(researchersResponse.body))
            .filter(researcher => labIds.has(researcher.labId))
        : [];

      return { labs, researchers };
    } catch (err) {
      if (err instanceof ZodError) {
        this.logger.warn({ issues: err.issues.length }, 'Labs service returned an unexpected payload');
        throw new ProxyError('BackendError', 'labs', 'Labs service returned an unexpected payload');
      }
      throw err;
    }
  }
}

export default CollaborationService;
