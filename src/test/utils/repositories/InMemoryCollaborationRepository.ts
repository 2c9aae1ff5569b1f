import type { CollaborationRepository } from '../../../main/repositories/types';
import type { AcceptedCollaboration } from '../../../main/types/models/Collaboration';

export class InMemoryCollaborationRepository implements CollaborationRepository {
  private readonly decisions = new Map<string, AcceptedCollaboration>();

  async findByScope(scopeKey: string): Promise<AcceptedCollaboration[]> {
    return [...this.decisions.values()].filter(decision => decision.scopeKey === scopeKey);
  }

  async markAccepted(decision: AcceptedCollaboration): Promise<AcceptedCollaboration> {
    const key = `${decision.scopeKey}|${decision.labAId}|${decision.labBId}`;
    const stored = this.decisions.get(key);
    if (stored) {
      return stored;
    }
    this.decisions.set(key, decision);
    return decision;
  }
}
