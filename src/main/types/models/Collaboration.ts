export interface Lab {
  id: string;
  organizationId: string | null;
  name: string;
  focusArea: string;
  description: string;
  contactEmail: string | null;
}

export interface Researcher {
  id: string;
  labId: string;
  name: string;
  expertise: string[];
}

export type CollaborationStatus = 'suggested' | 'accepted';

/**
 * `organization` confines scoring and decisions to the caller's organization;
 * `global` scores labs of every organization against each other.
 */
export type CollaborationScope = 'organization' | 'global';

export interface PairScore {
  labA: Lab;
  labB: Lab;
  score: number;
  domainBonus: number;
  expertiseBonus: number;
  overlappingResearcherPairs: number;
  sharedKeywords: string[];
}

export interface CollaborationSuggestion {
  labAId: string;
  labBId: string;
  labAName: string;
  labBName: string;
  score: number;
  status: CollaborationStatus;
  rationale: string[];
}

export interface AcceptedCollaboration {
  scopeKey: string;
  labAId: string;
  labBId: string;
  acceptedBy: string;
  acceptedAt: Date;
}

export interface CollaborationEmail {
  to: string[];
  subject: string;
  body: string;
  generatedAt: string;
}

export interface ScopedResult<T> {
  scope: CollaborationScope;
  data: T;
}
