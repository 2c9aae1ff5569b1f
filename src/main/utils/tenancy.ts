import { NotFoundError } from './errors';

/** Fields backends use to say which organization a record belongs to. */
export const ORGANIZATION_MARKERS = ['organizationId', 'organization_id', 'orchestrator_org_id'] as const;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Organization a backend record is marked with, or null for unmarked records.
 */
export function organizationMarker(record: unknown): string | null {
  if (!isRecord(record)) {
    return null;
  }
  for (const marker of ORGANIZATION_MARKERS) {
    const value = record[marker];
    if (typeof value === 'string' || typeof value === 'number') {
      return String(value);
    }
  }
  return null;
}

export function belongsToOrganization(record: unknown, organizationId: string): boolean {
  const marker = organizationMarker(record);
  return marker === null || marker === organizationId;
}

export function filterByOrganization<T>(records: T[], organizationId: string): T[] {
  return records.filter(record => belongsToOrganization(record, organizationId));
}

/**
 * Keeps the records of a list body that pass `keep`. Lists may arrive bare or
 * wrapped in `items` or `data`; any other body is returned as is.
 */
export function filterListBody(body: unknown, keep: (record: unknown) => boolean): unknown {
  if (Array.isArray(body)) {
    return body.filter(keep);
  }
  if (!isRecord(body)) {
    return body;
  }

  const filtered: Record<string, unknown> = { ...body };
  for (const key of ['items', 'data']) {
    const nested = filtered[key];
    if (Array.isArray(nested)) {
      filtered[key] = nested.filter(keep);
    }
  }
  return filtered;
}

/**
 * Narrows a proxied response body to the caller's organization. Lists, and
 * lists wrapped in `items` or `data`, lose their foreign records; a single
 * foreign record is reported as missing.
 */
export function scopeResponseBody(body: unknown, organizationId: string, description = 'Resource'): unknown {
  if (isRecord(body) && !belongsToOrganization(body, organizationId)) {
    throw new NotFoundError(`${description} not found`);
  }
  return filterListBody(body, record => belongsToOrganization(record, organizationId));
}

/** First of `fields` holding a string or numeric id, as a string. */
export function referencedId(record: unknown, ...fields: string[]): string | null {
  if (!isRecord(record)) {
    return null;
  }
  for (const field of fields) {
    const value = record[field];
    if (typeof value === 'string' || typeof value === 'number') {
      return String(value);
    }
  }
  return null;
}
