import { describe, it, expect } from 'vitest';
import { NotFoundError } from '../../main/utils/errors';
import { filterByOrganization, organizationMarker, scopeResponseBody } from '../../main/utils/tenancy';

describe('tenancy', () => {
  describe('organizationMarker', () => {
    it('should read any of the marker fields backends use', () => {
      expect(organizationMarker({ organizationId: 'org-1' })).toBe('org-1');
      expect(organizationMarker({ organization_id: 'org-2' })).toBe('org-2');
      expect(organizationMarker({ orchestrator_org_id: 42 })).toBe('42');
    });

    it('should return null for unmarked values', () => {
      expect(organizationMarker({ id: 1 })).toBeNull();
      expect(organizationMarker('text')).toBeNull();
      expect(organizationMarker(null)).toBeNull();
    });
  });

  describe('filterByOrganization', () => {
    it('should drop records of other organizations and keep unmarked ones', () => {
      const records = [
        { id: 1, organization_id: 'org-1' },
        { id: 2, organization_id: 'org-2' },
        { id: 3 },
        { id: 4, orchestrator_org_id: 'org-1' },
      ];

      expect(filterByOrganization(records, 'org-1').map(record => record.id)).toEqual([1, 3, 4]);
    });
  });

  describe('scopeResponseBody', () => {
    it('should filter bare and wrapped lists', () => {
      const list = [{ id: 1, organizationId: 'org-1' }, { id: 2, organizationId: 'org-9' }];

      expect(scopeResponseBody(list, 'org-1')).toEqual([{ id: 1, organizationId: 'org-1' }]);
      expect(scopeResponseBody({ items: list, total: 2 }, 'org-1')).toEqual({
        items: [{ id: 1, organizationId: 'org-1' }],
        total: 2,
      });
    });

    it('should report a single foreign record as missing', () => {
      expect(() => scopeResponseBody({ id: 7, organization_id: 'org-9' }, 'org-1', 'Project')).toThrow(NotFoundError);
      expect(() => scopeResponseBody({ id: 7, organization_id: 'org-9' }, 'org-1', 'Project')).toThrow(
        'Project not found'
      );
    });

    it('should pass through records of the organization and plain values', () => {
      expect(scopeResponseBody({ id: 7, organization_id: 'org-1' }, 'org-1')).toEqual({ id: 7, organization_id: 'org-1' });
      expect(scopeResponseBody(null, 'org-1')).toBeNull();
    });
  });
});
