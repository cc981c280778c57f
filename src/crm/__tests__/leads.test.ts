// ============================================================================
// Tests: Lead insert-then-delete
// ============================================================================

import { describe, test, expect, beforeEach } from 'vitest';
import { MemoryRecordStore } from '../memory-store.js';
import { CrmDmlError } from '../errors.js';
import { insertAndDeleteLeads } from '../leads.js';

let store: MemoryRecordStore;

beforeEach(() => {
  store = new MemoryRecordStore();
});

describe('insertAndDeleteLeads', () => {
  test('returns the ids given on insert and leaves no Leads behind', async () => {
    const before = await store.count('Lead');

    const ids = await insertAndDeleteLeads(store, [
      { lastName: 'Prospect', company: 'Contoso' },
      { lastName: 'Referral', company: 'Fabrikam', status: 'Open - Not Contacted' },
    ]);

    expect(ids).toEqual(['00Q000000000000001', '00Q000000000000002']);
    expect(await store.count('Lead')).toBe(before);
    expect(store.calls.insert).toBe(1);
    expect(store.calls.delete).toBe(1);
  });

  test('a Lead without Company fails the insert and nothing is deleted', async () => {
    await expect(insertAndDeleteLeads(store, [{ lastName: 'Prospect', company: '' }])).rejects.toMatchObject({
      errors: [
        {
          statusCode: 'REQUIRED_FIELD_MISSING',
          message: 'Required fields are missing: [Company]',
          fields: ['Company'],
        },
      ],
    });
    await expect(insertAndDeleteLeads(store, [{ lastName: '', company: 'Contoso' }])).rejects.toBeInstanceOf(CrmDmlError);
    expect(store.calls.delete).toBe(0);
  });

  test('makes no calls for an empty list', async () => {
    expect(await insertAndDeleteLeads(store, [])).toEqual([]);
    expect(store.calls.insert).toBe(0);
  });
});
