// ============================================================================
// Tests: Opportunity operations
// ============================================================================
//
// `today` is fixed so the default close date is deterministic: 2026-10-19
// plus three months is 2027-01-19.

import { describe, test, expect, beforeEach } from 'vitest';
import { MemoryRecordStore } from '../memory-store.js';
import { createOpportunitiesForAccount, upsertOpportunitiesByName } from '../opportunities.js';

const TODAY = new Date('2026-10-19T12:00:00Z');
const ACCOUNT_A = '001000000000000900';
const ACCOUNT_B = '001000000000000901';

let store: MemoryRecordStore;

beforeEach(() => {
  store = new MemoryRecordStore();
});

describe('createOpportunitiesForAccount', () => {
  test('inserts one Opportunity per name with the defaults applied', async () => {
    const opps = await createOpportunitiesForAccount(store, ACCOUNT_A, ['Renewal', 'Expansion'], TODAY);

    expect(opps).toEqual([
      {
        Id: '006000000000000001',
        AccountId: ACCOUNT_A,
        Name: 'Renewal',
        StageName: 'Qualification',
        CloseDate: '2027-01-19',
        Amount: 50000,
      },
      {
        Id: '006000000000000002',
        AccountId: ACCOUNT_A,
        Name: 'Expansion',
        StageName: 'Qualification',
        CloseDate: '2027-01-19',
        Amount: 50000,
      },
    ]);
  });

  test('returns an empty list without inserting when no names are given', async () => {
    expect(await createOpportunitiesForAccount(store, ACCOUNT_A, [], TODAY)).toEqual([]);
    expect(store.calls.insert).toBe(0);
  });
});

describe('upsertOpportunitiesByName', () => {
  beforeEach(async () => {
    await store.insert('Opportunity', [
      { AccountId: ACCOUNT_A, Name: 'Renewal', StageName: 'Prospecting', CloseDate: '2026-12-01', Amount: 1000 },
      { AccountId: ACCOUNT_B, Name: 'Expansion', StageName: 'Prospecting', CloseDate: '2026-12-01', Amount: 2000 },
    ]);
  });

  test('matches by name within the Account only', async () => {
    const result = await upsertOpportunitiesByName(store, ACCOUNT_A, ['Renewal', 'Expansion'], TODAY);

    expect(result.reused.map((o) => o.Id)).toEqual(['006000000000000001']);
    expect(result.created.map((o) => [o.Name, o.AccountId])).toEqual([['Expansion', ACCOUNT_A]]);
    expect(await store.count('Opportunity')).toBe(3);
    expect(await store.count('Opportunity', { Name: 'Expansion' })).toBe(2);
  });

  test('overwrites stage, close date and amount on the reused Opportunity', async () => {
    await upsertOpportunitiesByName(store, ACCOUNT_A, ['Renewal'], TODAY);

    const [renewal] = await store.find('Opportunity', {
      fields: ['StageName', 'CloseDate', 'Amount'],
      where: { AccountId: ACCOUNT_A, Name: 'Renewal' },
    });
    expect(renewal.StageName).toBe('Qualification');
    expect(renewal.CloseDate).toBe('2027-01-19');
    expect(renewal.Amount).toBe(50000);
  });

  test('leaves the other Account untouched', async () => {
    await upsertOpportunitiesByName(store, ACCOUNT_A, ['Expansion'], TODAY);

    const [other] = await store.find('Opportunity', { fields: ['Amount'], where: { AccountId: ACCOUNT_B } });
    expect(other.Amount).toBe(2000);
  });

  test('running twice creates no duplicates', async () => {
    await upsertOpportunitiesByName(store, ACCOUNT_A, ['Renewal', 'Upsell'], TODAY);
    const second = await upsertOpportunitiesByName(store, ACCOUNT_A, ['Renewal', 'Upsell'], TODAY);

    expect(second.created).toHaveLength(0);
    expect(await store.count('Opportunity', { AccountId: ACCOUNT_A })).toBe(2);
  });
});
