// ============================================================================
// Tests: Account operations
// ============================================================================
//
// Runs against MemoryRecordStore; ids are deterministic (prefix 001 + counter).

import { describe, test, expect, beforeEach } from 'vitest';
import { MemoryRecordStore } from '../memory-store.js';
import {
  createAccount,
  deleteAccountsByName,
  updateAccountDescription,
  upsertAccountsByName,
} from '../accounts.js';

let store: MemoryRecordStore;

beforeEach(() => {
  store = new MemoryRecordStore();
});

describe('createAccount', () => {
  test('inserts the Account and returns it with its Id', async () => {
    const account = await createAccount(store, { name: 'Northwind Traders', industry: 'Retail' });

    expect(account).toEqual({ Id: '001000000000000001', Name: 'Northwind Traders', Industry: 'Retail' });
  });

  test('omits optional fields that were not given', async () => {
    const account = await createAccount(store, { name: 'Doe' });

    expect(Object.keys(account).sort()).toEqual(['Id', 'Name']);
  });
});

describe('updateAccountDescription', () => {
  test('changes only the description', async () => {
    const account = await createAccount(store, { name: 'Doe', industry: 'Energy' });

    await updateAccountDescription(store, account.Id ?? '', 'Strategic');

    const [stored] = await store.find('Account', { fields: ['Name', 'Industry', 'Description'] });
    expect(stored).toEqual({ Id: account.Id, Name: 'Doe', Industry: 'Energy', Description: 'Strategic' });
  });
});

describe('upsertAccountsByName', () => {
  test('reuses the existing "Doe" and creates "Jane"', async () => {
    const doe = await createAccount(store, { name: 'Doe' });

    const result = await upsertAccountsByName(store, ['Doe', 'Jane']);

    expect(result.records).toHaveLength(2);
    expect(result.reused.map((a) => a.Id)).toEqual([doe.Id]);
    expect(result.created.map((a) => a.Name)).toEqual(['Jane']);
    expect(result.created[0].Id).toBe('001000000000000002');
    expect(await store.count('Account')).toBe(2);
  });

  test('looks existing Accounts up with a single query', async () => {
    await createAccount(store, { name: 'Doe' });
    store.calls.find = 0;

    await upsertAccountsByName(store, ['Doe', 'Jane', 'Ravi', 'Mei']);

    expect(store.calls.find).toBe(1);
    expect(store.calls.insert).toBe(2);
    expect(store.calls.update).toBe(1);
  });

  test('is idempotent: a second run creates nothing', async () => {
    const first = await upsertAccountsByName(store, ['Doe', 'Jane']);
    const second = await upsertAccountsByName(store, ['Doe', 'Jane']);

    expect(first.created).toHaveLength(2);
    expect(second.created).toHaveLength(0);
    expect(second.reused.map((a) => a.Id)).toEqual(first.records.map((a) => a.Id));
    expect(await store.count('Account')).toBe(2);
  });

  test('applies fields to existing and new Accounts alike', async () => {
    await createAccount(store, { name: 'Doe', industry: 'Retail' });

    await upsertAccountsByName(store, ['Doe', 'Jane'], { Industry: 'Consulting' });

    const stored = await store.find('Account', { fields: ['Name', 'Industry'], orderBy: 'Name' });
    expect(stored.map((a) => [a.Name, a.Industry])).toEqual([
      ['Doe', 'Consulting'],
      ['Jane', 'Consulting'],
    ]);
  });

  test('collapses duplicate names', async () => {
    const result = await upsertAccountsByName(store, ['Jane', 'Jane']);

    expect(result.records).toHaveLength(1);
    expect(await store.count('Account')).toBe(1);
  });

  test('does nothing for an empty name list', async () => {
    const result = await upsertAccountsByName(store, []);

    expect(result.records).toEqual([]);
    expect(store.calls.find).toBe(0);
  });
});

describe('deleteAccountsByName', () => {
  test('deletes matching Accounts and reports how many', async () => {
    await upsertAccountsByName(store, ['Doe', 'Jane', 'Keep']);

    const removed = await deleteAccountsByName(store, ['Doe', 'Jane', 'Missing']);

    expect(removed).toBe(2);
    const left = await store.find('Account', { fields: ['Name'] });
    expect(left.map((a) => a.Name)).toEqual(['Keep']);
  });
});
