// ============================================================================
// Tests: Contact operations
// ============================================================================

import { describe, test, expect, beforeEach } from 'vitest';
import { MemoryRecordStore } from '../memory-store.js';
import { CrmDmlError } from '../errors.js';
import { createContactsForAccount, updateContactTitles, upsertContact } from '../contacts.js';
import type { Contact } from '../types/index.js';

const ACCOUNT_ID = '001000000000000900';
const OTHER_ACCOUNT_ID = '001000000000000901';

let store: MemoryRecordStore;

beforeEach(() => {
  store = new MemoryRecordStore();
});

describe('createContactsForAccount', () => {
  test('links every Contact to the Account', async () => {
    const contacts = await createContactsForAccount(store, ACCOUNT_ID, [
      { firstName: 'Ada', lastName: 'Sample', title: 'Buyer' },
      { lastName: 'Example' },
    ]);

    expect(contacts).toEqual([
      { Id: '003000000000000001', AccountId: ACCOUNT_ID, FirstName: 'Ada', LastName: 'Sample', Title: 'Buyer' },
      { Id: '003000000000000002', AccountId: ACCOUNT_ID, LastName: 'Example' },
    ]);
  });

  test('propagates the missing LastName failure and inserts nothing', async () => {
    const promise = createContactsForAccount(store, ACCOUNT_ID, [{ lastName: 'Sample' }, { lastName: '' }]);

    await expect(promise).rejects.toBeInstanceOf(CrmDmlError);
    expect(await store.count('Contact')).toBe(0);
  });
});

describe('updateContactTitles', () => {
  test('retitles only the Contacts of the given Account', async () => {
    await createContactsForAccount(store, ACCOUNT_ID, [{ lastName: 'Sample', title: 'Buyer' }, { lastName: 'Example' }]);
    await createContactsForAccount(store, OTHER_ACCOUNT_ID, [{ lastName: 'Elsewhere', title: 'Owner' }]);

    const updated = await updateContactTitles(store, ACCOUNT_ID, 'Procurement Lead');

    expect(updated).toHaveLength(2);
    const stored = await store.find('Contact', { fields: ['LastName', 'Title'], orderBy: 'LastName' });
    expect(stored.map((c) => [c.LastName, c.Title])).toEqual([
      ['Elsewhere', 'Owner'],
      ['Example', 'Procurement Lead'],
      ['Sample', 'Procurement Lead'],
    ]);
  });

  test('returns an empty list for an Account without Contacts', async () => {
    expect(await updateContactTitles(store, ACCOUNT_ID, 'Buyer')).toEqual([]);
    expect(store.calls.update).toBe(0);
  });
});

describe('upsertContact', () => {
  test('inserts without an Id, then updates the same record', async () => {
    const contact: Contact = { AccountId: ACCOUNT_ID, LastName: 'Placeholder' };

    const inserted = await upsertContact(store, contact);
    expect(inserted).toBe(contact);
    expect(contact.Id).toBe('003000000000000001');

    contact.Title = 'Analyst';
    await upsertContact(store, contact);

    const stored = await store.find('Contact', { fields: ['AccountId', 'LastName', 'Title'] });
    expect(stored).toEqual([{ Id: '003000000000000001', AccountId: ACCOUNT_ID, LastName: 'Placeholder', Title: 'Analyst' }]);
  });
});
