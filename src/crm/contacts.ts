// ============================================================================
// Contact Operations — create under an Account, bulk title update, upsert
// ============================================================================

import { applyDefaults } from './field-defaults.js';
import type { RecordStore } from './record-store.js';
import type { Contact } from './types/index.js';

export interface ContactInput {
  lastName: string;
  firstName?: string;
  title?: string;
}

/** Inserts one Contact per person, all linked to `accountId` */
export async function createContactsForAccount(
  store: RecordStore,
  accountId: string,
  people: readonly ContactInput[],
): Promise<Contact[]> {
  const contacts = people.map((person): Contact => ({
    AccountId: accountId,
    LastName: person.lastName,
    ...(person.firstName ? { FirstName: person.firstName } : {}),
    ...(person.title ? { Title: person.title } : {}),
  }));

  await store.insert('Contact', contacts);
  return contacts;
}

/** Sets Title on every Contact of the Account. Returns the updated Contacts. */
export async function updateContactTitles(
  store: RecordStore,
  accountId: string,
  title: string,
): Promise<Contact[]> {
  const contacts = await store.find('Contact', {
    fields: ['AccountId', 'FirstName', 'LastName', 'Title'],
    where: { AccountId: accountId },
  });

  applyDefaults(contacts, { Title: title });
  await store.update('Contact', contacts);
  return contacts;
}

/**
 * Upsert by Id: a Contact with an Id is updated, one without is inserted.
 * The same object is returned with its Id set.
 */
export async function upsertContact(store: RecordStore, contact: Contact): Promise<Contact> {
  await store.save('Contact', [contact]);
  return contact;
}
