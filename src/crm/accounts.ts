// ============================================================================
// Account Operations — create, update, upsert-by-name, delete
// ============================================================================

import { applyDefaults } from './field-defaults.js';
import { buildLookup, distinctKeys, partitionResolved, resolveByKey } from './find-or-create.js';
import type { ResolvedPartition } from './find-or-create.js';
import type { RecordStore } from './record-store.js';
import type { Account } from './types/index.js';

export interface CreateAccountInput {
  name: string;
  industry?: string;
  description?: string;
}

/** Inserts one Account and returns it with its Id set */
export async function createAccount(store: RecordStore, input: CreateAccountInput): Promise<Account> {
  const account: Account = {
    Name: input.name,
    ...(input.industry ? { Industry: input.industry } : {}),
    ...(input.description ? { Description: input.description } : {}),
  };
  await store.insert('Account', [account]);
  return account;
}

export async function updateAccountDescription(
  store: RecordStore,
  accountId: string,
  description: string,
): Promise<void> {
  await store.update('Account', [{ Id: accountId, Description: description }]);
}

/**
 * Find-or-create by Account Name.
 *
 * One query fetches every Account whose Name is among `names`; each name then
 * resolves to the existing Account or a new stub. `fields` (if given) are
 * applied to the whole batch before it is saved, so existing Accounts are
 * updated and new ones inserted in the same pass.
 *
 * Running it twice with the same names creates nothing the second time.
 */
export async function upsertAccountsByName(
  store: RecordStore,
  names: readonly string[],
  fields: Partial<Omit<Account, 'Id' | 'Name'>> = {},
): Promise<ResolvedPartition<Account>> {
  const keys = distinctKeys(names);
  if (keys.length === 0) return partitionResolved<Account>([]);

  const existing = await store.find('Account', {
    fields: ['Name', 'Industry', 'Description'],
    where: { Name: keys },
  });

  const lookup = buildLookup(existing, (account) => account.Name);
  const batch = resolveByKey(keys, lookup, (name): Account => ({ Name: name }));

  const partition = partitionResolved(batch);

  applyDefaults(batch, fields);
  await store.save('Account', batch);
  return partition;
}

/** Deletes every Account with one of the given names; returns how many went */
export async function deleteAccountsByName(store: RecordStore, names: readonly string[]): Promise<number> {
  const keys = distinctKeys(names);
  if (keys.length === 0) return 0;

  const accounts = await store.find('Account', { fields: ['Name'], where: { Name: keys } });
  await store.delete('Account', accounts);
  return accounts.length;
}
