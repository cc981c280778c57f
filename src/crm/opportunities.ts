// ============================================================================
// Opportunity Operations — create with defaults, upsert by name per Account
// ============================================================================

import { applyDefaults, opportunityDefaults } from './field-defaults.js';
import { buildLookup, distinctKeys, partitionResolved, resolveByKey } from './find-or-create.js';
import type { ResolvedPartition } from './find-or-create.js';
import type { RecordStore } from './record-store.js';
import type { Opportunity } from './types/index.js';

/**
 * Inserts one Opportunity per name under the Account, each with the default
 * stage, close date and amount.
 */
export async function createOpportunitiesForAccount(
  store: RecordStore,
  accountId: string,
  names: readonly string[],
  today: Date = new Date(),
): Promise<Opportunity[]> {
  const opportunities = distinctKeys(names).map((name): Opportunity => ({ AccountId: accountId, Name: name }));
  if (opportunities.length === 0) return [];

  applyDefaults(opportunities, opportunityDefaults(today));
  await store.insert('Opportunity', opportunities);
  return opportunities;
}

/**
 * Find-or-create by Opportunity Name within one Account.
 *
 * Opportunities with the same name under a different Account never match.
 * Defaults are applied to the whole batch, existing records included, then
 * the batch is saved (update existing, insert new).
 */
export async function upsertOpportunitiesByName(
  store: RecordStore,
  accountId: string,
  names: readonly string[],
  today: Date = new Date(),
): Promise<ResolvedPartition<Opportunity>> {
  const keys = distinctKeys(names);
  if (keys.length === 0) return partitionResolved<Opportunity>([]);

  const existing = await store.find('Opportunity', {
    fields: ['AccountId', 'Name', 'StageName', 'CloseDate', 'Amount'],
    where: { AccountId: accountId, Name: keys },
  });

  const lookup = buildLookup(existing, (opp) => opp.Name);
  const batch = resolveByKey(keys, lookup, (name): Opportunity => ({ AccountId: accountId, Name: name }));

  const partition = partitionResolved(batch);

  applyDefaults(batch, opportunityDefaults(today));
  await store.save('Opportunity', batch);
  return partition;
}
