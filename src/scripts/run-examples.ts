/**
 * Runs every record operation once and prints what happened.
 *
 * Usage:
 *   npm run examples                 # against the org in .env
 *   npm run examples -- --dry-run    # against an in-memory store
 *   npm run examples -- --keep       # leave the created Accounts in place
 *
 * Cleanup deletes the Accounts; their Contacts and Opportunities go with
 * them (cascade delete, mirrored by the in-memory store).
 *
 * In development (APP_ENV unset or "development") every name is prefixed
 * with [TEST] so the records are easy to find and filter in the org.
 */

import { pathToFileURL } from 'node:url';
import {
  createAccount,
  createContactsForAccount,
  createOpportunitiesForAccount,
  createSalesforceClient,
  deleteAccountsByName,
  insertAndDeleteCases,
  insertAndDeleteLeads,
  loadCrmConfig,
  MemoryRecordStore,
  SalesforceRecordStore,
  updateAccountDescription,
  updateContactTitles,
  upsertAccountsByName,
  upsertContact,
  upsertOpportunitiesByName,
} from '../crm/index.js';
import type { RecordStore } from '../crm/index.js';

export interface RunOptions {
  /** Prepended to every Account and Opportunity name */
  namePrefix: string;
  /** Delete the Accounts created by the run at the end */
  cleanup: boolean;
  today: Date;
}

export interface RunSummary {
  accountId: string;
  contactsCreated: number;
  contactsRetitled: number;
  opportunities: { reused: number; created: number };
  accounts: { firstPassCreated: number; secondPassCreated: number };
  leadsDeleted: number;
  casesDeleted: number;
  accountsRemoved: number;
}

export async function runExamples(store: RecordStore, options: RunOptions): Promise<RunSummary> {
  const name = (value: string) => `${options.namePrefix}${value}`;

  const account = await createAccount(store, {
    name: name('Northwind Traders'),
    industry: 'Retail',
  });
  const accountId = account.Id ?? '';
  console.log('[examples] Account created', { id: accountId });

  await updateAccountDescription(store, accountId, 'Updated by the record operation examples');
  console.log('[examples] Account description updated');

  const contacts = await createContactsForAccount(store, accountId, [
    { firstName: 'Ada', lastName: 'Sample', title: 'Buyer' },
    { firstName: 'Lin', lastName: 'Example' },
  ]);
  console.log('[examples] Contacts created', { count: contacts.length });

  const retitled = await updateContactTitles(store, accountId, 'Procurement Lead');
  console.log('[examples] Contact titles updated', { count: retitled.length });

  const extra = await upsertContact(store, { AccountId: accountId, LastName: 'Placeholder' });
  extra.Title = 'Analyst';
  await upsertContact(store, extra);
  console.log('[examples] Contact upserted twice', { id: extra.Id });

  await createOpportunitiesForAccount(store, accountId, [name('Renewal')], options.today);
  const opportunities = await upsertOpportunitiesByName(
    store,
    accountId,
    [name('Renewal'), name('Expansion')],
    options.today,
  );
  console.log('[examples] Opportunities upserted', {
    reused: opportunities.reused.length,
    created: opportunities.created.length,
  });

  const accountNames = [name('Doe'), name('Jane')];
  const firstPass = await upsertAccountsByName(store, accountNames, { Industry: 'Consulting' });
  const secondPass = await upsertAccountsByName(store, accountNames, { Industry: 'Consulting' });
  console.log('[examples] Accounts upserted by name', {
    firstPassCreated: firstPass.created.length,
    secondPassCreated: secondPass.created.length,
  });

  const leadIds = await insertAndDeleteLeads(store, [
    { lastName: 'Prospect', company: name('Contoso') },
    { lastName: 'Referral', company: name('Fabrikam') },
  ]);
  console.log('[examples] Leads inserted and deleted', { count: leadIds.length });

  const caseIds = await insertAndDeleteCases(store, [name('Login issue'), name('Billing question')]);
  console.log('[examples] Cases inserted and deleted', { count: caseIds.length });

  let accountsRemoved = 0;
  if (options.cleanup) {
    accountsRemoved = await deleteAccountsByName(store, [account.Name ?? '', ...accountNames]);
    console.log('[examples] Cleanup complete', { accountsRemoved });
  }

  return {
    accountId,
    contactsCreated: contacts.length,
    contactsRetitled: retitled.length,
    opportunities: { reused: opportunities.reused.length, created: opportunities.created.length },
    accounts: { firstPassCreated: firstPass.created.length, secondPassCreated: secondPass.created.length },
    leadsDeleted: leadIds.length,
    casesDeleted: caseIds.length,
    accountsRemoved,
  };
}

async function main() {
  const args = new Set(process.argv.slice(2));
  const dryRun = args.has('--dry-run');

  let store: RecordStore;
  let isDev = true;
  if (dryRun) {
    store = new MemoryRecordStore();
    console.log('[examples] Dry run: using in-memory store');
  } else {
    const config = loadCrmConfig();
    isDev = config.isDev;
    store = new SalesforceRecordStore(createSalesforceClient(config));
    console.log('[examples] Target org:', config.instanceUrl, `(${config.apiVersion})`);
  }

  const summary = await runExamples(store, {
    namePrefix: isDev ? '[TEST] ' : '',
    cleanup: !args.has('--keep'),
    today: new Date(),
  });

  console.log('');
  console.log('='.repeat(60));
  console.log(JSON.stringify(summary, null, 2));
  console.log('='.repeat(60));
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  main().catch((err: unknown) => {
    console.error('[examples] Run failed:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
