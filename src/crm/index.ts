// ============================================================================
// CRM Module — Barrel Export
// ============================================================================
//
// Public API for the record operations. Consumers import from this barrel
// rather than individual files.
//
// NOT exported:
// - SOQL builder (src/crm/soql.ts) — internal to SalesforceRecordStore

// Types and schemas
export type {
  Account,
  Contact,
  Opportunity,
  Lead,
  CaseRecord,
  SObjectMap,
  SObjectName,
  FieldName,
  FieldValue,
  PlatformError,
  SaveResult,
} from './types/index.js';
export { SOBJECT_SCHEMAS, KEY_PREFIXES, REQUIRED_FIELDS } from './types/index.js';

// Configuration
export { loadCrmConfig } from './config.js';
export type { CrmConfig, AppEnv } from './config.js';

// Errors
export { CrmApiError, CrmAuthError, CrmRateLimitError, CrmDmlError } from './errors.js';
export type { DmlOperation } from './errors.js';

// Stores
export type { RecordStore, FindCriteria, WhereClause, WhereCondition, UpsertResult } from './record-store.js';
export { createSalesforceClient } from './client.js';
export type { SalesforceClient, HttpMethod } from './client.js';
export { SalesforceRecordStore, COLLECTION_LIMIT } from './salesforce-store.js';
export { MemoryRecordStore } from './memory-store.js';

// Matching and defaults
export { buildLookup, resolveByKey, distinctKeys, partitionResolved } from './find-or-create.js';
export type { ResolvedPartition } from './find-or-create.js';
export {
  applyDefaults,
  opportunityDefaults,
  addMonths,
  toDateOnly,
  DEFAULT_OPPORTUNITY_STAGE,
  DEFAULT_OPPORTUNITY_AMOUNT,
  DEFAULT_CLOSE_MONTHS,
} from './field-defaults.js';

// Operations
export { createAccount, updateAccountDescription, upsertAccountsByName, deleteAccountsByName } from './accounts.js';
export type { CreateAccountInput } from './accounts.js';
export { createContactsForAccount, updateContactTitles, upsertContact } from './contacts.js';
export type { ContactInput } from './contacts.js';
export { createOpportunitiesForAccount, upsertOpportunitiesByName } from './opportunities.js';
export { insertAndDeleteLeads } from './leads.js';
export type { LeadInput } from './leads.js';
export { insertAndDeleteCases, DEFAULT_CASE_ORIGIN } from './cases.js';
