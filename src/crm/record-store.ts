// ============================================================================
// RecordStore — Persistence seam for every CRM operation
// ============================================================================
//
// Operations never reach the platform directly: they receive a RecordStore.
// SalesforceRecordStore talks to a live org; MemoryRecordStore keeps records
// in process for tests and dry runs.

import type { FieldName, FieldValue, SObjectMap, SObjectName } from './types/index.js';

/** A single value means equality; a list means IN */
export type WhereCondition = FieldValue | readonly FieldValue[];

export type WhereClause<N extends SObjectName> = {
  [F in FieldName<N>]?: WhereCondition;
};

export interface FindCriteria<N extends SObjectName> {
  /** Fields to read. Id is always included. */
  fields: readonly FieldName<N>[];
  /** Conditions ANDed together */
  where?: WhereClause<N>;
  orderBy?: FieldName<N>;
  limit?: number;
}

export interface UpsertResult {
  id: string;
  created: boolean;
}

/**
 * All batch writes are all-or-none. On failure the platform's error
 * propagates unchanged (CrmDmlError / CrmApiError); nothing is retried.
 * Empty batches make no call.
 */
export interface RecordStore {
  find<N extends SObjectName>(sobject: N, criteria: FindCriteria<N>): Promise<SObjectMap[N][]>;

  count<N extends SObjectName>(sobject: N, where?: WhereClause<N>): Promise<number>;

  /** Creates every record and sets its Id. Returns the ids in input order. */
  insert<N extends SObjectName>(sobject: N, records: SObjectMap[N][]): Promise<string[]>;

  /** Updates records by Id. Every record must carry an Id. */
  update<N extends SObjectName>(sobject: N, records: SObjectMap[N][]): Promise<string[]>;

  /** Insert-or-update keyed by an external-id field. Sets Id on every record. */
  upsert<N extends SObjectName>(
    sobject: N,
    records: SObjectMap[N][],
    externalIdField: FieldName<N>,
  ): Promise<UpsertResult[]>;

  /** Upsert by Id: records with an Id are updated, the rest inserted. */
  save<N extends SObjectName>(sobject: N, records: SObjectMap[N][]): Promise<string[]>;

  /** Deletes records by Id. */
  delete<N extends SObjectName>(sobject: N, records: SObjectMap[N][]): Promise<void>;
}

export function isValueList(condition: WhereCondition): condition is readonly FieldValue[] {
  return Array.isArray(condition);
}

/** Flattens a where clause to its defined conditions */
export function whereEntries(
  where: Readonly<Record<string, WhereCondition | undefined>> | undefined,
): Array<[string, WhereCondition]> {
  if (!where) return [];
  return Object.entries(where).filter(
    (entry): entry is [string, WhereCondition] => entry[1] !== undefined,
  );
}

/**
 * Shared implementation of save() for stores: splits by presence of Id,
 * runs update then insert, and returns ids in the caller's order.
 */
export async function saveById<N extends SObjectName>(
  store: Pick<RecordStore, 'insert' | 'update'>,
  sobject: N,
  records: SObjectMap[N][],
): Promise<string[]> {
  const existing = records.filter((r) => Boolean(r.Id));
  const fresh = records.filter((r) => !r.Id);

  if (existing.length > 0) {
    await store.update(sobject, existing);
  }
  if (fresh.length > 0) {
    await store.insert(sobject, fresh);
  }

  return records.map((r) => requireId(r.Id));
}

export function requireId(id: string | undefined): string {
  if (!id) {
    throw new Error('Record has no Id; insert it before updating or deleting');
  }
  return id;
}
