// ============================================================================
// MemoryRecordStore — In-process RecordStore
// ============================================================================
//
// Mirrors the platform behaviour the operations rely on: generated ids with
// the object's key prefix, required-field checks on create, all-or-none
// batches, field selection on reads, cascade delete of an Account's Contacts
// and Opportunities, and error entries shaped like the REST API's. Used by
// the tests and by `npm run examples -- --dry-run`.

import { CrmDmlError } from './errors.js';
import { isValueList, requireId, saveById, whereEntries } from './record-store.js';
import type { FindCriteria, RecordStore, UpsertResult, WhereClause, WhereCondition } from './record-store.js';
import { KEY_PREFIXES, REQUIRED_FIELDS, SOBJECT_SCHEMAS } from './types/index.js';
import type { FieldName, PlatformError, SObjectMap, SObjectName } from './types/index.js';

type Table<N extends SObjectName> = Map<string, SObjectMap[N]>;

export class MemoryRecordStore implements RecordStore {
  private readonly tables: { [N in SObjectName]: Table<N> } = {
    Account: new Map(),
    Contact: new Map(),
    Opportunity: new Map(),
    Lead: new Map(),
    Case: new Map(),
  };

  private sequence = 0;

  /** Number of calls made per method, for asserting bulk behaviour */
  readonly calls = { find: 0, count: 0, insert: 0, update: 0, upsert: 0, delete: 0 };

  async find<N extends SObjectName>(sobject: N, criteria: FindCriteria<N>): Promise<SObjectMap[N][]> {
    this.calls.find++;
    let rows = this.matching(sobject, criteria.where);

    if (criteria.orderBy) {
      const field = criteria.orderBy;
      rows = [...rows].sort((a, b) => compareValues(readField(a, field), readField(b, field)));
    }
    if (criteria.limit !== undefined) {
      rows = rows.slice(0, criteria.limit);
    }

    // Only Id and the selected fields come back, as from a SOQL SELECT
    const selected = new Set<string>(['Id', ...criteria.fields]);
    const schema = SOBJECT_SCHEMAS[sobject];
    return rows.map((row) =>
      schema.parse(Object.fromEntries(Object.entries(row).filter(([key]) => selected.has(key)))),
    );
  }

  async count<N extends SObjectName>(sobject: N, where?: WhereClause<N>): Promise<number> {
    this.calls.count++;
    return this.matching(sobject, where).length;
  }

  async insert<N extends SObjectName>(sobject: N, records: SObjectMap[N][]): Promise<string[]> {
    if (records.length === 0) return [];
    this.calls.insert++;

    const errors = records.flatMap((record) => [
      ...(record.Id ? [platformError('INVALID_FIELD_FOR_INSERT_UPDATE', 'cannot specify Id in an insert call', ['Id'])] : []),
      ...missingRequired(sobject, record),
    ]);
    if (errors.length > 0) {
      throw new CrmDmlError('insert', sobject, errors);
    }

    const table = this.table(sobject);
    for (const record of records) {
      record.Id = this.nextId(sobject);
      table.set(record.Id, { ...record });
    }
    return records.map((r) => requireId(r.Id));
  }

  async update<N extends SObjectName>(sobject: N, records: SObjectMap[N][]): Promise<string[]> {
    if (records.length === 0) return [];
    this.calls.update++;

    const table = this.table(sobject);
    const errors = records.flatMap((record) => {
      const id = record.Id;
      if (!id) return [platformError('MISSING_ARGUMENT', 'Id not specified in an update call', ['Id'])];
      const current = table.get(id);
      if (!current) return [platformError('ENTITY_IS_DELETED', 'entity is deleted', [])];
      return missingRequired(sobject, { ...current, ...definedFields(record) });
    });
    if (errors.length > 0) {
      throw new CrmDmlError('update', sobject, errors);
    }

    return records.map((record) => {
      const id = requireId(record.Id);
      const current = table.get(id);
      if (!current) {
        throw new Error(`${sobject} ${id} vanished during update`);
      }
      table.set(id, { ...current, ...definedFields(record) });
      return id;
    });
  }

  async upsert<N extends SObjectName>(
    sobject: N,
    records: SObjectMap[N][],
    externalIdField: FieldName<N>,
  ): Promise<UpsertResult[]> {
    if (records.length === 0) return [];
    this.calls.upsert++;

    const table = this.table(sobject);
    const errors: PlatformError[] = [];
    const seen = new Set<unknown>();
    const targets = records.map((record) => {
      const key = readField(record, externalIdField);
      if (key === undefined || key === null || key === '') {
        errors.push(platformError('MISSING_ARGUMENT', `${externalIdField} not specified`, [externalIdField]));
        return undefined;
      }
      if (seen.has(key)) {
        errors.push(platformError('DUPLICATE_VALUE', `${externalIdField}: duplicate value found in request`, [externalIdField]));
        return undefined;
      }
      seen.add(key);
      const matches = [...table.values()].filter((row) => readField(row, externalIdField) === key);
      if (matches.length > 1) {
        errors.push(platformError('DUPLICATE_EXTERNAL_ID', `${externalIdField}: more than one record found for external id field`, [externalIdField]));
        return undefined;
      }
      const existing = matches[0];
      errors.push(...missingRequired(sobject, existing ? { ...existing, ...definedFields(record) } : record));
      return existing;
    });
    if (errors.length > 0) {
      throw new CrmDmlError('upsert', sobject, errors);
    }

    return records.map((record, i) => {
      const existing = targets[i];
      if (existing) {
        const id = requireId(existing.Id);
        table.set(id, { ...existing, ...definedFields(record), Id: id });
        record.Id = id;
        return { id, created: false };
      }
      const id = this.nextId(sobject);
      record.Id = id;
      table.set(id, { ...record });
      return { id, created: true };
    });
  }

  save<N extends SObjectName>(sobject: N, records: SObjectMap[N][]): Promise<string[]> {
    return saveById(this, sobject, records);
  }

  async delete<N extends SObjectName>(sobject: N, records: SObjectMap[N][]): Promise<void> {
    if (records.length === 0) return;
    this.calls.delete++;

    const table = this.table(sobject);
    const errors = records.flatMap((record) =>
      record.Id && table.has(record.Id) ? [] : [platformError('ENTITY_IS_DELETED', 'entity is deleted', [])],
    );
    if (errors.length > 0) {
      throw new CrmDmlError('delete', sobject, errors);
    }

    const ids = records.map((record) => requireId(record.Id));
    for (const id of ids) {
      table.delete(id);
    }
    if (sobject === 'Account') {
      const accountIds = new Set(ids);
      dropChildren(this.tables.Contact, accountIds);
      dropChildren(this.tables.Opportunity, accountIds);
    }
  }

  private table<N extends SObjectName>(sobject: N): Table<N> {
    return this.tables[sobject];
  }

  private matching<N extends SObjectName>(sobject: N, where: WhereClause<N> | undefined): SObjectMap[N][] {
    const conditions = whereEntries(where);
    return [...this.table(sobject).values()].filter((row) =>
      conditions.every(([field, condition]) => matches(readField(row, field), condition)),
    );
  }

  private nextId(sobject: SObjectName): string {
    this.sequence++;
    return `${KEY_PREFIXES[sobject]}${String(this.sequence).padStart(15, '0')}`;
  }
}

// ============================================================================
// Internal helpers
// ============================================================================

function platformError(statusCode: string, message: string, fields: string[]): PlatformError {
  return { statusCode, message, fields };
}

/** Removes rows whose AccountId points at a deleted Account */
function dropChildren<T extends { AccountId?: string | null }>(
  table: Map<string, T>,
  accountIds: ReadonlySet<string>,
): void {
  for (const [id, row] of table) {
    if (row.AccountId && accountIds.has(row.AccountId)) {
      table.delete(id);
    }
  }
}

function readField(record: object, field: string): unknown {
  return Object.entries(record).find(([key]) => key === field)?.[1];
}

function definedFields<T extends object>(record: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(record)) {
    if (!isKeyOf(record, key)) continue;
    const value = record[key];
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

function isKeyOf<T extends object>(record: T, key: PropertyKey): key is keyof T {
  return key in record;
}

function missingRequired<N extends SObjectName>(sobject: N, record: SObjectMap[N]): PlatformError[] {
  const missing = REQUIRED_FIELDS[sobject].filter((field) => {
    const value = readField(record, field);
    return value === undefined || value === null || value === '';
  });
  if (missing.length === 0) return [];
  return [platformError('REQUIRED_FIELD_MISSING', `Required fields are missing: [${missing.join(', ')}]`, [...missing])];
}

function matches(value: unknown, condition: WhereCondition): boolean {
  const normalized = value === undefined ? null : value;
  if (isValueList(condition)) {
    return condition.some((candidate) => candidate === normalized);
  }
  return condition === normalized;
}

function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === undefined || a === null) return -1;
  if (b === undefined || b === null) return 1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a).localeCompare(String(b));
}
