// ============================================================================
// SalesforceRecordStore — RecordStore over the REST API
// ============================================================================
//
// Query:  GET    /query?q=<soql>                       (+ nextRecordsUrl pages)
// Insert: POST   /composite/sobjects
// Update: PATCH  /composite/sobjects
// Upsert: PATCH  /composite/sobjects/{type}/{externalIdField}
// Delete: DELETE /composite/sobjects?ids=...&allOrNone=true
//
// Collection calls accept at most 200 records, so batches are chunked and
// sent one after another. allOrNone is per request: a failure in a later
// chunk does not roll back earlier chunks.

import type { SalesforceClient } from './client.js';
import { CrmDmlError } from './errors.js';
import type { DmlOperation } from './errors.js';
import { buildCount, buildSelect, isEmptyMatch } from './soql.js';
import { requireId, saveById } from './record-store.js';
import type { FindCriteria, RecordStore, UpsertResult, WhereClause } from './record-store.js';
import { QueryResponseSchema, SaveResultListSchema, SOBJECT_SCHEMAS } from './types/index.js';
import type { FieldName, SaveResult, SObjectMap, SObjectName } from './types/index.js';

export const COLLECTION_LIMIT = 200;

export class SalesforceRecordStore implements RecordStore {
  constructor(private readonly client: SalesforceClient) {}

  async find<N extends SObjectName>(sobject: N, criteria: FindCriteria<N>): Promise<SObjectMap[N][]> {
    if (isEmptyMatch(criteria.where)) {
      return [];
    }

    const schema = SOBJECT_SCHEMAS[sobject];
    const records: SObjectMap[N][] = [];

    let page = QueryResponseSchema.parse(
      await this.client.request('GET', `/query?q=${encodeURIComponent(buildSelect(sobject, criteria))}`),
    );
    records.push(...page.records.map((raw) => schema.parse(raw)));

    while (!page.done && page.nextRecordsUrl) {
      page = QueryResponseSchema.parse(await this.client.request('GET', page.nextRecordsUrl));
      records.push(...page.records.map((raw) => schema.parse(raw)));
    }

    return records;
  }

  async count<N extends SObjectName>(sobject: N, where?: WhereClause<N>): Promise<number> {
    if (isEmptyMatch(where)) {
      return 0;
    }
    const response = QueryResponseSchema.parse(
      await this.client.request('GET', `/query?q=${encodeURIComponent(buildCount(sobject, where))}`),
    );
    return response.totalSize;
  }

  async insert<N extends SObjectName>(sobject: N, records: SObjectMap[N][]): Promise<string[]> {
    for (const chunk of chunks(records)) {
      const results = await this.collectionRequest('insert', sobject, 'POST', '/composite/sobjects', {
        allOrNone: true,
        records: chunk.map((record) => toPayload(sobject, record, false)),
      });
      assignIds(chunk, results);
    }
    return records.map((r) => requireId(r.Id));
  }

  async update<N extends SObjectName>(sobject: N, records: SObjectMap[N][]): Promise<string[]> {
    const ids = records.map((r) => requireId(r.Id));
    for (const chunk of chunks(records)) {
      await this.collectionRequest('update', sobject, 'PATCH', '/composite/sobjects', {
        allOrNone: true,
        records: chunk.map((record) => toPayload(sobject, record, true)),
      });
    }
    return ids;
  }

  async upsert<N extends SObjectName>(
    sobject: N,
    records: SObjectMap[N][],
    externalIdField: FieldName<N>,
  ): Promise<UpsertResult[]> {
    const outcomes: UpsertResult[] = [];
    for (const chunk of chunks(records)) {
      const results = await this.collectionRequest(
        'upsert',
        sobject,
        'PATCH',
        `/composite/sobjects/${sobject}/${externalIdField}`,
        {
          allOrNone: true,
          records: chunk.map((record) => toPayload(sobject, record, externalIdField === 'Id')),
        },
      );
      assignIds(chunk, results);
      results.forEach((result, i) => {
        outcomes.push({ id: requireId(chunk[i].Id), created: result.created ?? false });
      });
    }
    return outcomes;
  }

  save<N extends SObjectName>(sobject: N, records: SObjectMap[N][]): Promise<string[]> {
    return saveById(this, sobject, records);
  }

  async delete<N extends SObjectName>(sobject: N, records: SObjectMap[N][]): Promise<void> {
    const ids = records.map((r) => requireId(r.Id));
    for (const chunk of chunks(ids)) {
      const params = new URLSearchParams({ ids: chunk.join(','), allOrNone: 'true' });
      await this.collectionRequest('delete', sobject, 'DELETE', `/composite/sobjects?${params}`);
    }
  }

  /** Sends one collection request and throws the platform's errors if any record failed */
  private async collectionRequest(
    operation: DmlOperation,
    sobject: SObjectName,
    method: 'POST' | 'PATCH' | 'DELETE',
    path: string,
    body?: unknown,
  ): Promise<SaveResult[]> {
    const results = SaveResultListSchema.parse(await this.client.request(method, path, body));
    const failures = results.filter((result) => !result.success);
    if (failures.length > 0) {
      throw new CrmDmlError(operation, sobject, failures.flatMap((result) => result.errors));
    }
    return results;
  }
}

// ============================================================================
// Internal helpers
// ============================================================================

function chunks<T>(items: T[], size = COLLECTION_LIMIT): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/** Collection payload entry: attributes.type plus the record's defined fields */
function toPayload<N extends SObjectName>(
  sobject: N,
  record: SObjectMap[N],
  includeId: boolean,
): Record<string, unknown> {
  const payload: Record<string, unknown> = { attributes: { type: sobject } };
  for (const [field, value] of Object.entries(record)) {
    if (value === undefined) continue;
    if (field === 'Id' && !includeId) continue;
    payload[field] = value;
  }
  return payload;
}

function assignIds<N extends SObjectName>(records: SObjectMap[N][], results: SaveResult[]): void {
  if (results.length !== records.length) {
    throw new Error(`Expected ${records.length} save results, received ${results.length}`);
  }
  results.forEach((result, i) => {
    records[i].Id = requireId(result.id ?? undefined);
  });
}
