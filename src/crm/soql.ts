// ============================================================================
// SOQL Builder — SELECT statements from FindCriteria
// ============================================================================

import type { FieldValue, SObjectName } from './types/index.js';
import { isValueList, whereEntries } from './record-store.js';
import type { FindCriteria, WhereClause } from './record-store.js';

/**
 * Renders a value as a SOQL literal.
 * Strings are single-quoted with backslash, quote and control-character escaping.
 */
export function soqlLiteral(value: FieldValue): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new Error('SOQL numeric literal must be finite');
    }
    return String(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
  return `'${escaped}'`;
}

// Identifiers are interpolated as-is
function assertIdentifier(name: string): string {
  if (!/^[A-Za-z][A-Za-z0-9_]*$/.test(name)) {
    throw new Error(`Invalid SOQL identifier: ${name}`);
  }
  return name;
}

/** WHERE clause body, or null when there is no condition */
export function buildWhere<N extends SObjectName>(where: WhereClause<N> | undefined): string | null {
  const clauses = whereEntries(where).map(([field, condition]) => {
    const name = assertIdentifier(field);
    if (isValueList(condition)) {
      return `${name} IN (${condition.map(soqlLiteral).join(', ')})`;
    }
    return `${name} = ${soqlLiteral(condition)}`;
  });

  return clauses.length > 0 ? clauses.join(' AND ') : null;
}

/**
 * True when some IN list is empty. `IN ()` is a syntax error on the platform
 * and could never match, so stores answer these without a request.
 */
export function isEmptyMatch<N extends SObjectName>(where: WhereClause<N> | undefined): boolean {
  return whereEntries(where).some(([, condition]) => isValueList(condition) && condition.length === 0);
}

export function buildSelect<N extends SObjectName>(sobject: N, criteria: FindCriteria<N>): string {
  const fields = new Set<string>(['Id', ...criteria.fields]);
  const select = [...fields].map(assertIdentifier).join(', ');

  let soql = `SELECT ${select} FROM ${assertIdentifier(sobject)}`;

  const where = buildWhere(criteria.where);
  if (where) {
    soql += ` WHERE ${where}`;
  }
  if (criteria.orderBy) {
    soql += ` ORDER BY ${assertIdentifier(criteria.orderBy)}`;
  }
  if (criteria.limit !== undefined) {
    if (!Number.isInteger(criteria.limit) || criteria.limit < 0) {
      throw new Error('SOQL LIMIT must be a non-negative integer');
    }
    soql += ` LIMIT ${criteria.limit}`;
  }

  return soql;
}

export function buildCount<N extends SObjectName>(sobject: N, where: WhereClause<N> | undefined): string {
  let soql = `SELECT COUNT() FROM ${assertIdentifier(sobject)}`;
  const clause = buildWhere(where);
  if (clause) {
    soql += ` WHERE ${clause}`;
  }
  return soql;
}
