// ============================================================================
// Find-or-Create — Resolve natural keys against existing records
// ============================================================================
//
// Pure functions: the caller fetches existing records once (key IN candidates),
// builds a lookup, and resolves every candidate against it. Nothing here
// touches a RecordStore.

/**
 * Indexes records by natural key. The first record seen for a key is kept;
 * records with an empty or missing key are skipped.
 */
export function buildLookup<T>(
  records: readonly T[],
  keyOf: (record: T) => string | null | undefined,
): Map<string, T> {
  const lookup = new Map<string, T>();
  for (const record of records) {
    const key = keyOf(record);
    if (!key || lookup.has(key)) continue;
    lookup.set(key, record);
  }
  return lookup;
}

/**
 * Returns one record per distinct key, in first-seen order: the existing
 * record from `lookup` (same object) or a fresh stub from `createStub`.
 *
 * @example
 * const lookup = buildLookup(existingAccounts, (a) => a.Name);
 * resolveByKey(['Doe', 'Jane'], lookup, (name) => ({ Name: name }));
 * // → [existing "Doe" account, { Name: 'Jane' }]
 */
export function resolveByKey<T>(
  keys: readonly string[],
  lookup: ReadonlyMap<string, T>,
  createStub: (key: string) => T,
): T[] {
  return distinctKeys(keys).map((key) => lookup.get(key) ?? createStub(key));
}

/** Distinct non-empty keys, trimmed, first occurrence wins */
export function distinctKeys(keys: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const raw of keys) {
    const key = raw.trim();
    if (key) seen.add(key);
  }
  return [...seen];
}

export interface ResolvedPartition<T> {
  /** The whole batch, in key order */
  records: T[];
  /** Records that came from the lookup */
  reused: T[];
  /** Stubs built for keys the lookup did not have */
  created: T[];
}

/**
 * Splits a resolved batch into records that already exist (they carry an Id)
 * and new stubs. Call before saving: afterwards every record has an Id.
 */
export function partitionResolved<T extends { Id?: string }>(records: T[]): ResolvedPartition<T> {
  const reused: T[] = [];
  const created: T[] = [];
  for (const record of records) {
    (record.Id ? reused : created).push(record);
  }
  return { records, reused, created };
}
