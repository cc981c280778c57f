import type { RecordStore } from './record-store.js';
import type { CaseRecord } from './types/index.js';

export const DEFAULT_CASE_ORIGIN = 'Web';

/**
 * Inserts one Case per subject, then deletes them. Every constructed Case
 * is added to the batch before the insert. Returns the ids used.
 */
export async function insertAndDeleteCases(
  store: RecordStore,
  subjects: readonly string[],
  origin: string = DEFAULT_CASE_ORIGIN,
): Promise<string[]> {
  const batch: CaseRecord[] = [];
  for (const subject of subjects) {
    batch.push({ Subject: subject, Origin: origin });
  }
  if (batch.length === 0) return [];

  const ids = await store.insert('Case', batch);
  await store.delete('Case', batch);
  return ids;
}
