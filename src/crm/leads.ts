// ============================================================================
// Lead Operations — insert then delete
// ============================================================================

import type { RecordStore } from './record-store.js';
import type { Lead } from './types/index.js';

export interface LeadInput {
  lastName: string;
  company: string;
  status?: string;
}

/**
 * Inserts the Leads and deletes them again. Returns the ids they were given;
 * none of them exist afterwards.
 */
export async function insertAndDeleteLeads(store: RecordStore, inputs: readonly LeadInput[]): Promise<string[]> {
  const leads = inputs.map((input): Lead => ({
    LastName: input.lastName,
    Company: input.company,
    ...(input.status ? { Status: input.status } : {}),
  }));
  if (leads.length === 0) return [];

  const ids = await store.insert('Lead', leads);
  await store.delete('Lead', leads);
  return ids;
}
