import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { EntityRecord, EntityStore } from '../models/collaborators';
import type { EntityKind } from '../models/intent';
import { createLogger } from '../utils/logger';

const logger = createLogger('Entity Store');

interface EntityTable {
  table: string;
  select: string;
  searchColumns: string[];
  activityColumn: string;
  toRecord(row: unknown): EntityRecord | null;
}

const patientRowSchema = z.object({
  patient_id: z.string(),
  full_name: z.string(),
  last_visit_date: z.string().nullable()
});

const claimRowSchema = z.object({
  claim_id: z.string(),
  description: z.string().nullable(),
  provider_name: z.string().nullable(),
  claim_date: z.string().nullable()
});

export const ENTITY_TABLES: Record<EntityKind, EntityTable> = {
  patient: {
    table: 'patients',
    select: 'patient_id, full_name, last_visit_date',
    searchColumns: ['full_name', 'first_name', 'last_name'],
    activityColumn: 'last_visit_date',
    toRecord(row) {
      const parsed = patientRowSchema.safeParse(row);
      if (!parsed.success) return null;
      return { id: parsed.data.patient_id, label: parsed.data.full_name, lastActivity: parsed.data.last_visit_date };
    }
  },
  claim: {
    table: 'claims',
    select: 'claim_id, description, provider_name, claim_date',
    searchColumns: ['claim_id', 'description', 'provider_name'],
    activityColumn: 'claim_date',
    toRecord(row) {
      const parsed = claimRowSchema.safeParse(row);
      if (!parsed.success) return null;
      const { claim_id, description, provider_name, claim_date } = parsed.data;
      const details = [description, provider_name].filter(Boolean).join(', ');
      return { id: claim_id, label: details ? `${claim_id} (${details})` : claim_id, lastActivity: claim_date };
    }
  }
};

/** Characters that would break a PostgREST `or` filter. */
const sanitizeFragment = (fragment: string) => fragment.replace(/[%,()*\\."]/g, ' ').trim();

export class SupabaseEntityStore implements EntityStore {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly limit: number = 50
  ) {}

  async findByNameFragment(fragment: string, kind: EntityKind): Promise<EntityRecord[]> {
    const config = ENTITY_TABLES[kind];
    const search = sanitizeFragment(fragment);
    if (!search) return [];

    const { data, error } = await this.supabase
      .from(config.table)
      .select(config.select)
      .or(config.searchColumns.map(column => `${column}.ilike.%${search}%`).join(','))
      .order(config.activityColumn, { ascending: false, nullsFirst: false })
      .limit(this.limit);

    if (error) {
      logger.error(`Error searching ${config.table}:`, error);
      throw new Error(`Failed to search ${config.table}: ${error.message}`);
    }

    const rows: unknown[] = data ?? [];
    const records: EntityRecord[] = [];
    for (const row of rows) {
      const record = config.toRecord(row);
      if (record) {
        records.push(record);
      } else {
        logger.warn(`Skipping malformed ${kind} row`, row);
      }
    }
    return records;
  }
}
