import type { EntityRecord, EntityStore } from '../models/collaborators';
import type { EntityKind } from '../models/intent';

export class MemoryEntityStore implements EntityStore {
  private records: Record<EntityKind, EntityRecord[]>;

  constructor(records: Partial<Record<EntityKind, EntityRecord[]>> = {}) {
    this.records = { patient: [...(records.patient ?? [])], claim: [...(records.claim ?? [])] };
  }

  /** Case-insensitive substring match on the label, newest activity first. */
  async findByNameFragment(fragment: string, kind: EntityKind): Promise<EntityRecord[]> {
    const search = fragment.toLowerCase().trim();

    return this.records[kind]
      .filter(record => record.label.toLowerCase().includes(search))
      .sort((a, b) => (b.lastActivity ?? '').localeCompare(a.lastActivity ?? ''))
      .map(record => ({ ...record }));
  }

  add(kind: EntityKind, record: EntityRecord): void {
    this.records[kind].push({ ...record });
  }
}
