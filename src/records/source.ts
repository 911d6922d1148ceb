import { hasShell } from './ids.js';
import type { CompanyRecord, EvaluationInput } from '../types.js';

/**
 * Where records come from. The production implementation sits in front of
 * the CRM; the engine only depends on this shape.
 */
export interface RecordSource {
  getById(id: string): Promise<CompanyRecord | undefined>;
  /** Ids that cannot be found are absent from the returned map. */
  getMany(ids: string[]): Promise<Map<string, CompanyRecord>>;
}

export class InMemoryRecordSource implements RecordSource {
  private readonly byId = new Map<string, CompanyRecord>();

  constructor(records: Iterable<CompanyRecord> = []) {
    for (const r of records) this.add(r);
  }

  add(record: CompanyRecord) {
    this.byId.set(record.id, record);
    // 18-character ids are also reachable by their 15-character prefix.
    if (record.id.length === 18) this.byId.set(record.id.slice(0, 15), record);
  }

  get size() {
    return new Set(this.byId.values()).size;
  }

  async getById(id: string): Promise<CompanyRecord | undefined> {
    const key = id.trim();
    return this.byId.get(key) ?? (key.length === 18 ? this.byId.get(key.slice(0, 15)) : undefined);
  }

  async getMany(ids: string[]): Promise<Map<string, CompanyRecord>> {
    const out = new Map<string, CompanyRecord>();
    for (const id of ids) {
      const r = await this.getById(id);
      if (r) out.set(id, r);
    }
    return out;
  }
}

/**
 * Pair every record with its parent, fetched in one batch. A linked parent
 * the source cannot return is reported as `{ unresolved: parentId }` so the
 * aggregator can explain the gap instead of skipping the shell flags.
 */
export async function resolveParents(records: CompanyRecord[], source: RecordSource): Promise<EvaluationInput[]> {
  const wanted = new Set<string>();
  for (const r of records) {
    if (hasShell(r) && r.parentId) wanted.add(r.parentId.trim());
  }
  const parents = wanted.size ? await source.getMany([...wanted]) : new Map<string, CompanyRecord>();
  return records.map((record) => {
    if (!hasShell(record) || !record.parentId) return { record };
    const id = record.parentId.trim();
    const parent = parents.get(id);
    return parent ? { record, parent } : { record, parent: { unresolved: id } };
  });
}
