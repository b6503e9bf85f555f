import type { CaseRecord } from '../records/types.js';

/**
 * Persisted record set. Read once when a run starts, replaced once when it ends.
 */
export interface RecordStore {
  load(): Promise<CaseRecord[]>;
  save(records: readonly CaseRecord[]): Promise<void>;
}

/**
 * In-process store, used by tests
 */
export class MemoryRecordStore implements RecordStore {
  private records: CaseRecord[];
  saveCount = 0;

  constructor(initial: readonly CaseRecord[] = []) {
    this.records = initial.map((record) => ({ ...record }));
  }

  async load(): Promise<CaseRecord[]> {
    return this.records.map((record) => ({ ...record }));
  }

  async save(records: readonly CaseRecord[]): Promise<void> {
    this.records = records.map((record) => ({ ...record }));
    this.saveCount++;
  }
}
