import type { CaseRecord } from './types.js';

export interface MergeResult {
  records: CaseRecord[];
  /** Fresh records without an appeals case number */
  dropped: number;
  /** Fresh records whose supreme case number was already present */
  duplicates: number;
  /** Fresh records that made it into the merged set */
  added: number;
}

export function normalizeRecord(record: CaseRecord): CaseRecord {
  return {
    supreme_case_number: record.supreme_case_number.trim(),
    supreme_case_link: record.supreme_case_link.trim(),
    appeals_case_number: record.appeals_case_number.trim(),
    appeals_case_link: record.appeals_case_link.trim(),
    source_type: record.source_type,
  };
}

/**
 * Merge freshly scraped records into the prior record set.
 *
 * Prior records come first and are kept as they are; a fresh record is
 * appended only if it has an appeals case number and its supreme case number
 * is not taken yet. Keep-first rather than upsert, so re-running against
 * unchanged remote content reproduces the same set.
 */
export function mergeRecords(prior: readonly CaseRecord[], fresh: readonly CaseRecord[]): MergeResult {
  const records: CaseRecord[] = [];
  const seen = new Set<string>();

  for (const record of prior.map(normalizeRecord)) {
    if (seen.has(record.supreme_case_number)) {
      continue;
    }
    seen.add(record.supreme_case_number);
    records.push(record);
  }

  let dropped = 0;
  let duplicates = 0;
  let added = 0;

  for (const record of fresh.map(normalizeRecord)) {
    if (!record.appeals_case_number) {
      dropped++;
      continue;
    }
    if (seen.has(record.supreme_case_number)) {
      duplicates++;
      continue;
    }
    seen.add(record.supreme_case_number);
    records.push(record);
    added++;
  }

  return { records, dropped, duplicates, added };
}
