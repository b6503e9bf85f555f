/**
 * Appeals lookup
 *
 * Groups merged records by appeals case number. Most appeals cases map to a
 * single supreme case, so a one-member group is stored as the bare record and
 * only real one-to-many groups become arrays.
 */

import type { AppealsGroup, AppealsMapping, CaseRecord, GroupedRecord } from './types.js';

export interface MappingResult {
  mapping: AppealsMapping;
  /** Records left out because their appeals case number is empty */
  skipped: number;
}

function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function toGroupedRecord(record: CaseRecord): GroupedRecord {
  return {
    supreme_case_number: record.supreme_case_number,
    supreme_case_link: record.supreme_case_link,
    appeals_case_link: record.appeals_case_link,
    source_type: record.source_type,
  };
}

/**
 * Build the lookup from the merged record set.
 *
 * Members keep the order they have in `records`; keys come out sorted.
 */
export function buildAppealsMapping(records: readonly CaseRecord[]): MappingResult {
  const partitions = new Map<string, GroupedRecord[]>();
  let skipped = 0;

  for (const record of records) {
    const key = record.appeals_case_number.trim();
    if (!key) {
      skipped++;
      continue;
    }
    const members = partitions.get(key) || [];
    members.push(toGroupedRecord(record));
    partitions.set(key, members);
  }

  const mapping: AppealsMapping = new Map();
  for (const key of [...partitions.keys()].sort(compareCodePoints)) {
    const members = partitions.get(key) || [];
    mapping.set(key, members.length === 1 ? members[0] : members);
  }

  return { mapping, skipped };
}

function groupMembers(group: AppealsGroup): GroupedRecord[] {
  return Array.isArray(group) ? group : [group];
}

/**
 * Inverse of buildAppealsMapping: one record per lookup member
 */
export function flattenAppealsMapping(mapping: AppealsMapping): CaseRecord[] {
  const records: CaseRecord[] = [];
  for (const [appealsCaseNumber, group] of mapping) {
    for (const member of groupMembers(group)) {
      records.push({
        supreme_case_number: member.supreme_case_number,
        supreme_case_link: member.supreme_case_link,
        appeals_case_number: appealsCaseNumber,
        appeals_case_link: member.appeals_case_link,
        source_type: member.source_type,
      });
    }
  }
  return records;
}

export function countMappedRecords(mapping: AppealsMapping): number {
  let total = 0;
  for (const group of mapping.values()) {
    total += groupMembers(group).length;
  }
  return total;
}

/**
 * Serialized lookup file: 2-space indent, non-ASCII kept as is, trailing newline
 */
export function toMappingJson(mapping: AppealsMapping): string {
  return `${JSON.stringify(Object.fromEntries(mapping), null, 2)}\n`;
}
