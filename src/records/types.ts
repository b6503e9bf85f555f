/**
 * Which supreme court listing a record was scraped from
 */
export enum SourceType {
  /** Judgments (dómar) */
  VERDICT = 'verdict',

  /** Procedural decisions (ákvarðanir) */
  DECISION = 'decision',
}

export const SOURCE_TYPES: readonly SourceType[] = [SourceType.VERDICT, SourceType.DECISION];

/**
 * One supreme ↔ appeals cross-reference, as persisted in the record store
 */
export interface CaseRecord {
  supreme_case_number: string;
  supreme_case_link: string;
  appeals_case_number: string;
  appeals_case_link: string;
  source_type: SourceType;
}

/**
 * Column order of the persisted store
 */
export const RECORD_COLUMNS = [
  'supreme_case_number',
  'supreme_case_link',
  'appeals_case_number',
  'appeals_case_link',
  'source_type',
] as const satisfies readonly (keyof CaseRecord)[];

/**
 * A record inside the lookup file: the grouping key is implied by its position
 */
export type GroupedRecord = Omit<CaseRecord, 'appeals_case_number'>;

/**
 * Single member collapses to a bare object, several members stay a list
 */
export type AppealsGroup = GroupedRecord | GroupedRecord[];

export type AppealsMapping = Map<string, AppealsGroup>;
