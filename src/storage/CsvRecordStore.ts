import fs from 'fs/promises';
import path from 'path';
import { RecordValidationError } from '../core/errors.js';
import { normalizeRecord } from '../records/MergeEngine.js';
import { RECORD_COLUMNS, type CaseRecord } from '../records/types.js';
import { parseCsv, serializeCsv } from '../utils/csv.js';
import { createLogger } from '../utils/logger.js';
import { formatValidationErrors, validateRecordRow } from '../utils/validators.js';
import type { RecordStore } from './RecordStore.js';

const logger = createLogger('CsvRecordStore');

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Record store backed by a UTF-8 CSV file with a header row
 *
 * Columns: supreme_case_number, supreme_case_link, appeals_case_number,
 * appeals_case_link, source_type. A missing file is an empty store.
 */
export class CsvRecordStore implements RecordStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<CaseRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info('No existing record file found, starting empty', { path: this.filePath });
        return [];
      }
      throw error;
    }

    const table = parseCsv(content);
    if (table.header.length === 0) {
      return [];
    }

    const missing = RECORD_COLUMNS.filter((column) => !table.header.includes(column));
    if (missing.length > 0) {
      throw new RecordValidationError(this.filePath, 1, `missing column(s) ${missing.join(', ')}`);
    }

    const records: CaseRecord[] = [];
    for (const { line, values } of table.rows) {
      if (values.length !== table.header.length) {
        throw new RecordValidationError(
          this.filePath,
          line,
          `expected ${table.header.length} values, found ${values.length}`
        );
      }

      const row: Record<string, string> = {};
      table.header.forEach((column, index) => {
        row[column] = values[index].trim();
      });

      const result = validateRecordRow(row);
      if (!result.valid || !result.data) {
        throw new RecordValidationError(this.filePath, line, formatValidationErrors(result.errors));
      }
      records.push(normalizeRecord(result.data));
    }

    logger.debug('Records loaded', { path: this.filePath, count: records.length });
    return records;
  }

  /**
   * Write to a sibling temp file and rename it over the target, so a failed
   * write leaves the previous file in place.
   */
  async save(records: readonly CaseRecord[]): Promise<void> {
    const rows = records.map((record) => RECORD_COLUMNS.map((column) => record[column]));
    const content = serializeCsv(RECORD_COLUMNS, rows);

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    logger.debug('Records saved', { path: this.filePath, count: records.length });
  }
}
