import { buildAppealsMapping, countMappedRecords } from '../records/MappingBuilder.js';
import type { AppealsMapping } from '../records/types.js';
import type { RecordStore } from '../storage/RecordStore.js';
import { writeMappingFile } from '../storage/mappingFile.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('RebuildMapping');

export interface RebuildResult {
  mapping: AppealsMapping;
  mapped: number;
  skipped: number;
}

/**
 * Regenerate the appeals lookup from the stored records, without crawling
 */
export async function rebuildMapping(store: RecordStore, mappingPath: string): Promise<RebuildResult> {
  const records = await store.load();
  const { mapping, skipped } = buildAppealsMapping(records);
  await writeMappingFile(mappingPath, mapping);

  const mapped = countMappedRecords(mapping);
  logger.info(`Wrote ${mappingPath} with ${mapped} verdict links`, { keys: mapping.size, skipped });
  return { mapping, mapped, skipped };
}
