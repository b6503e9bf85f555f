import fs from 'fs/promises';
import path from 'path';
import { toMappingJson } from '../records/MappingBuilder.js';
import type { AppealsMapping } from '../records/types.js';

export async function writeMappingFile(filePath: string, mapping: AppealsMapping): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, toMappingJson(mapping), 'utf-8');
}
