#!/usr/bin/env node

import { CrawlerConfig, LISTING_SOURCES } from './config/crawler.js';
import { HttpPageFetcher } from './core/HttpPageFetcher.js';
import { parseCliArgs, type CliArgs } from './args.js';
import { CrawlOrchestrator } from './pipeline/CrawlOrchestrator.js';
import { rebuildMapping } from './pipeline/rebuild-mapping.js';
import { CsvRecordStore } from './storage/CsvRecordStore.js';
import { logger } from './utils/logger.js';

/**
 * CLI for the supreme/appeals case cross-reference crawler
 *
 * Usage:
 *   npm run dev crawl [--dry-run]     - Crawl both listings, merge, write records and lookup
 *   npm run dev mapping               - Rebuild the lookup from the stored records only
 *   npm run dev help                  - Show this help
 *
 * Options:
 *   --records <path>   Record CSV (default: RECORDS_PATH or data/case_cross_references.csv)
 *   --mapping <path>   Lookup JSON (default: MAPPING_PATH or data/appeals_mapping.json)
 */

const COMMANDS = ['crawl', 'mapping', 'help'];

function printHelp(): void {
  console.log(`
Supreme/appeals case cross-reference crawler

Commands:
  crawl [--dry-run]    Crawl verdict and decision listings, merge into the record file,
                       and rebuild the appeals lookup
  mapping              Rebuild the appeals lookup from the record file (no network)
  help                 Show this help

Options:
  --records <path>     Record CSV file
  --mapping <path>     Appeals lookup JSON file
`);
}

async function crawl(args: CliArgs): Promise<void> {
  const config = CrawlerConfig.getConfig();
  const orchestrator = new CrawlOrchestrator({
    fetcher: new HttpPageFetcher({ userAgent: config.userAgent, timeoutMs: config.timeoutMs }),
    store: new CsvRecordStore(args.recordsPath ?? config.recordsPath),
    sources: LISTING_SOURCES,
    supremeBaseUrl: config.supremeBaseUrl,
    appeals: config.appeals,
    mappingPath: args.mappingPath ?? config.mappingPath,
  });

  const { summary } = await orchestrator.run({ dryRun: args.dryRun });

  console.log(`\nRun ${summary.runId}${summary.dryRun ? ' (dry run)' : ''}`);
  for (const [sourceType, count] of Object.entries(summary.linksPerSource)) {
    console.log(`   ${sourceType}: ${count} links`);
  }
  console.log(`   Scraped:    ${summary.scraped}`);
  console.log(`   Added:      ${summary.added}`);
  console.log(`   Dropped:    ${summary.dropped} (no appeals case number)`);
  console.log(`   Duplicates: ${summary.duplicates}`);
  console.log(`   Total:      ${summary.total}`);
  console.log(`   Mapped:     ${summary.mapped}`);
}

async function mapping(args: CliArgs): Promise<void> {
  const config = CrawlerConfig.getConfig();
  const mappingPath = args.mappingPath ?? config.mappingPath;
  const result = await rebuildMapping(new CsvRecordStore(args.recordsPath ?? config.recordsPath), mappingPath);
  console.log(`\nWrote ${mappingPath} with ${result.mapped} verdict links (${result.mapping.size} appeals cases)`);
}

async function main(): Promise<void> {
  try {
    const args = parseCliArgs(process.argv.slice(2));

    switch (args.command) {
      case 'crawl':
        await crawl(args);
        break;

      case 'mapping':
        await mapping(args);
        break;

      case 'help':
        printHelp();
        break;

      default:
        console.error(`Unknown command: ${args.command}`);
        console.error(`Valid commands: ${COMMANDS.join(', ')}`);
        printHelp();
        process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Command failed', { error: error instanceof Error ? error.message : String(error) });
    console.error('\nCommand failed:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

void main();
