/**
 * Crawl Orchestrator
 *
 * Runs one crawl end to end, strictly sequentially:
 *   load prior records → discover links (both listings) → scrape each link →
 *   merge → save records → rebuild the appeals lookup.
 *
 * Link discovery for both listings happens before any detail page is
 * fetched, so a broken listing aborts the run early and nothing is written.
 */

import { randomUUID } from 'crypto';
import type { AppealsLinkPolicy, ListingSource } from '../config/crawler.js';
import type { PageFetcher } from '../core/HttpPageFetcher.js';
import { CrossReferenceResolver } from '../extraction/CrossReferenceResolver.js';
import { scrapeDetailPage } from '../extraction/IdentifierExtractor.js';
import { fetchListingLinks } from '../extraction/LinkDiscovery.js';
import { buildAppealsMapping, countMappedRecords } from '../records/MappingBuilder.js';
import { mergeRecords } from '../records/MergeEngine.js';
import type { AppealsMapping, CaseRecord } from '../records/types.js';
import type { RecordStore } from '../storage/RecordStore.js';
import { writeMappingFile } from '../storage/mappingFile.js';
import { RunLogger } from '../utils/logger.js';

export interface CrawlDependencies {
  fetcher: PageFetcher;
  store: RecordStore;
  sources: readonly ListingSource[];
  supremeBaseUrl: string;
  appeals: AppealsLinkPolicy;
  /** Where the lookup JSON goes; omitted means the lookup is only returned */
  mappingPath?: string;
}

export interface CrawlOptions {
  /** Scrape and merge but write neither the records nor the lookup */
  dryRun?: boolean;
}

export interface CrawlSummary {
  runId: string;
  linksPerSource: Record<string, number>;
  scraped: number;
  priorTotal: number;
  added: number;
  dropped: number;
  duplicates: number;
  total: number;
  mapped: number;
  skipped: number;
  dryRun: boolean;
}

export interface CrawlResult {
  summary: CrawlSummary;
  records: CaseRecord[];
  mapping: AppealsMapping;
}

export class CrawlOrchestrator {
  private readonly resolver: CrossReferenceResolver;

  constructor(private readonly deps: CrawlDependencies) {
    this.resolver = new CrossReferenceResolver(deps.fetcher, deps.appeals.minYear);
  }

  async run(options: CrawlOptions = {}): Promise<CrawlResult> {
    const runId = randomUUID().slice(0, 8);
    const log = new RunLogger(runId);
    const dryRun = options.dryRun ?? false;
    log.started({ dryRun, sources: this.deps.sources.map((source) => source.type) });

    try {
      const prior = await this.deps.store.load();
      log.info(`Loaded ${prior.length} existing records`);

      const discovered: { source: ListingSource; links: string[] }[] = [];
      for (const source of this.deps.sources) {
        const links = await fetchListingLinks(this.deps.fetcher, source, this.deps.supremeBaseUrl);
        discovered.push({ source, links });
      }

      const fresh: CaseRecord[] = [];
      for (const { source, links } of discovered) {
        for (const url of links) {
          log.debug('Scraping detail page', { url, sourceType: source.type });
          const record = await scrapeDetailPage(this.deps.fetcher, this.resolver, this.deps.appeals, url, source.type);
          if (!record.supreme_case_number) {
            log.warn('Detail page yielded no supreme case number', { url, sourceType: source.type });
          }
          fresh.push(record);
        }
      }

      const merged = mergeRecords(prior, fresh);
      log.info(`Merged: ${merged.added} new rows, total ${merged.records.length}`, {
        dropped: merged.dropped,
        duplicates: merged.duplicates,
      });

      const { mapping, skipped } = buildAppealsMapping(merged.records);
      const mapped = countMappedRecords(mapping);

      if (dryRun) {
        log.info('Dry run: nothing written');
      } else {
        await this.deps.store.save(merged.records);
        if (this.deps.mappingPath) {
          await writeMappingFile(this.deps.mappingPath, mapping);
          log.info(`Wrote ${this.deps.mappingPath} with ${mapped} verdict links`, { skipped });
        }
      }

      const summary: CrawlSummary = {
        runId,
        linksPerSource: Object.fromEntries(discovered.map(({ source, links }) => [source.type, links.length])),
        scraped: fresh.length,
        priorTotal: prior.length,
        added: merged.added,
        dropped: merged.dropped,
        duplicates: merged.duplicates,
        total: merged.records.length,
        mapped,
        skipped,
        dryRun,
      };
      log.completed({ ...summary });

      return { summary, records: merged.records, mapping };
    } catch (error) {
      log.failed(error);
      throw error;
    }
  }
}
