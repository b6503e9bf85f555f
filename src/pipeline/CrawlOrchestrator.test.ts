import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { ListingSource } from '../config/crawler.js';
import { ListingFetchError } from '../core/errors.js';
import { SourceType, type CaseRecord } from '../records/types.js';
import { CsvRecordStore } from '../storage/CsvRecordStore.js';
import { MemoryRecordStore } from '../storage/RecordStore.js';
import { StubPageFetcher } from '../testing/StubPageFetcher.js';
import { CrawlOrchestrator } from './CrawlOrchestrator.js';

const BASE = 'https://court.example';
const APPEALS = { host: 'landsrettur.is', linkPath: '/domar-og-urskurdir/domur-urskurdur/', minYear: 2018 };
const APPEALS_URL = 'https://landsrettur.is/domar-og-urskurdir/domur-urskurdur/m1/';

const VERDICTS: ListingSource = { type: SourceType.VERDICT, listingPath: '/list/', detailPrefix: '/d/' };
const DECISIONS: ListingSource = { type: SourceType.DECISION, listingPath: '/decisions/', detailPrefix: '/k/' };

function sitePages(): Record<string, string> {
  return {
    'https://court.example/list/': '<ul><li><a href="/d/a2">A2</a></li><li><a href="/d/a1">A1</a></li></ul>',
    'https://court.example/d/a1': `<h1>Mál nr. 2024-10</h1><a href="${APPEALS_URL}">Landsréttur</a>`,
    'https://court.example/d/a2': '<h1>Mál nr. 2024-11</h1><p>Ekki áfrýjað frá Landsrétti</p>',
    [APPEALS_URL]: '<h1>Mál nr. 12/2020</h1>',
  };
}

const EXPECTED_RECORD: CaseRecord = {
  supreme_case_number: '2024-10',
  supreme_case_link: 'https://court.example/d/a1',
  appeals_case_number: '12/2020',
  appeals_case_link: APPEALS_URL,
  source_type: SourceType.VERDICT,
};

async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'crawl-'));
}

test('CrawlOrchestrator: keeps only the record with a resolved appeals case', async () => {
  const dir = await tempDir();
  const mappingPath = path.join(dir, 'mapping.json');
  const store = new MemoryRecordStore();
  const orchestrator = new CrawlOrchestrator({
    fetcher: new StubPageFetcher(sitePages()),
    store,
    sources: [VERDICTS],
    supremeBaseUrl: BASE,
    appeals: APPEALS,
    mappingPath,
  });

  const { summary, records } = await orchestrator.run();

  assert.deepEqual(records, [EXPECTED_RECORD]);
  assert.deepEqual(await store.load(), [EXPECTED_RECORD]);
  assert.deepEqual(JSON.parse(await fs.readFile(mappingPath, 'utf-8')), {
    '12/2020': {
      supreme_case_number: '2024-10',
      supreme_case_link: 'https://court.example/d/a1',
      appeals_case_link: APPEALS_URL,
      source_type: 'verdict',
    },
  });
  assert.deepEqual(summary.linksPerSource, { verdict: 2 });
  assert.equal(summary.scraped, 2);
  assert.equal(summary.added, 1);
  assert.equal(summary.dropped, 1);
  assert.equal(summary.total, 1);
  assert.equal(summary.mapped, 1);
});

test('CrawlOrchestrator: a second run over unchanged pages rewrites identical files', async () => {
  const dir = await tempDir();
  const recordsPath = path.join(dir, 'records.csv');
  const mappingPath = path.join(dir, 'mapping.json');
  const crawl = () =>
    new CrawlOrchestrator({
      fetcher: new StubPageFetcher(sitePages()),
      store: new CsvRecordStore(recordsPath),
      sources: [VERDICTS],
      supremeBaseUrl: BASE,
      appeals: APPEALS,
      mappingPath,
    }).run();

  await crawl();
  const recordsAfterFirst = await fs.readFile(recordsPath);
  const mappingAfterFirst = await fs.readFile(mappingPath);

  const { summary } = await crawl();

  assert.deepEqual(await fs.readFile(recordsPath), recordsAfterFirst);
  assert.deepEqual(await fs.readFile(mappingPath), mappingAfterFirst);
  assert.equal(summary.added, 0);
  assert.equal(summary.duplicates, 1);
  assert.equal(summary.total, 1);
});

test('CrawlOrchestrator: stored record wins over a rescraped one', async () => {
  const prior: CaseRecord = { ...EXPECTED_RECORD, appeals_case_number: '99/2019', appeals_case_link: '' };
  const store = new MemoryRecordStore([prior]);

  const { records, mapping } = await new CrawlOrchestrator({
    fetcher: new StubPageFetcher(sitePages()),
    store,
    sources: [VERDICTS],
    supremeBaseUrl: BASE,
    appeals: APPEALS,
  }).run();

  assert.deepEqual(records, [prior]);
  assert.deepEqual([...mapping.keys()], ['99/2019']);
});

test('CrawlOrchestrator: failed listing aborts before any detail page and writes nothing', async () => {
  const dir = await tempDir();
  const mappingPath = path.join(dir, 'mapping.json');
  const fetcher = new StubPageFetcher(sitePages());
  const store = new MemoryRecordStore([EXPECTED_RECORD]);

  await assert.rejects(
    new CrawlOrchestrator({
      fetcher,
      store,
      sources: [VERDICTS, DECISIONS],
      supremeBaseUrl: BASE,
      appeals: APPEALS,
      mappingPath,
    }).run(),
    ListingFetchError
  );

  assert.deepEqual(fetcher.requests, ['https://court.example/list/', 'https://court.example/decisions/']);
  assert.equal(store.saveCount, 0);
  await assert.rejects(fs.access(mappingPath));
});

test('CrawlOrchestrator: dry run leaves the store and lookup untouched', async () => {
  const dir = await tempDir();
  const mappingPath = path.join(dir, 'mapping.json');
  const store = new MemoryRecordStore();

  const { summary } = await new CrawlOrchestrator({
    fetcher: new StubPageFetcher(sitePages()),
    store,
    sources: [VERDICTS],
    supremeBaseUrl: BASE,
    appeals: APPEALS,
    mappingPath,
  }).run({ dryRun: true });

  assert.equal(summary.dryRun, true);
  assert.equal(summary.total, 1);
  assert.equal(store.saveCount, 0);
  await assert.rejects(fs.access(mappingPath));
});

test('CrawlOrchestrator: an unreachable detail page is skipped and the run completes', async () => {
  const pages = sitePages();
  delete pages['https://court.example/d/a2'];
  const store = new MemoryRecordStore();

  const { summary, records } = await new CrawlOrchestrator({
    fetcher: new StubPageFetcher(pages),
    store,
    sources: [VERDICTS],
    supremeBaseUrl: BASE,
    appeals: APPEALS,
  }).run();

  assert.deepEqual(records, [EXPECTED_RECORD]);
  assert.equal(summary.scraped, 2);
  assert.equal(summary.dropped, 1);
  assert.equal(store.saveCount, 1);
});

test('CrawlOrchestrator: link to a foreign host is never fetched', async () => {
  const foreign = 'https://evil.example/domar-og-urskurdir/domur-urskurdur/m1/';
  const pages = {
    ...sitePages(),
    'https://court.example/d/a1': `<h1>Mál nr. 2024-10</h1><a href="${foreign}">Landsréttur</a>`,
    [foreign]: '<h1>Mál nr. 12/2020</h1>',
  };
  const fetcher = new StubPageFetcher(pages);

  const { records } = await new CrawlOrchestrator({
    fetcher,
    store: new MemoryRecordStore(),
    sources: [VERDICTS],
    supremeBaseUrl: BASE,
    appeals: APPEALS,
  }).run();

  assert.deepEqual(records, []);
  assert.equal(fetcher.requests.includes(foreign), false);
});

test('CrawlOrchestrator: tags records with the listing they came from', async () => {
  const pages = {
    ...sitePages(),
    'https://court.example/decisions/': '<a href="/k/b1">B1</a>',
    'https://court.example/k/b1': `<p>2024-20</p><a href="${APPEALS_URL}">Landsréttur</a>`,
  };

  const { records, mapping } = await new CrawlOrchestrator({
    fetcher: new StubPageFetcher(pages),
    store: new MemoryRecordStore(),
    sources: [VERDICTS, DECISIONS],
    supremeBaseUrl: BASE,
    appeals: APPEALS,
  }).run();

  assert.deepEqual(
    records.map((r) => [r.supreme_case_number, r.source_type]),
    [
      ['2024-10', SourceType.VERDICT],
      ['2024-20', SourceType.DECISION],
    ]
  );
  const group = mapping.get('12/2020');
  assert.ok(Array.isArray(group));
  assert.equal(group.length, 2);
});
