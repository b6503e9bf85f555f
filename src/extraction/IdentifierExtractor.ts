/**
 * Identifier Extractor
 *
 * Pulls the supreme case number and the appeals court link out of a supreme
 * court detail page. The scanning functions are pure; scrapeDetailPage wraps
 * them with the two fetches a record needs.
 */

import type { AppealsLinkPolicy } from '../config/crawler.js';
import type { PageFetcher } from '../core/HttpPageFetcher.js';
import { describeError } from '../core/errors.js';
import type { CaseRecord, SourceType } from '../records/types.js';
import { createLogger } from '../utils/logger.js';
import type { CrossReferenceResolver } from './CrossReferenceResolver.js';

const logger = createLogger('IdentifierExtractor');

// e.g. "2025-106"; Icelandic letters count as word characters on either side
const SUPREME_NUMBER_PATTERN = /(?<![\p{L}\p{N}_])(\d{4}-\d+)(?![\p{L}\p{N}_])/u;

export interface DetailIdentifiers {
  supremeCaseNumber?: string;
  appealsCaseLink?: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function findSupremeCaseNumber(text: string): string | undefined {
  return SUPREME_NUMBER_PATTERN.exec(text)?.[1];
}

/**
 * True when the URL's host is `host` itself or one of its subdomains
 */
export function isAcceptedHost(url: string, host: string): boolean {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }
  const accepted = host.toLowerCase();
  return hostname === accepted || hostname.endsWith(`.${accepted}`);
}

/**
 * First URL in the text pointing at an appeals detail path on the accepted
 * host family. Lookalike links on other hosts are skipped.
 */
export function findAppealsLink(
  text: string,
  policy: Pick<AppealsLinkPolicy, 'host' | 'linkPath'>
): string | undefined {
  const pattern = new RegExp(`https?://[^\\s"'<>/]+${escapeRegExp(policy.linkPath)}[^\\s"'<>]+`, 'g');
  for (const match of text.matchAll(pattern)) {
    if (isAcceptedHost(match[0], policy.host)) {
      return match[0];
    }
  }
  return undefined;
}

export function extractDetailIdentifiers(
  text: string,
  policy: Pick<AppealsLinkPolicy, 'host' | 'linkPath'>
): DetailIdentifiers {
  return {
    supremeCaseNumber: findSupremeCaseNumber(text),
    appealsCaseLink: findAppealsLink(text, policy),
  };
}

/**
 * Scrape one detail page into a record.
 *
 * A detail page that cannot be fetched yields a record with empty
 * identifiers; the merge drops it because it has no appeals case number.
 */
export async function scrapeDetailPage(
  fetcher: PageFetcher,
  resolver: Pick<CrossReferenceResolver, 'resolve'>,
  policy: Pick<AppealsLinkPolicy, 'host' | 'linkPath'>,
  url: string,
  sourceType: SourceType
): Promise<CaseRecord> {
  const record: CaseRecord = {
    supreme_case_number: '',
    supreme_case_link: url,
    appeals_case_number: '',
    appeals_case_link: '',
    source_type: sourceType,
  };

  let html: string;
  try {
    html = await fetcher.fetchText(url);
  } catch (error) {
    logger.warn('Failed to fetch detail page', { url, error: describeError(error) });
    return record;
  }

  const identifiers = extractDetailIdentifiers(html, policy);
  record.supreme_case_number = identifiers.supremeCaseNumber ?? '';

  if (identifiers.appealsCaseLink) {
    record.appeals_case_link = identifiers.appealsCaseLink;
    record.appeals_case_number = await resolver.resolve(identifiers.appealsCaseLink);
  }

  logger.debug('Scraped detail page', {
    url,
    supreme: record.supreme_case_number,
    appeals: record.appeals_case_number,
  });
  return record;
}
