/**
 * Link Discovery
 *
 * Turns a listing page into the ordered set of detail page URLs to scrape.
 * The order fixes scrape order, which in turn decides which of two fresh
 * records sharing a supreme case number survives the merge.
 */

import * as cheerio from 'cheerio';
import type { ListingSource } from '../config/crawler.js';
import { ListingFetchError } from '../core/errors.js';
import type { PageFetcher } from '../core/HttpPageFetcher.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('LinkDiscovery');

/**
 * Collect absolute detail URLs from listing HTML.
 *
 * Keeps anchors on the base URL's origin whose path starts with
 * `detailPrefix` without being the prefix itself (a query string makes it a
 * detail link). Fragments are dropped so in-page anchors to the same detail
 * page collapse into one URL. Non-ASCII path characters come back
 * percent-encoded, as WHATWG URL serialization does.
 *
 * @example
 * discoverDetailLinks('<a href="/d/a2">2</a><a href="/d/a1">1</a><a href="/d/">all</a>',
 *   { detailPrefix: '/d/' }, 'https://court.example')
 * // ['https://court.example/d/a1', 'https://court.example/d/a2']
 */
export function discoverDetailLinks(
  html: string,
  rule: Pick<ListingSource, 'detailPrefix'>,
  baseUrl: string
): string[] {
  const $ = cheerio.load(html);
  const origin = new URL(baseUrl).origin;
  const links = new Set<string>();

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href')?.trim();
    if (!href) {
      return;
    }

    let resolved: URL;
    try {
      resolved = new URL(href, baseUrl);
    } catch {
      return;
    }

    if (resolved.origin !== origin) {
      return;
    }
    // `/d/?id=1` is a detail page; only the bare `/d/` is the listing root
    const target = resolved.pathname + resolved.search;
    if (!resolved.pathname.startsWith(rule.detailPrefix) || target === rule.detailPrefix) {
      return;
    }

    resolved.hash = '';
    links.add(resolved.toString());
  });

  return [...links].sort();
}

/**
 * Fetch a listing page and discover its detail links.
 *
 * Any failure here is fatal: merging against a partial link set would be
 * indistinguishable from the remote site having dropped cases.
 */
export async function fetchListingLinks(
  fetcher: PageFetcher,
  source: ListingSource,
  baseUrl: string
): Promise<string[]> {
  const listingUrl = new URL(source.listingPath, baseUrl).toString();

  let html: string;
  try {
    html = await fetcher.fetchText(listingUrl);
  } catch (error) {
    throw new ListingFetchError(listingUrl, { cause: error });
  }

  const links = discoverDetailLinks(html, source, baseUrl);
  logger.info(`Found ${links.length} ${source.type} links`, { listingUrl });
  return links;
}
