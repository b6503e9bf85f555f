import type { PageFetcher } from '../core/HttpPageFetcher.js';
import { describeError } from '../core/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('CrossReferenceResolver');

// e.g. "512/2019"; not when glued to letters such as "á" or "ð"
const APPEALS_NUMBER_PATTERN = /(?<![\p{L}\p{N}_])(\d+)\/(20\d{2})(?![\p{L}\p{N}_])/gu;

/**
 * First "number/year" in document order whose year is at least `minYear`.
 * Earlier matches below the cutoff (old reference numbers, dates) are skipped.
 */
export function findAppealsCaseNumber(text: string, minYear: number): string | undefined {
  for (const match of text.matchAll(APPEALS_NUMBER_PATTERN)) {
    const [, number, year] = match;
    if (Number(year) >= minYear) {
      return `${number}/${year}`;
    }
  }
  return undefined;
}

/**
 * Looks up the appeals case number on an appeals court detail page
 */
export class CrossReferenceResolver {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly minYear: number
  ) {}

  /**
   * @returns the case number, or '' when the page cannot be fetched or has none
   */
  async resolve(url: string): Promise<string> {
    logger.debug('Fetching appeals page', { url });

    let page: string;
    try {
      page = await this.fetcher.fetchText(url);
    } catch (error) {
      logger.warn('Failed to fetch appeals page', { url, error: describeError(error) });
      return '';
    }

    return findAppealsCaseNumber(page, this.minYear) ?? '';
  }
}
