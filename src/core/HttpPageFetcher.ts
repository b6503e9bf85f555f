import { HttpError } from './errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('HttpPageFetcher');

/**
 * Source of raw page text. Rejects on network errors and non-2xx responses.
 */
export interface PageFetcher {
  fetchText(url: string): Promise<string>;
}

export interface HttpFetcherOptions {
  userAgent: string;
  timeoutMs: number;
}

/**
 * Plain GET with a fixed User-Agent and a per-request timeout. No retries.
 */
export class HttpPageFetcher implements PageFetcher {
  constructor(private readonly options: HttpFetcherOptions) {}

  async fetchText(url: string): Promise<string> {
    const started = Date.now();
    const response = await fetch(url, {
      method: 'GET',
      headers: { 'User-Agent': this.options.userAgent },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new HttpError(url, response.status, response.statusText);
    }

    const text = await response.text();
    logger.debug('Fetched page', {
      url,
      status: response.status,
      bytes: text.length,
      durationMs: Date.now() - started,
    });
    return text;
  }
}
