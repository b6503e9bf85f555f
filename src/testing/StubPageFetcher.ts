import { HttpError } from '../core/errors.js';
import type { PageFetcher } from '../core/HttpPageFetcher.js';

/**
 * Serves canned pages by URL; anything else is a 404
 */
export class StubPageFetcher implements PageFetcher {
  readonly requests: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetchText(url: string): Promise<string> {
    this.requests.push(url);
    const page = this.pages[url];
    if (page === undefined) {
      throw new HttpError(url, 404, 'Not Found');
    }
    return page;
  }
}
