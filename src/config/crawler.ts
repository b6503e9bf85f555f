import dotenv from 'dotenv';
import { ConfigError } from '../core/errors.js';
import { SourceType } from '../records/types.js';

dotenv.config();

/**
 * A listing page of the supreme court site and the rule for its detail links
 */
export interface ListingSource {
  type: SourceType;
  /** Path of the listing page, relative to the supreme court base URL */
  listingPath: string;
  /** Detail pages live under this path; the path itself is not a detail page */
  detailPrefix: string;
}

export const LISTING_SOURCES: readonly ListingSource[] = [
  { type: SourceType.VERDICT, listingPath: '/domar/', detailPrefix: '/domar/_domur/' },
  { type: SourceType.DECISION, listingPath: '/akvardanir/', detailPrefix: '/akvardanir/' },
];

/**
 * Where appeals court links may point and which case numbers count
 */
export interface AppealsLinkPolicy {
  host: string;
  linkPath: string;
  minYear: number;
}

export interface CrawlerSettings {
  supremeBaseUrl: string;
  appeals: AppealsLinkPolicy;
  userAgent: string;
  timeoutMs: number;
  recordsPath: string;
  mappingPath: string;
}

function readInteger(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Crawler Configuration
 *
 * Every setting has a default that matches the live sites; .env overrides them.
 */
export class CrawlerConfig {
  private static settings: CrawlerSettings | null = null;

  static getConfig(): CrawlerSettings {
    if (!this.settings) {
      const supremeBaseUrl = process.env.SUPREME_BASE_URL || 'https://www.haestirettur.is';
      try {
        new URL(supremeBaseUrl);
      } catch {
        throw new ConfigError(`SUPREME_BASE_URL is not a valid URL: ${supremeBaseUrl}`);
      }

      this.settings = {
        supremeBaseUrl,
        appeals: {
          host: (process.env.APPEALS_HOST || 'landsrettur.is').toLowerCase(),
          linkPath: process.env.APPEALS_LINK_PATH || '/domar-og-urskurdir/domur-urskurdur/',
          minYear: readInteger('APPEALS_MIN_YEAR', 2018),
        },
        userAgent: process.env.HTTP_USER_AGENT || 'Mozilla/5.0 (X11; Linux x86_64)',
        timeoutMs: readInteger('HTTP_TIMEOUT_MS', 30000),
        recordsPath: process.env.RECORDS_PATH || 'data/case_cross_references.csv',
        mappingPath: process.env.MAPPING_PATH || 'data/appeals_mapping.json',
      };
    }

    return this.settings;
  }

  /**
   * Reset cached settings (useful when environment variables change)
   */
  static resetConfig(): void {
    dotenv.config({ override: true });
    this.settings = null;
  }
}
