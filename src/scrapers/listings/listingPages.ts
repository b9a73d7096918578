import * as cheerio from 'cheerio';
import { createLogger } from '../../logger.js';
import { writeDebugFile } from './debug.js';
import { dedupe, isOnSite, resolveUrl, siteDomain } from './normalize.js';
import type { HtmlSource, ListingRef, RobotsGate } from './types.js';

const log = createLogger('listing-pages');

export const PAGINATION_MARKERS = ['page', 'oldal', 'lap'];

export interface ListingPageDiscovererOptions {
  baseUrl: string;
  categories: string[];
  debugDir?: string;
}

interface FrontierEntry {
  url: string;
  depth: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

function listingPatterns(category: string): RegExp[] {
  const segment = escapeRegExp(trimSlashes(category));
  return [
    new RegExp(`/${segment}/.+-(\\d+)(?:/|$|\\.html$)`),
    new RegExp(`/${segment}/.+/(\\d+)(?:/|$)`)
  ];
}

export function frontierKey(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.hash = '';
    return parsed.toString();
  } catch {
    return url;
  }
}

export function dedupeListingRefs(refs: ListingRef[]): ListingRef[] {
  return dedupe(refs, ref => `${ref.url}\u0000${ref.adId ?? ''}`);
}

export function extractListingUrls(html: string, baseUrl: string, categories: string[]): ListingRef[] {
  const $ = cheerio.load(html);
  const domain = siteDomain(baseUrl);
  const patterns = categories.map(listingPatterns);
  const found: ListingRef[] = [];

  $('a[href]').each((_idx, element) => {
    const fullUrl = resolveUrl($(element).attr('href') ?? '', baseUrl);
    if (!fullUrl || !isOnSite(fullUrl, domain)) {
      return;
    }
    const pathname = new URL(fullUrl).pathname;
    for (const rules of patterns) {
      const match = rules.map(rule => pathname.match(rule)).find(Boolean);
      if (match) {
        found.push({ url: fullUrl, adId: Number.parseInt(match[1], 10) });
        break;
      }
    }
  });

  return dedupeListingRefs(found);
}

export function extractPaginationUrls(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const domain = siteDomain(pageUrl);
  const urls: string[] = [];

  $('a[href]').each((_idx, element) => {
    const href = ($(element).attr('href') ?? '').trim();
    if (!href || !PAGINATION_MARKERS.some(marker => href.includes(marker))) {
      return;
    }
    const fullUrl = resolveUrl(href, pageUrl);
    if (fullUrl && isOnSite(fullUrl, domain) && !urls.includes(fullUrl)) {
      urls.push(fullUrl);
    }
  });

  return urls;
}

/**
 * Breadth-first crawl of category landing pages and their pagination. Each
 * category gets its own frontier and at most `maxPagesPerCategory` fetches.
 */
export class ListingPageDiscoverer {
  private readonly source: HtmlSource;
  private readonly robots: RobotsGate;
  private readonly options: ListingPageDiscovererOptions;

  constructor(source: HtmlSource, robots: RobotsGate, options: ListingPageDiscovererOptions) {
    this.source = source;
    this.robots = robots;
    this.options = options;
  }

  categoryUrl(category: string): string {
    return `${this.options.baseUrl.replace(/\/+$/, '')}/${trimSlashes(category)}`;
  }

  async discover(categories: string[] = this.options.categories, maxPagesPerCategory = 1): Promise<ListingRef[]> {
    const refs: ListingRef[] = [];
    for (const category of categories) {
      const found = await this.crawlCategory(category, categories, maxPagesPerCategory);
      log.info(`Category ${category}: ${found.length} listing URLs`);
      refs.push(...found);
    }
    return dedupeListingRefs(refs);
  }

  private async crawlCategory(category: string, categories: string[], maxPages: number): Promise<ListingRef[]> {
    const refs: ListingRef[] = [];
    const queue: FrontierEntry[] = [{ url: this.categoryUrl(category), depth: 0 }];
    const queued = new Set<string>([frontierKey(queue[0].url)]);
    const visited = new Set<string>();

    while (queue.length > 0 && visited.size < maxPages) {
      const entry = queue.shift();
      if (!entry) {
        break;
      }
      const key = frontierKey(entry.url);
      if (visited.has(key)) {
        continue;
      }
      visited.add(key);
      log.debug(`Listing page ${entry.url} (depth ${entry.depth})`);

      const html = await this.source.fetchHtml(entry.url);
      if (html === null) {
        log.warn(`Failed to fetch listing page: ${entry.url}`);
        continue;
      }

      const extracted = extractListingUrls(html, this.options.baseUrl, categories);
      if (extracted.length === 0) {
        await writeDebugFile(this.options.debugDir, `listing_page_${visited.size}.html`, html);
      }
      refs.push(...extracted);

      for (const nextUrl of extractPaginationUrls(html, entry.url)) {
        const nextKey = frontierKey(nextUrl);
        if (visited.has(nextKey) || queued.has(nextKey)) {
          continue;
        }
        if (!this.robots.allowed(nextUrl)) {
          log.info(`Pagination blocked by robots: ${nextUrl}`);
          continue;
        }
        queued.add(nextKey);
        queue.push({ url: nextUrl, depth: entry.depth + 1 });
      }
    }

    return refs;
  }
}
