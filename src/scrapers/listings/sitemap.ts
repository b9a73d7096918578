import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { createLogger, errorMessage } from '../../logger.js';
import { writeDebugFile } from './debug.js';
import { MalformedSourceError } from './errors.js';
import type { HtmlSource } from './types.js';

const log = createLogger('sitemap');

const parser = new XMLParser({
  ignoreAttributes: false,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true
});

const SITEMAP_ROOT_RE = /<(?:[\w.-]+:)?(?:urlset|sitemapindex)[\s>/]/i;

export type ParsedSitemap =
  | { kind: 'index'; locs: string[] }
  | { kind: 'urlset'; locs: string[] };

export interface SitemapDiscovererOptions {
  baseUrl: string;
  categories: string[];
  sitemapUrl?: string;
  browserFallback?: boolean;
  debugDir?: string;
}

function asArray<T>(value: T | T[] | undefined | null): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function locsOf(entries: unknown): string[] {
  const locs: string[] = [];
  for (const entry of asArray(entries)) {
    if (!isRecord(entry)) {
      continue;
    }
    const loc = entry.loc;
    if (typeof loc === 'string' && loc.trim()) {
      locs.push(loc.trim());
    }
  }
  return locs;
}

/** Cheap structural check on the head of a response before it is parsed. */
export function looksLikeSitemap(text: string): boolean {
  return SITEMAP_ROOT_RE.test(text.trimStart().slice(0, 300));
}

export function parseSitemap(xml: string, url = 'sitemap'): ParsedSitemap {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new MalformedSourceError(url, `${validation.err.msg} (line ${validation.err.line})`, xml);
  }

  let parsed: unknown;
  try {
    parsed = parser.parse(xml);
  } catch (error) {
    throw new MalformedSourceError(url, errorMessage(error), xml);
  }
  if (!isRecord(parsed)) {
    throw new MalformedSourceError(url, 'empty document', xml);
  }

  const index = parsed.sitemapindex;
  if (index !== undefined) {
    return { kind: 'index', locs: isRecord(index) ? locsOf(index.sitemap) : [] };
  }
  const urlset = parsed.urlset;
  if (urlset !== undefined) {
    return { kind: 'urlset', locs: isRecord(urlset) ? locsOf(urlset.url) : [] };
  }
  throw new MalformedSourceError(url, 'root element is neither urlset nor sitemapindex', xml);
}

export function isListingUrl(url: string, categories: string[]): boolean {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return false;
  }
  if (!pathname) {
    return false;
  }
  return categories.some(category => pathname.includes(`/${category.replace(/^\/+|\/+$/g, '')}/`));
}

function debugName(url: string, suffix: string): string {
  const tail = url.replace(/[?#].*$/, '').split('/').filter(Boolean).pop() ?? 'sitemap';
  return `${tail.replace(/[^\w.-]+/g, '_')}.${suffix}.html`;
}

/**
 * Walks the sitemap tree breadth first and keeps leaf URLs under the configured
 * categories, stopping once `maxUrls` have been collected.
 */
export class SitemapDiscoverer {
  private readonly source: HtmlSource;
  private readonly options: SitemapDiscovererOptions;

  constructor(source: HtmlSource, options: SitemapDiscovererOptions) {
    this.source = source;
    this.options = options;
  }

  get rootUrl(): string {
    return this.options.sitemapUrl ?? `${this.options.baseUrl.replace(/\/+$/, '')}/sitemap/sitemap_index.xml`;
  }

  private async loadDocument(url: string): Promise<ParsedSitemap | null> {
    const text = await this.source.fetchHtml(url, {
      ignoreRobots: true,
      expectHtml: false,
      browserFallback: this.options.browserFallback ?? false
    });
    if (text === null) {
      log.warn(`Sitemap not accessible: ${url}`);
      return null;
    }
    if (!looksLikeSitemap(text)) {
      log.warn(`Sitemap did not return XML: ${url}`);
      await writeDebugFile(this.options.debugDir, debugName(url, 'non-xml'), text);
      return null;
    }
    try {
      return parseSitemap(text, url);
    } catch (error) {
      if (!(error instanceof MalformedSourceError)) {
        throw error;
      }
      log.warn(error.message);
      await writeDebugFile(this.options.debugDir, debugName(url, 'parse-error'), text);
      return null;
    }
  }

  async discover(maxUrls?: number): Promise<string[]> {
    const found = new Set<string>();
    const pending = [this.rootUrl];
    const visited = new Set<string>();

    while (pending.length > 0) {
      const sitemapUrl = pending.shift();
      if (sitemapUrl === undefined || visited.has(sitemapUrl)) {
        continue;
      }
      visited.add(sitemapUrl);

      const document = await this.loadDocument(sitemapUrl);
      if (!document) {
        continue;
      }
      if (document.kind === 'index') {
        pending.push(...document.locs.filter(loc => !visited.has(loc)));
        log.debug(`Index ${sitemapUrl}: ${document.locs.length} nested sitemaps`);
        continue;
      }

      for (const url of document.locs) {
        if (!isListingUrl(url, this.options.categories)) {
          continue;
        }
        found.add(url);
        if (maxUrls && found.size >= maxUrls) {
          log.info(`Sitemap URL limit reached (${maxUrls})`);
          return [...found];
        }
      }
    }

    return [...found];
  }
}
