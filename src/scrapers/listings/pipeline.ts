import { createLogger } from '../../logger.js';
import { ListingPageDiscoverer } from './listingPages.js';
import { adIdFromUrl } from './normalize.js';
import { parseListing } from './parser.js';
import { SitemapDiscoverer } from './sitemap.js';
import type { HtmlSource, ListingRecord, ListingRef, ListingStore, RobotsGate, ScraperConfig } from './types.js';

const log = createLogger('pipeline');

export interface ManualAuthenticator {
  openForManualAuth(url: string, waitForOperator: () => Promise<void>): Promise<void>;
}

export interface PipelineDeps {
  config: ScraperConfig;
  source: HtmlSource;
  robots: RobotsGate;
  store: ListingStore;
  authenticator?: ManualAuthenticator | null;
  waitForOperator?: () => Promise<void>;
}

export interface PipelineSummary {
  discovered: number;
  processed: number;
  saved: number;
  skipped: number;
  failed: number;
  discarded: number;
}

export function authUrlFor(config: ScraperConfig): string {
  if (config.authUrl) {
    return config.authUrl;
  }
  const category = (config.categories[0] ?? '').replace(/^\/+|\/+$/g, '');
  return `${config.baseUrl.replace(/\/+$/, '')}/${category}`;
}

async function authenticate(deps: PipelineDeps): Promise<void> {
  const { config, authenticator, waitForOperator } = deps;
  if (!config.manualAuth) {
    return;
  }
  if (!authenticator || !waitForOperator) {
    log.warn('Manual auth requested but no browser is configured; skipping');
    return;
  }
  const url = authUrlFor(config);
  log.info(`Opening browser for manual auth: ${url}`);
  await authenticator.openForManualAuth(url, waitForOperator);
}

export async function discoverListings(deps: PipelineDeps): Promise<ListingRef[]> {
  const { config, source, robots } = deps;
  let refs: ListingRef[] = [];

  if (config.useSitemap) {
    log.info('Loading sitemap URLs...');
    const sitemap = new SitemapDiscoverer(source, {
      baseUrl: config.baseUrl,
      categories: config.categories,
      sitemapUrl: config.sitemapUrl,
      browserFallback: config.sitemapViaBrowser || config.browserOnly,
      debugDir: config.debugDir
    });
    const urls = await sitemap.discover(config.maxListings || undefined);
    refs = urls.map(url => ({ url, adId: adIdFromUrl(url) }));
    log.info(`Sitemap URLs collected: ${refs.length}`);
  }

  if (refs.length === 0) {
    log.info('Falling back to category listing pages...');
    const pages = new ListingPageDiscoverer(source, robots, {
      baseUrl: config.baseUrl,
      categories: config.categories,
      debugDir: config.debugDir
    });
    refs = await pages.discover(config.categories, config.maxPagesPerCategory);
  }

  if (config.maxListings && refs.length > config.maxListings) {
    refs = refs.slice(0, config.maxListings);
  }
  return refs;
}

type ListingOutcome = 'saved' | 'skipped' | 'failed' | 'discarded';

async function processListing(ref: ListingRef, deps: PipelineDeps): Promise<ListingOutcome> {
  const { config, source, store } = deps;
  const knownAdId = ref.adId ?? adIdFromUrl(ref.url);
  if (config.resume && knownAdId !== null && (await store.exists(knownAdId))) {
    log.debug(`Already stored, skipping ${knownAdId}`);
    return 'skipped';
  }

  const html = await source.fetchHtml(ref.url);
  if (html === null) {
    log.warn(`Failed to fetch detail page: ${ref.url}`);
    return 'failed';
  }

  const extracted = parseListing(html, ref.url, config.baseUrl);
  const adId = extracted.adId ?? knownAdId;
  if (adId === null) {
    log.error(`Missing ad id for ${ref.url}; record discarded`);
    return 'discarded';
  }

  const record: ListingRecord = {
    ...extracted,
    adId,
    rawHtml: config.storeHtml ? html : null
  };
  await store.upsert(record);
  log.debug(`Saved ${adId} (${record.images.length} images, ${record.equipment.length} equipment items)`);
  return 'saved';
}

/**
 * Discovery, then fetch, extract and upsert one listing at a time. Failures of
 * single listings are counted and logged; the run carries on.
 */
export async function runPipeline(deps: PipelineDeps): Promise<PipelineSummary> {
  await authenticate(deps);

  const refs = await discoverListings(deps);
  const summary: PipelineSummary = {
    discovered: refs.length,
    processed: 0,
    saved: 0,
    skipped: 0,
    failed: 0,
    discarded: 0
  };
  log.info(`Discovered ${refs.length} listing URLs`);

  const progressEvery = deps.config.progressEvery;
  for (const ref of refs) {
    const outcome = await processListing(ref, deps);
    summary[outcome] += 1;
    summary.processed += 1;
    if (progressEvery > 0 && summary.processed % progressEvery === 0) {
      log.info(
        `Progress: ${summary.processed}/${refs.length} (saved ${summary.saved}, skipped ${summary.skipped}, failed ${summary.failed})`
      );
    }
  }

  log.info(
    `Done: ${summary.processed}/${refs.length} (saved ${summary.saved}, skipped ${summary.skipped}, failed ${summary.failed}, discarded ${summary.discarded})`
  );
  return summary;
}
