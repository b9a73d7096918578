#!/usr/bin/env node
import { buildConfig, loadDotEnv } from './config.js';
import { createLogger, errorMessage, setLogLevel } from './logger.js';
import { createOperatorWait } from './operatorPrompt.js';
import { BrowserFetcher } from './scrapers/listings/browser.js';
import { ListingDb } from './scrapers/listings/db.js';
import { StartupError } from './scrapers/listings/errors.js';
import { FetchOrchestrator } from './scrapers/listings/fetchHtml.js';
import { HttpClient } from './scrapers/listings/httpClient.js';
import { runPipeline } from './scrapers/listings/pipeline.js';
import { RobotsPolicy } from './scrapers/listings/robots.js';

const log = createLogger('scraper');

async function run(): Promise<void> {
  await loadDotEnv();
  const config = buildConfig();
  if (config.verbose) {
    setLogLevel('debug');
  }

  const db = await ListingDb.create(config.dbPath);
  const http = new HttpClient({
    userAgent: config.userAgent,
    delayMs: config.delayMs,
    jitterMs: config.jitterMs,
    timeoutMs: config.timeoutMs
  });
  const robots = new RobotsPolicy(config.baseUrl, config.userAgent);
  http.setRobots(robots);

  const browser = config.useBrowserFallback
    ? new BrowserFetcher({
        timeoutMs: Math.max(config.timeoutMs, 30000),
        headless: !config.headful,
        userAgent: config.userAgent,
        storageStatePath: config.storageStatePath,
        saveStorageStatePath: config.saveStorageStatePath
      })
    : null;

  try {
    await robots.load((url, options) => http.fetch(url, options));
    const crawlDelayMs = robots.crawlDelayMs();
    if (crawlDelayMs !== null && crawlDelayMs > http.getDelay()) {
      log.info(`Honouring robots.txt crawl-delay of ${crawlDelayMs}ms`);
      http.setDelay(crawlDelayMs);
    }

    // Without a working browser these modes cannot do anything useful.
    if (browser && (config.browserOnly || config.manualAuth)) {
      await browser.start();
    }

    const source = new FetchOrchestrator({
      http,
      robots,
      browser,
      useBrowserFallback: config.useBrowserFallback,
      browserOnly: config.browserOnly
    });

    const summary = await runPipeline({
      config,
      source,
      robots,
      store: db,
      authenticator: browser,
      waitForOperator: createOperatorWait()
    });
    log.info(`Stored listings: ${db.count()} (${config.dbPath})`);
    if (summary.discovered === 0) {
      log.warn('No listing URLs were discovered');
    }
  } finally {
    await browser?.close();
    await db.close();
  }
}

run().catch(error => {
  if (error instanceof StartupError) {
    log.error(error.message);
  } else {
    log.error(`Listing scraper failed: ${errorMessage(error)}`);
  }
  process.exitCode = 1;
});
