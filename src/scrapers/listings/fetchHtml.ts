import { createLogger } from '../../logger.js';
import type { BrowserFetchResult } from './browser.js';
import type { FetchOptions, FetchOutcome, FetchResult, HtmlRequestOptions, HtmlSource, RobotsGate } from './types.js';

const log = createLogger('fetch');

export interface PlainFetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>;
}

export interface RenderingFetcher {
  fetch(url: string): Promise<BrowserFetchResult>;
}

export interface FetchStrategy {
  name: string;
  attempt(url: string): Promise<FetchOutcome>;
}

export interface FetchOrchestratorOptions {
  http: PlainFetcher;
  robots: RobotsGate;
  browser?: RenderingFetcher | null;
  useBrowserFallback?: boolean;
  browserOnly?: boolean;
}

export function outcomeFromResult(result: FetchResult): FetchOutcome {
  if (result.isSkipped) {
    return { kind: 'robots-denied' };
  }
  if (result.isBlocked || result.body === null) {
    return result.statusCode === 0 ? { kind: 'transport-failure' } : { kind: 'blocked', statusCode: result.statusCode };
  }
  return { kind: 'ok', body: result.body };
}

/**
 * One `fetchHtml(url)` over robots, plain HTTP and the browser. Robots denial is
 * final; plain HTTP goes first and the browser is only tried after a block.
 */
export class FetchOrchestrator implements HtmlSource {
  private readonly http: PlainFetcher;
  private readonly robots: RobotsGate;
  private readonly browser: RenderingFetcher | null;
  private readonly useBrowserFallback: boolean;
  private readonly browserOnly: boolean;

  constructor(options: FetchOrchestratorOptions) {
    this.http = options.http;
    this.robots = options.robots;
    this.browser = options.browser ?? null;
    this.useBrowserFallback = options.useBrowserFallback ?? false;
    this.browserOnly = options.browserOnly ?? false;
  }

  strategiesFor(options: HtmlRequestOptions = {}): FetchStrategy[] {
    const strategies: FetchStrategy[] = [];
    if (!this.browserOnly) {
      const { ignoreRobots = false, expectHtml = true } = options;
      strategies.push({
        name: 'http',
        attempt: async url => outcomeFromResult(await this.http.fetch(url, { ignoreRobots, expectHtml }))
      });
    }
    const browser = this.browser;
    const fallback = options.browserFallback ?? this.useBrowserFallback;
    if (browser && (this.browserOnly || fallback)) {
      strategies.push({
        name: 'browser',
        attempt: async url => {
          const { body } = await browser.fetch(url);
          return body === null ? { kind: 'unavailable' } : { kind: 'ok', body };
        }
      });
    }
    return strategies;
  }

  async fetchHtml(url: string, options: HtmlRequestOptions = {}): Promise<string | null> {
    if (!options.ignoreRobots && !this.robots.allowed(url)) {
      log.info(`Robots blocked: ${url}`);
      return null;
    }

    const strategies = this.strategiesFor(options);
    if (strategies.length === 0) {
      log.warn(`No fetch strategy available for ${url}`);
      return null;
    }

    for (const [index, strategy] of strategies.entries()) {
      const outcome = await strategy.attempt(url);
      if (outcome.kind === 'ok') {
        return outcome.body;
      }
      if (outcome.kind === 'robots-denied') {
        return null;
      }
      const next = strategies[index + 1];
      if (next) {
        log.info(`${strategy.name} fetch ${outcome.kind} for ${url}; retrying via ${next.name}`);
      }
    }
    return null;
  }
}
