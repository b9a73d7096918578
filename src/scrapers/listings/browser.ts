import fs from 'fs/promises';
import path from 'path';
import { createLogger, errorMessage } from '../../logger.js';
import { StartupError } from './errors.js';

const log = createLogger('browser');

export interface BrowserFetchResult {
  url: string;
  body: string | null;
}

/** The slice of Playwright's page/context/browser surface the fetcher drives. */
export interface BrowserPage {
  goto(url: string, options: { waitUntil: 'networkidle' | 'domcontentloaded'; timeout: number }): Promise<unknown>;
  content(): Promise<string>;
  close(): Promise<void>;
}

export interface BrowserSession {
  newPage(): Promise<BrowserPage>;
  storageState(options: { path: string }): Promise<unknown>;
  close(): Promise<void>;
}

export interface BrowserContextSettings {
  locale: string;
  timezoneId: string;
  userAgent?: string;
  extraHTTPHeaders: Record<string, string>;
  storageState?: string;
}

export interface BrowserEngine {
  newContext(settings: BrowserContextSettings): Promise<BrowserSession>;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: { headless: boolean }) => Promise<BrowserEngine>;

export interface BrowserFetcherOptions {
  timeoutMs?: number;
  headless?: boolean;
  userAgent?: string;
  locale?: string;
  timezoneId?: string;
  acceptLanguage?: string;
  storageStatePath?: string;
  saveStorageStatePath?: string;
  launch?: BrowserLauncher;
}

const launchChromium: BrowserLauncher = async ({ headless }) => {
  const { chromium } = await import('playwright');
  return chromium.launch({ headless });
};

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class BrowserFetcher {
  private readonly options: Required<Omit<BrowserFetcherOptions, 'userAgent' | 'storageStatePath' | 'saveStorageStatePath'>> &
    Pick<BrowserFetcherOptions, 'userAgent' | 'storageStatePath' | 'saveStorageStatePath'>;
  private engine: BrowserEngine | null = null;
  private session: BrowserSession | null = null;
  private starting: Promise<BrowserSession> | null = null;

  constructor(options: BrowserFetcherOptions = {}) {
    this.options = {
      timeoutMs: options.timeoutMs ?? 30000,
      headless: options.headless ?? true,
      userAgent: options.userAgent,
      locale: options.locale ?? 'hu-HU',
      timezoneId: options.timezoneId ?? 'Europe/Budapest',
      acceptLanguage: options.acceptLanguage ?? 'hu-HU,hu;q=0.9,en-US;q=0.8,en;q=0.7',
      storageStatePath: options.storageStatePath,
      saveStorageStatePath: options.saveStorageStatePath,
      launch: options.launch ?? launchChromium
    };
  }

  isStarted(): boolean {
    return this.session !== null;
  }

  /** Launches the engine and context. Throws StartupError when the engine is unavailable. */
  async start(): Promise<BrowserSession> {
    if (this.session) {
      return this.session;
    }
    if (!this.starting) {
      this.starting = this.launchSession().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async launchSession(): Promise<BrowserSession> {
    let engine: BrowserEngine;
    try {
      engine = await this.options.launch({ headless: this.options.headless });
    } catch (error) {
      throw new StartupError(`Browser engine unavailable: ${errorMessage(error)}`, { cause: error });
    }

    const settings: BrowserContextSettings = {
      locale: this.options.locale,
      timezoneId: this.options.timezoneId,
      extraHTTPHeaders: { 'Accept-Language': this.options.acceptLanguage }
    };
    if (this.options.userAgent) {
      settings.userAgent = this.options.userAgent;
    }
    const statePath = this.options.storageStatePath;
    if (statePath) {
      if (await fileExists(statePath)) {
        settings.storageState = statePath;
        log.info(`Restoring browser session from ${statePath}`);
      } else {
        log.warn(`Storage state not found: ${statePath}`);
      }
    }

    try {
      this.session = await engine.newContext(settings);
    } catch (error) {
      await engine.close();
      throw new StartupError(`Browser context could not be created: ${errorMessage(error)}`, { cause: error });
    }
    this.engine = engine;
    return this.session;
  }

  async fetch(url: string): Promise<BrowserFetchResult> {
    let session: BrowserSession;
    try {
      session = await this.start();
    } catch (error) {
      log.warn(`Browser unavailable for ${url} (${errorMessage(error)})`);
      return { url, body: null };
    }

    let page: BrowserPage | null = null;
    try {
      page = await session.newPage();
      await page.goto(url, { waitUntil: 'networkidle', timeout: this.options.timeoutMs });
      return { url, body: await page.content() };
    } catch (error) {
      log.warn(`Browser fetch failed: ${url} (${errorMessage(error)})`);
      return { url, body: null };
    } finally {
      if (page) {
        await page.close().catch(error => log.debug(`Page close failed: ${errorMessage(error)}`));
      }
    }
  }

  /**
   * Opens `url` in the (visible) browser, waits for the operator to solve the
   * challenge, then persists the session for later runs.
   */
  async openForManualAuth(url: string, waitForOperator: () => Promise<void>): Promise<void> {
    const session = await this.start();
    const page = await session.newPage();
    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.options.timeoutMs });
    } catch (error) {
      log.warn(`Manual auth page did not finish loading: ${url} (${errorMessage(error)})`);
    }
    try {
      await waitForOperator();
    } finally {
      await page.close().catch(error => log.debug(`Page close failed: ${errorMessage(error)}`));
    }

    const savePath = this.options.saveStorageStatePath;
    if (savePath) {
      await this.saveStorageState(savePath);
    }
  }

  async saveStorageState(filePath: string): Promise<void> {
    const session = await this.start();
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await session.storageState({ path: filePath });
    log.info(`Saved storage state: ${filePath}`);
  }

  async close(): Promise<void> {
    const session = this.session;
    const engine = this.engine;
    this.session = null;
    this.engine = null;
    if (session) {
      await session.close().catch(error => log.warn(`Context close failed: ${errorMessage(error)}`));
    }
    if (engine) {
      await engine.close().catch(error => log.warn(`Browser close failed: ${errorMessage(error)}`));
    }
  }
}
