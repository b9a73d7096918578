import fs from 'fs/promises';
import path from 'path';
import type { ScraperConfig } from './scrapers/listings/types.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36';
export const DEFAULT_CATEGORY = 'szemelyauto';
export const DEFAULT_STORAGE_STATE = path.join('data', 'storage_state.json');

type Env = Record<string, string | undefined>;

/** Reads KEY=value lines from a .env file. Variables already set win. */
export async function loadDotEnv(envPath = path.join(process.cwd(), '.env'), env: Env = process.env): Promise<number> {
  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch {
    return 0;
  }

  let applied = 0;
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim().replace(/^export\s+/, '');
    const idx = trimmed.indexOf('=');
    if (!trimmed || trimmed.startsWith('#') || idx <= 0) {
      continue;
    }
    const key = trimmed.slice(0, idx).trim();
    const quoted = trimmed.slice(idx + 1).trim().match(/^(["'])(.*)\1$/);
    const value = quoted ? quoted[2] : trimmed.slice(idx + 1).trim();
    if (env[key] === undefined) {
      env[key] = value;
      applied += 1;
    }
  }
  return applied;
}

function nonNegativeInt(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return value === 'true' || value === '1';
}

function optional(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

export function parseArgs(argv: string[] = process.argv.slice(2)): Partial<ScraperConfig> {
  const config: Partial<ScraperConfig> = {};
  const categories: string[] = [];
  const numeric = (value: string | undefined, apply: (parsed: number) => void): void => {
    const parsed = nonNegativeInt(value);
    if (parsed !== undefined) {
      apply(parsed);
    }
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    const takesValue = next !== undefined && !next.startsWith('--');

    if (arg === '--base-url' && takesValue) {
      config.baseUrl = next;
      i += 1;
    } else if (arg === '--category' && takesValue) {
      categories.push(next);
      i += 1;
    } else if (arg === '--sitemap' && takesValue) {
      config.sitemapUrl = next;
      i += 1;
    } else if (arg === '--max-pages' && takesValue) {
      numeric(next, value => { config.maxPagesPerCategory = value; });
      i += 1;
    } else if (arg === '--max-listings' && takesValue) {
      numeric(next, value => { config.maxListings = value; });
      i += 1;
    } else if (arg === '--delay' && takesValue) {
      numeric(next, value => { config.delayMs = value; });
      i += 1;
    } else if (arg === '--jitter' && takesValue) {
      numeric(next, value => { config.jitterMs = value; });
      i += 1;
    } else if (arg === '--timeout' && takesValue) {
      numeric(next, value => { config.timeoutMs = value; });
      i += 1;
    } else if (arg === '--out' && takesValue) {
      config.dbPath = next;
      i += 1;
    } else if (arg === '--user-agent' && takesValue) {
      config.userAgent = next;
      i += 1;
    } else if (arg === '--browser') {
      config.useBrowserFallback = true;
    } else if (arg === '--browser-only') {
      config.browserOnly = true;
    } else if (arg === '--sitemap-via-browser') {
      config.sitemapViaBrowser = true;
    } else if (arg === '--headful') {
      config.headful = true;
    } else if (arg === '--storage-state' && takesValue) {
      config.storageStatePath = next;
      i += 1;
    } else if (arg === '--save-storage-state' && takesValue) {
      config.saveStorageStatePath = next;
      i += 1;
    } else if (arg === '--manual-auth') {
      config.manualAuth = true;
    } else if (arg === '--auth-url' && takesValue) {
      config.authUrl = next;
      i += 1;
    } else if (arg === '--debug-dir' && takesValue) {
      config.debugDir = next;
      i += 1;
    } else if (arg === '--store-html') {
      config.storeHtml = true;
    } else if (arg === '--no-sitemap') {
      config.useSitemap = false;
    } else if (arg === '--no-resume') {
      config.resume = false;
    } else if (arg === '--verbose') {
      config.verbose = true;
    } else if (arg === '--progress-every' && takesValue) {
      numeric(next, value => { config.progressEvery = value; });
      i += 1;
    }
  }

  if (categories.length > 0) {
    config.categories = categories;
  }
  return config;
}

export function buildConfig(argv: string[] = process.argv.slice(2), env: Env = process.env): ScraperConfig {
  const defaults: ScraperConfig = {
    baseUrl: env.LISTINGS_BASE_URL || 'https://www.hasznaltauto.hu',
    categories: (env.LISTINGS_CATEGORIES || DEFAULT_CATEGORY)
      .split(',')
      .map(category => category.trim())
      .filter(Boolean),
    sitemapUrl: optional(env.LISTINGS_SITEMAP_URL),
    maxPagesPerCategory: nonNegativeInt(env.LISTINGS_MAX_PAGES) ?? 1,
    maxListings: nonNegativeInt(env.LISTINGS_MAX_LISTINGS) ?? 500,
    delayMs: nonNegativeInt(env.LISTINGS_DELAY_MS) ?? 1000,
    jitterMs: nonNegativeInt(env.LISTINGS_JITTER_MS) ?? 500,
    timeoutMs: nonNegativeInt(env.LISTINGS_TIMEOUT_MS) ?? 20000,
    dbPath: env.LISTINGS_DB_PATH || path.join('data', 'listings.sqlite'),
    userAgent: env.LISTINGS_USER_AGENT || DEFAULT_USER_AGENT,
    useBrowserFallback: flag(env.LISTINGS_USE_BROWSER, false),
    browserOnly: flag(env.LISTINGS_BROWSER_ONLY, false),
    sitemapViaBrowser: flag(env.LISTINGS_SITEMAP_VIA_BROWSER, false),
    headful: flag(env.LISTINGS_HEADFUL, false),
    storageStatePath: optional(env.LISTINGS_STORAGE_STATE),
    saveStorageStatePath: optional(env.LISTINGS_SAVE_STORAGE_STATE),
    manualAuth: flag(env.LISTINGS_MANUAL_AUTH, false),
    authUrl: optional(env.LISTINGS_AUTH_URL),
    debugDir: optional(env.LISTINGS_DEBUG_DIR),
    storeHtml: flag(env.LISTINGS_STORE_HTML, false),
    useSitemap: flag(env.LISTINGS_USE_SITEMAP, true),
    resume: flag(env.LISTINGS_RESUME, true),
    verbose: flag(env.LISTINGS_VERBOSE, false),
    progressEvery: nonNegativeInt(env.LISTINGS_PROGRESS_EVERY) ?? 25
  };

  const config: ScraperConfig = { ...defaults, ...parseArgs(argv) };

  if (config.categories.length === 0) {
    config.categories = [DEFAULT_CATEGORY];
  }
  if (config.browserOnly) {
    config.useBrowserFallback = true;
  }
  if (config.manualAuth) {
    config.useBrowserFallback = true;
    config.headful = true;
    config.saveStorageStatePath = config.saveStorageStatePath ?? DEFAULT_STORAGE_STATE;
  }
  return config;
}
