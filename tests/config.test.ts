import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_STORAGE_STATE, buildConfig, loadDotEnv, parseArgs } from '../src/config.js';

describe('buildConfig', () => {
  it('uses defaults without flags or environment', () => {
    const config = buildConfig([], {});

    expect(config).toMatchObject({
      baseUrl: 'https://www.hasznaltauto.hu',
      categories: ['szemelyauto'],
      maxPagesPerCategory: 1,
      maxListings: 500,
      delayMs: 1000,
      jitterMs: 500,
      timeoutMs: 20000,
      dbPath: path.join('data', 'listings.sqlite'),
      useBrowserFallback: false,
      browserOnly: false,
      manualAuth: false,
      useSitemap: true,
      resume: true,
      storeHtml: false,
      progressEvery: 25
    });
    expect(config.sitemapUrl).toBeUndefined();
  });

  it('reads environment variables and lets flags override them', () => {
    const config = buildConfig(['--delay', '2500', '--category', 'motor', '--category', 'teherauto', '--no-resume'], {
      LISTINGS_DELAY_MS: '1500',
      LISTINGS_MAX_LISTINGS: '50',
      LISTINGS_CATEGORIES: 'szemelyauto, lakoauto'
    });

    expect(config.delayMs).toBe(2500);
    expect(config.maxListings).toBe(50);
    expect(config.categories).toEqual(['motor', 'teherauto']);
    expect(config.resume).toBe(false);
  });

  it('splits the category list from the environment', () => {
    expect(buildConfig([], { LISTINGS_CATEGORIES: 'szemelyauto, lakoauto,' }).categories).toEqual(['szemelyauto', 'lakoauto']);
    expect(buildConfig([], { LISTINGS_CATEGORIES: ' , ' }).categories).toEqual(['szemelyauto']);
  });

  it('ignores negative or non-numeric numbers', () => {
    const config = buildConfig(['--max-pages', 'sok', '--jitter', '0', '--max-listings', '0'], { LISTINGS_TIMEOUT_MS: '-5' });

    expect(config.maxPagesPerCategory).toBe(1);
    expect(config.jitterMs).toBe(0);
    expect(config.maxListings).toBe(0);
    expect(config.timeoutMs).toBe(20000);
  });

  it('turns the browser on for browser-only and manual auth', () => {
    expect(buildConfig(['--browser-only'], {})).toMatchObject({ browserOnly: true, useBrowserFallback: true });
    expect(buildConfig(['--manual-auth'], {})).toMatchObject({
      manualAuth: true,
      useBrowserFallback: true,
      headful: true,
      saveStorageStatePath: DEFAULT_STORAGE_STATE
    });
    expect(buildConfig(['--manual-auth', '--save-storage-state', 'state.json'], {}).saveStorageStatePath).toBe('state.json');
  });
});

describe('parseArgs', () => {
  it('does not consume a following flag as a value', () => {
    expect(parseArgs(['--out', '--verbose'])).toEqual({ verbose: true });
  });

  it('reads every valued flag', () => {
    expect(
      parseArgs([
        '--base-url', 'https://www.example.hu',
        '--sitemap', 'https://www.example.hu/s.xml',
        '--out', 'out/db.sqlite',
        '--storage-state', 'in.json',
        '--auth-url', 'https://www.example.hu/belepes',
        '--debug-dir', 'debug',
        '--progress-every', '10',
        '--no-sitemap',
        '--store-html'
      ])
    ).toEqual({
      baseUrl: 'https://www.example.hu',
      sitemapUrl: 'https://www.example.hu/s.xml',
      dbPath: 'out/db.sqlite',
      storageStatePath: 'in.json',
      authUrl: 'https://www.example.hu/belepes',
      debugDir: 'debug',
      progressEvery: 10,
      useSitemap: false,
      storeHtml: true
    });
  });
});

describe('loadDotEnv', () => {
  it('applies unset keys only', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'listing-env-'));
    const envPath = path.join(dir, '.env');
    await fs.writeFile(envPath, '# comment\nLISTINGS_DELAY_MS=3000\nexport LISTINGS_USER_AGENT="test-agent 1.0"\nLISTINGS_RESUME=false\nbroken line\n');
    const env: Record<string, string | undefined> = { LISTINGS_RESUME: 'true' };

    const applied = await loadDotEnv(envPath, env);

    expect(applied).toBe(2);
    expect(env).toEqual({ LISTINGS_RESUME: 'true', LISTINGS_DELAY_MS: '3000', LISTINGS_USER_AGENT: 'test-agent 1.0' });
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns 0 when the file is missing', async () => {
    expect(await loadDotEnv(path.join(os.tmpdir(), 'no-such-dir-listing', '.env'), {})).toBe(0);
  });
});
