import { createLogger } from '../../logger.js';
import { isOnSite, siteDomain } from './normalize.js';
import type { FetchOptions, FetchResult, RobotsGate } from './types.js';

const log = createLogger('robots');

interface RobotsRule {
  allow: boolean;
  pattern: string;
  matcher: RegExp;
}

interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
  crawlDelaySeconds: number | null;
}

export interface ParsedRobots {
  groups: RobotsGroup[];
}

export type RobotsFetcher = (url: string, options: FetchOptions) => Promise<FetchResult>;

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split('*')
    .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}${anchored ? '$' : ''}`);
}

export function parseRobotsTxt(content: string): ParsedRobots {
  const groups: RobotsGroup[] = [];
  let current: RobotsGroup | null = null;
  let lastWasAgent = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    const idx = line.indexOf(':');
    if (idx <= 0) {
      continue;
    }
    const field = line.slice(0, idx).trim().toLowerCase();
    const value = line.slice(idx + 1).trim();

    if (field === 'user-agent') {
      if (!current || !lastWasAgent) {
        current = { agents: [], rules: [], crawlDelaySeconds: null };
        groups.push(current);
      }
      current.agents.push(value.toLowerCase());
      lastWasAgent = true;
      continue;
    }

    lastWasAgent = false;
    if (!current) {
      continue;
    } else if (field === 'allow' || field === 'disallow') {
      // An empty Disallow allows everything, so it adds no rule.
      if (value) {
        current.rules.push({ allow: field === 'allow', pattern: value, matcher: patternToRegExp(value) });
      }
    } else if (field === 'crawl-delay') {
      const delay = Number.parseFloat(value);
      if (Number.isFinite(delay) && delay >= 0) {
        current.crawlDelaySeconds = delay;
      }
    }
  }

  return { groups };
}

/** "Mozilla/5.0 (X11; ...)" -> "mozilla". Group tokens are matched against this only. */
export function productToken(userAgent: string): string {
  return userAgent.split('/')[0].trim().toLowerCase();
}

function selectGroups(parsed: ParsedRobots, userAgent: string): RobotsGroup[] {
  const agent = productToken(userAgent);
  let bestLength = 0;
  let best: RobotsGroup[] = [];
  for (const group of parsed.groups) {
    for (const token of group.agents) {
      if (token === '*' || !token || !agent.includes(token)) {
        continue;
      }
      if (token.length > bestLength) {
        bestLength = token.length;
        best = [group];
      } else if (token.length === bestLength && !best.includes(group)) {
        best.push(group);
      }
    }
  }
  if (best.length > 0) {
    return best;
  }
  return parsed.groups.filter(group => group.agents.includes('*'));
}

export function isPathAllowed(parsed: ParsedRobots, userAgent: string, pathWithQuery: string): boolean {
  if (pathWithQuery === '/robots.txt') {
    return true;
  }
  let winner: RobotsRule | null = null;
  for (const group of selectGroups(parsed, userAgent)) {
    for (const rule of group.rules) {
      if (!rule.matcher.test(pathWithQuery)) {
        continue;
      }
      if (
        !winner ||
        rule.pattern.length > winner.pattern.length ||
        (rule.pattern.length === winner.pattern.length && rule.allow && !winner.allow)
      ) {
        winner = rule;
      }
    }
  }
  return winner ? winner.allow : true;
}

export class RobotsPolicy implements RobotsGate {
  private readonly baseUrl: string;
  private readonly domain: string;
  private readonly userAgent: string;
  private parsed: ParsedRobots | null = null;
  private loaded = false;

  constructor(baseUrl: string, userAgent: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.domain = siteDomain(this.baseUrl);
    this.userAgent = userAgent;
  }

  get robotsUrl(): string {
    return new URL('/robots.txt', `${this.baseUrl}/`).toString();
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  async load(fetcher: RobotsFetcher): Promise<void> {
    if (this.loaded) {
      return;
    }
    const robotsUrl = this.robotsUrl;
    const result = await fetcher(robotsUrl, { ignoreRobots: true, expectHtml: false });
    this.loaded = true;
    if (result.body === null) {
      log.warn(`Could not load robots.txt (${robotsUrl}); allowing all URLs`);
      this.parsed = null;
      return;
    }
    this.parsed = parseRobotsTxt(result.body);
    log.info(`Loaded robots.txt (${robotsUrl})`);
  }

  allowed(url: string): boolean {
    if (!this.loaded || !this.parsed) {
      return true;
    }
    let target: URL;
    try {
      target = new URL(url, `${this.baseUrl}/`);
    } catch {
      return true;
    }
    // Rules cover every host the discoverers treat as the site: the bare domain and its subdomains.
    if (!isOnSite(target.toString(), this.domain)) {
      return true;
    }
    return isPathAllowed(this.parsed, this.userAgent, `${target.pathname}${target.search}`);
  }

  crawlDelayMs(): number | null {
    if (!this.parsed) {
      return null;
    }
    for (const group of selectGroups(this.parsed, this.userAgent)) {
      if (group.crawlDelaySeconds !== null) {
        return Math.round(group.crawlDelaySeconds * 1000);
      }
    }
    return null;
  }
}
