import axios, { type AxiosInstance } from 'axios';
import { createLogger, errorMessage } from '../../logger.js';
import type { FetchOptions, FetchResult, RobotsGate } from './types.js';

const log = createLogger('fetch');

export const BLOCKED_PHRASES = [
  'ellenor',
  'nem vagy robot',
  'verification',
  'access denied',
  'too many requests'
];

const BLOCKED_STATUSES = new Set([403, 429]);

export interface HttpClientOptions {
  userAgent: string;
  delayMs?: number;
  jitterMs?: number;
  timeoutMs?: number;
  http?: AxiosInstance;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function isChallengeBody(text: string): boolean {
  const lower = text.toLowerCase();
  return BLOCKED_PHRASES.some(phrase => lower.includes(phrase));
}

function headerValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map(String).join(', ');
  }
  return value === undefined || value === null ? '' : String(value);
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf-8');
  }
  if (data === undefined || data === null) {
    return '';
  }
  return JSON.stringify(data);
}

/**
 * Single-flight HTTP client. Every network call waits until `delayMs` (plus a
 * random share of `jitterMs`) has passed since the previous call finished.
 * Robots denials are answered before the wait and never reach the network.
 */
export class HttpClient {
  private readonly userAgent: string;
  private delayMs: number;
  private readonly jitterMs: number;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private robots: RobotsGate | null = null;
  private lastRequestAt: number | null = null;

  constructor(options: HttpClientOptions) {
    this.userAgent = options.userAgent;
    this.delayMs = options.delayMs ?? 1000;
    this.jitterMs = options.jitterMs ?? 500;
    this.timeoutMs = options.timeoutMs ?? 20000;
    this.http = options.http ?? axios.create();
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  setRobots(robots: RobotsGate): void {
    this.robots = robots;
  }

  getDelay(): number {
    return this.delayMs;
  }

  setDelay(delayMs: number): void {
    this.delayMs = Math.max(0, delayMs);
  }

  headers(): Record<string, string> {
    return {
      'User-Agent': this.userAgent,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'hu-HU,hu;q=0.9,en-US;q=0.8,en;q=0.7',
      'Cache-Control': 'no-cache',
      Pragma: 'no-cache'
    };
  }

  private async throttle(): Promise<void> {
    let wait = 0;
    if (this.lastRequestAt !== null) {
      wait = Math.max(0, this.lastRequestAt + this.delayMs - this.now());
    }
    if (this.jitterMs > 0) {
      wait += this.random() * this.jitterMs;
    }
    if (wait > 0) {
      await this.sleep(wait);
    }
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const { ignoreRobots = false, expectHtml = true } = options;

    if (this.robots && !ignoreRobots && !this.robots.allowed(url)) {
      log.warn(`Robots blocked: ${url}`);
      return { url, statusCode: 0, body: null, isBlocked: false, isSkipped: true, contentType: '' };
    }

    await this.throttle();
    try {
      const response = await this.http.get<unknown>(url, {
        headers: this.headers(),
        timeout: this.timeoutMs,
        responseType: 'text',
        maxRedirects: 5,
        validateStatus: () => true
      });

      const contentType = headerValue(response.headers['content-type']);
      const text = bodyText(response.data);
      if (BLOCKED_STATUSES.has(response.status) || isChallengeBody(text)) {
        log.warn(`Blocked response ${response.status} for ${url}`);
        return { url, statusCode: response.status, body: null, isBlocked: true, isSkipped: false, contentType };
      }

      if (expectHtml && !contentType.includes('text/html') && !contentType.includes('application/xhtml+xml')) {
        log.info(`Unexpected content type ${contentType || '(none)'} for ${url}`);
      }

      return { url, statusCode: response.status, body: text, isBlocked: false, isSkipped: false, contentType };
    } catch (error) {
      log.warn(`Request failed: ${url} (${errorMessage(error)})`);
      return { url, statusCode: 0, body: null, isBlocked: true, isSkipped: false, contentType: '' };
    } finally {
      this.lastRequestAt = this.now();
    }
  }
}
