import { describe, expect, it } from 'vitest';
import { HttpClient, isChallengeBody } from '../src/scrapers/listings/httpClient.js';
import { fakeAxios, fakeClock } from './helpers.js';

const USER_AGENT = 'test-agent/1.0';

describe('HttpClient', () => {
  it('returns the body of a normal page', async () => {
    const clock = fakeClock();
    const client = new HttpClient({
      userAgent: USER_AGENT,
      jitterMs: 0,
      http: fakeAxios(() => ({ body: '<html><h1>Opel Astra</h1></html>' })),
      now: clock.now,
      sleep: clock.sleep
    });

    const result = await client.fetch('https://example.hu/szemelyauto/opel-astra-123');

    expect(result).toEqual({
      url: 'https://example.hu/szemelyauto/opel-astra-123',
      statusCode: 200,
      body: '<html><h1>Opel Astra</h1></html>',
      isBlocked: false,
      isSkipped: false,
      contentType: 'text/html; charset=utf-8'
    });
  });

  it('treats 403 and 429 as blocked', async () => {
    const clock = fakeClock();
    const client = new HttpClient({
      userAgent: USER_AGENT,
      jitterMs: 0,
      http: fakeAxios(url => ({ status: url.endsWith('a') ? 403 : 429, body: 'nope' })),
      now: clock.now,
      sleep: clock.sleep
    });

    const forbidden = await client.fetch('https://example.hu/a');
    const limited = await client.fetch('https://example.hu/b');

    expect(forbidden.isBlocked).toBe(true);
    expect(forbidden.statusCode).toBe(403);
    expect(forbidden.body).toBeNull();
    expect(limited.isBlocked).toBe(true);
    expect(limited.statusCode).toBe(429);
  });

  it('treats a 200 challenge page as blocked', async () => {
    const clock = fakeClock();
    const client = new HttpClient({
      userAgent: USER_AGENT,
      jitterMs: 0,
      http: fakeAxios(() => ({ status: 200, body: '<p>Too Many Requests</p>' })),
      now: clock.now,
      sleep: clock.sleep
    });

    const result = await client.fetch('https://example.hu/x');

    expect(result.statusCode).toBe(200);
    expect(result.isBlocked).toBe(true);
    expect(result.body).toBeNull();
  });

  it('reports transport failures with status 0', async () => {
    const clock = fakeClock();
    const client = new HttpClient({
      userAgent: USER_AGENT,
      jitterMs: 0,
      http: fakeAxios(() => new Error('connect ECONNREFUSED')),
      now: clock.now,
      sleep: clock.sleep
    });

    const result = await client.fetch('https://example.hu/down');

    expect(result).toMatchObject({ statusCode: 0, body: null, isBlocked: true, isSkipped: false });
  });

  it('skips robots-denied URLs without a request or a wait', async () => {
    const clock = fakeClock();
    const calls: string[] = [];
    const client = new HttpClient({
      userAgent: USER_AGENT,
      jitterMs: 300,
      http: fakeAxios(() => ({ body: 'x' }), calls),
      now: clock.now,
      sleep: clock.sleep
    });
    client.setRobots({ allowed: () => false });

    const result = await client.fetch('https://example.hu/private');

    expect(result).toMatchObject({ statusCode: 0, body: null, isBlocked: false, isSkipped: true });
    expect(calls).toEqual([]);
    expect(clock.sleeps).toEqual([]);
  });

  it('fetches robots-denied URLs when told to ignore robots', async () => {
    const clock = fakeClock();
    const calls: string[] = [];
    const client = new HttpClient({
      userAgent: USER_AGENT,
      jitterMs: 0,
      http: fakeAxios(() => ({ body: 'User-agent: *', contentType: 'text/plain' }), calls),
      now: clock.now,
      sleep: clock.sleep
    });
    client.setRobots({ allowed: () => false });

    const result = await client.fetch('https://example.hu/robots.txt', { ignoreRobots: true, expectHtml: false });

    expect(result.body).toBe('User-agent: *');
    expect(calls).toEqual(['https://example.hu/robots.txt']);
  });

  it('spaces consecutive requests by the delay plus jitter', async () => {
    const clock = fakeClock(1000);
    const client = new HttpClient({
      userAgent: USER_AGENT,
      delayMs: 1000,
      jitterMs: 200,
      http: fakeAxios(() => ({ body: 'ok' })),
      now: clock.now,
      sleep: clock.sleep,
      random: () => 0.5
    });

    await client.fetch('https://example.hu/1');
    await client.fetch('https://example.hu/2');
    clock.advance(400);
    await client.fetch('https://example.hu/3');

    expect(clock.sleeps).toEqual([100, 1100, 700]);
  });

  it('does not wait when the delay has already passed', async () => {
    const clock = fakeClock(0);
    const client = new HttpClient({
      userAgent: USER_AGENT,
      delayMs: 500,
      jitterMs: 0,
      http: fakeAxios(() => ({ body: 'ok' })),
      now: clock.now,
      sleep: clock.sleep
    });

    await client.fetch('https://example.hu/1');
    clock.advance(600);
    await client.fetch('https://example.hu/2');

    expect(clock.sleeps).toEqual([]);
  });

  it('sends a browser-like header set', () => {
    const client = new HttpClient({ userAgent: USER_AGENT });
    expect(client.headers()['User-Agent']).toBe(USER_AGENT);
    expect(client.headers()['Accept-Language']).toBe('hu-HU,hu;q=0.9,en-US;q=0.8,en;q=0.7');
  });
});

describe('isChallengeBody', () => {
  it('matches challenge phrases case-insensitively', () => {
    expect(isChallengeBody('Kérjük igazold, hogy NEM VAGY ROBOT')).toBe(true);
    expect(isChallengeBody('Access Denied')).toBe(true);
    expect(isChallengeBody('<h1>Opel Astra 1.6</h1>')).toBe(false);
  });
});
