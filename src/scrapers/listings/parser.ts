import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode, type Element, type Text } from 'domhandler';
import {
  adIdFromUrl,
  collapseWhitespace,
  dedupe,
  isOnSite,
  normalizeLabel,
  parseDigits,
  parseLeadingInt,
  resolveUrl,
  siteDomain,
  stripAccents
} from './normalize.js';
import type { ExtractedListing, SellerType } from './types.js';

export const CURRENCY_MAP: Record<string, string> = {
  Ft: 'HUF',
  HUF: 'HUF',
  EUR: 'EUR',
  '€': 'EUR'
};

type MappedField =
  | 'yearMonth'
  | 'mileage'
  | 'fuel'
  | 'engine'
  | 'power'
  | 'transmission'
  | 'drivetrain'
  | 'bodyType'
  | 'color';

const FIELD_LABELS = new Map<string, MappedField>([
  ['Evjarat', 'yearMonth'],
  ['Evjarat (gyartasi ev)', 'yearMonth'],
  ['Km. ora allas', 'mileage'],
  ['Uzemanyag', 'fuel'],
  ['Hengerurtartalom', 'engine'],
  ['Teljesitmeny', 'power'],
  ['Sebessegvalto', 'transmission'],
  ['Hajtas', 'drivetrain'],
  ['Kivitel', 'bodyType'],
  ['Szin', 'color']
]);

const SEQUENTIAL_LABELS = new Set(['Evjarat', 'Km. ora allas', 'Uzemanyag', 'Hengerurtartalom', 'Teljesitmeny']);
const AD_CODE_LABELS = ['Hirdeteskod', 'Hirdetes kod', 'HirdetesKod'];
const DEALER_LABELS = ['Kereskedes', 'Hirdeto'];
const PRIVATE_LABEL = 'Maganszemely';
const LOCATION_LABELS = ['Hely', 'Telephely', 'Cim'];

const PRICE_RE = /([0-9][0-9\s.]*)\s*(Ft|HUF|EUR|€)/;
const POWER_KW_RE = /(\d+)\s*kW/;
const POWER_HP_RE = /(\d+)\s*(LE|hp)/i;
const DISCOUNT_MARKER = 'Akcio';
const MIN_DESCRIPTION_LENGTH = 20;
const MAX_CONTAINER_CLIMB = 3;
const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template']);

function collectTextNodes(nodes: AnyNode[], into: Text[] = []): Text[] {
  for (const node of nodes) {
    if (isText(node)) {
      into.push(node);
    } else if (isTag(node) && SKIPPED_TAGS.has(node.name)) {
      continue;
    } else if (hasChildren(node)) {
      collectTextNodes(node.children, into);
    }
  }
  return into;
}

/** Text of a node with its text fragments trimmed and joined by single spaces. */
function nodeText(node: AnyNode): string {
  return collectTextNodes([node])
    .map(text => collapseWhitespace(text.data))
    .filter(Boolean)
    .join(' ');
}

function textLines(texts: Text[]): string[] {
  const lines: string[] = [];
  for (const text of texts) {
    for (const raw of text.data.split(/\r?\n/)) {
      const line = raw.trim();
      if (line) {
        lines.push(line);
      }
    }
  }
  return lines;
}

function isAllUpper(text: string): boolean {
  return text === text.toUpperCase() && text !== text.toLowerCase();
}

function metaContent($: cheerio.CheerioAPI, key: string): string | null {
  const content = $(`meta[property="${key}"]`).attr('content') ?? $(`meta[name="${key}"]`).attr('content');
  const trimmed = content?.trim();
  return trimmed ? trimmed : null;
}

export function extractKvPairs($: cheerio.CheerioAPI, lines: string[]): Map<string, string> {
  const kv = new Map<string, string>();

  const addPair = (rawKey: string, value: string): void => {
    const key = rawKey.trim();
    if (!key || !value) {
      return;
    }
    if (!kv.has(key)) {
      kv.set(key, value);
    }
    const folded = normalizeLabel(key);
    if (folded && folded !== key && !kv.has(folded)) {
      kv.set(folded, value);
    }
  };

  $('table tr').each((_idx, row) => {
    const cells = $(row)
      .find('th, td')
      .toArray()
      .map(cell => nodeText(cell));
    if (cells.length >= 2) {
      addPair(cells[0], cells[1]);
    }
  });

  $('dl').each((_idx, list) => {
    const terms = $(list).find('dt').toArray();
    const definitions = $(list).find('dd').toArray();
    const count = Math.min(terms.length, definitions.length);
    for (let i = 0; i < count; i += 1) {
      addPair(nodeText(terms[i]), nodeText(definitions[i]));
    }
  });

  // Bare "label / value" lines, only for labels we know.
  for (let idx = 0; idx < lines.length - 1; idx += 1) {
    const line = lines[idx];
    if (kv.has(line)) {
      continue;
    }
    const next = lines[idx + 1];
    if (line.length >= 64 || next.length >= 128 || line.includes(':') || isAllUpper(line)) {
      continue;
    }
    const folded = stripAccents(line);
    if (folded.toLowerCase().startsWith('hirdeteskod')) {
      addPair('Hirdeteskod', next);
    }
    if (SEQUENTIAL_LABELS.has(folded)) {
      addPair(folded, next);
    }
  }

  return kv;
}

function findTextNode(texts: Text[], keyword: string): Text | null {
  const pattern = new RegExp(keyword, 'i');
  return texts.find(text => pattern.test(stripAccents(text.data))) ?? null;
}

function climbableParent(node: AnyNode): Element | null {
  const parent = node.parent;
  if (!parent || !isTag(parent) || parent.name === 'body' || parent.name === 'html') {
    return null;
  }
  return parent;
}

export function extractTitle($: cheerio.CheerioAPI): string | null {
  const h1 = $('h1').first().get(0);
  const text = h1 ? nodeText(h1) : '';
  return text || metaContent($, 'og:title');
}

export function extractDescription($: cheerio.CheerioAPI, texts: Text[]): string | null {
  const heading = findTextNode(texts, 'Leiras');
  if (heading) {
    const headingText = collapseWhitespace(heading.data);
    let container = climbableParent(heading);
    for (let level = 0; container && level < MAX_CONTAINER_CLIMB; level += 1) {
      const full = nodeText(container);
      const text = full.startsWith(headingText) ? full.slice(headingText.length).trim() : full;
      if (text.length > MIN_DESCRIPTION_LENGTH) {
        return text;
      }
      container = climbableParent(container);
    }
  }
  return metaContent($, 'og:description');
}

function listItems($: cheerio.CheerioAPI, container: Element): string[] {
  return $(container)
    .find('li')
    .toArray()
    .map(item => nodeText(item))
    .filter(Boolean);
}

export function extractEquipment($: cheerio.CheerioAPI, texts: Text[]): string[] {
  const items: string[] = [];
  const heading = findTextNode(texts, 'Felszereltseg');
  let container = heading ? climbableParent(heading) : null;
  for (let level = 0; container && level < MAX_CONTAINER_CLIMB; level += 1) {
    const found = listItems($, container);
    if (found.length > 0) {
      items.push(...found);
      break;
    }
    container = climbableParent(container);
  }

  if (items.length === 0) {
    $('section[id], div[id]').each((_idx, node) => {
      if (/felszerelt/i.test($(node).attr('id') ?? '')) {
        items.push(...listItems($, node));
      }
    });
  }

  return dedupe(items);
}

export function extractImages($: cheerio.CheerioAPI, baseUrl: string): string[] {
  const domain = siteDomain(baseUrl);
  const images: string[] = [];
  $('img').each((_idx, img) => {
    for (const attr of ['src', 'data-src']) {
      const value = $(img).attr(attr);
      const resolved = value ? resolveUrl(value, baseUrl) : null;
      if (resolved && isOnSite(resolved, domain)) {
        images.push(resolved);
      }
    }
  });
  return dedupe(images);
}

export interface PriceInfo {
  priceAmount: number | null;
  discountedPriceAmount: number | null;
  currency: string | null;
}

export function extractPrice($: cheerio.CheerioAPI, lines: string[]): PriceInfo {
  let priceAmount: number | null = null;
  let discountedPriceAmount: number | null = null;
  let currency: string | null = null;

  for (const key of ['product:price:amount', 'og:price:amount']) {
    priceAmount = parseDigits(metaContent($, key));
    if (priceAmount !== null) {
      break;
    }
  }
  currency = metaContent($, 'product:price:currency');
  if (priceAmount !== null) {
    return { priceAmount, discountedPriceAmount, currency };
  }

  for (const line of lines) {
    const match = line.match(PRICE_RE);
    if (!match) {
      continue;
    }
    const amount = parseDigits(match[1]);
    currency = currency ?? CURRENCY_MAP[match[2]] ?? null;
    if (stripAccents(line).includes(DISCOUNT_MARKER)) {
      discountedPriceAmount = discountedPriceAmount ?? amount;
      continue;
    }
    priceAmount = priceAmount ?? amount;
  }

  return { priceAmount, discountedPriceAmount, currency };
}

function resolveAdId(kv: Map<string, string>, url: string): number | null {
  for (const key of AD_CODE_LABELS) {
    const value = kv.get(key);
    if (value !== undefined) {
      const adId = parseDigits(value);
      if (adId !== null) {
        return adId;
      }
      break;
    }
  }
  return adIdFromUrl(url);
}

function firstValue(kv: Map<string, string>, keys: string[]): string | null {
  for (const key of keys) {
    const value = kv.get(key);
    if (value !== undefined) {
      return value;
    }
  }
  return null;
}

/**
 * Turns one listing page into a record. Pure: nothing is fetched and nothing
 * throws; a signal that cannot be found leaves its field null.
 */
export function parseListing(html: string, url: string, baseUrl: string): ExtractedListing {
  const $ = cheerio.load(html);
  const texts = collectTextNodes($.root().toArray());
  const lines = textLines(texts);
  const kv = extractKvPairs($, lines);
  const price = extractPrice($, lines);

  const mapped = new Map<MappedField, string>();
  for (const [rawKey, value] of kv) {
    const field = FIELD_LABELS.get(normalizeLabel(rawKey)) ?? FIELD_LABELS.get(rawKey);
    if (field && !mapped.has(field)) {
      mapped.set(field, value);
    }
  }

  const power = mapped.get('power') ?? '';
  const powerKw = power.match(POWER_KW_RE);
  const powerHp = power.match(POWER_HP_RE);
  const yearMonthRaw = mapped.get('yearMonth') ?? null;

  let sellerName: string | null = null;
  let sellerType: SellerType = 'unknown';
  const dealer = firstValue(kv, DEALER_LABELS);
  if (dealer) {
    sellerName = dealer;
    sellerType = 'dealer';
  } else if (kv.has(PRIVATE_LABEL)) {
    sellerType = 'private';
  }

  return {
    adId: resolveAdId(kv, url),
    url,
    title: extractTitle($),
    priceAmount: price.priceAmount,
    discountedPriceAmount: price.discountedPriceAmount,
    currency: price.currency,
    year: parseLeadingInt(yearMonthRaw),
    yearMonthRaw,
    mileageKm: parseDigits(mapped.get('mileage')),
    fuelType: mapped.get('fuel') ?? null,
    engineCc: parseDigits(mapped.get('engine')),
    powerKw: powerKw ? Number.parseInt(powerKw[1], 10) : null,
    powerHp: powerHp ? Number.parseInt(powerHp[1], 10) : null,
    transmission: mapped.get('transmission') ?? null,
    drivetrain: mapped.get('drivetrain') ?? null,
    bodyType: mapped.get('bodyType') ?? null,
    color: mapped.get('color') ?? null,
    sellerName,
    sellerType,
    location: firstValue(kv, LOCATION_LABELS),
    description: extractDescription($, texts),
    equipment: extractEquipment($, texts),
    images: extractImages($, baseUrl),
    attributes: Object.fromEntries(kv),
    rawHtml: null
  };
}
