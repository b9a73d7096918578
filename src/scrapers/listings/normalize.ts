const ACCENT_MAP: Record<string, string> = {
  'á': 'a',
  'Á': 'A',
  'é': 'e',
  'É': 'E',
  'í': 'i',
  'Í': 'I',
  'ó': 'o',
  'Ó': 'O',
  'ö': 'o',
  'Ö': 'O',
  'ő': 'o',
  'Ő': 'O',
  'ú': 'u',
  'Ú': 'U',
  'ü': 'u',
  'Ü': 'U',
  'ű': 'u',
  'Ű': 'U'
};

const ACCENT_RE = new RegExp(`[${Object.keys(ACCENT_MAP).join('')}]`, 'g');

/** Folds Hungarian accented letters to ASCII. Other characters pass through. */
export function stripAccents(text: string): string {
  return text.replace(ACCENT_RE, char => ACCENT_MAP[char] ?? char);
}

export function normalizeLabel(text: string): string {
  return stripAccents(text.trim().replace(/\s*:$/, ''));
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Keeps every digit of the value: "1 990 000 Ft" -> 1990000. */
export function parseDigits(text: string | null | undefined): number | null {
  if (!text) {
    return null;
  }
  const digits = text.replace(/[^0-9]/g, '');
  if (!digits) {
    return null;
  }
  const value = Number.parseInt(digits, 10);
  return Number.isSafeInteger(value) ? value : null;
}

export function parseLeadingInt(text: string | null | undefined): number | null {
  const match = text?.match(/\d+/);
  if (!match) {
    return null;
  }
  return Number.parseInt(match[0], 10);
}

export function adIdFromUrl(url: string): number | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }
  const match = pathname.match(/[-/](\d+)(?:\.html?)?\/?$/i);
  return match ? Number.parseInt(match[1], 10) : null;
}

export function siteDomain(baseUrl: string): string {
  return new URL(baseUrl).hostname.toLowerCase().replace(/^www\./, '');
}

export function isOnSite(url: string, domain: string): boolean {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host === domain || host.endsWith(`.${domain}`);
  } catch {
    return false;
  }
}

export function resolveUrl(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed) {
    return null;
  }
  const withScheme = trimmed.startsWith('//') ? `https:${trimmed}` : trimmed;
  try {
    return new URL(withScheme, baseUrl).toString();
  } catch {
    return null;
  }
}

export function dedupe<T>(items: Iterable<T>, keyOf: (item: T) => string = item => String(item)): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const item of items) {
    const key = keyOf(item);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(item);
  }
  return unique;
}
