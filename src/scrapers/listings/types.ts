export interface FetchResult {
  url: string;
  statusCode: number;
  body: string | null;
  isBlocked: boolean;
  isSkipped: boolean;
  contentType: string;
}

export interface FetchOptions {
  ignoreRobots?: boolean;
  expectHtml?: boolean;
}

export type FetchOutcome =
  | { kind: 'ok'; body: string }
  | { kind: 'robots-denied' }
  | { kind: 'blocked'; statusCode: number }
  | { kind: 'transport-failure' }
  | { kind: 'unavailable' };

export interface RobotsGate {
  allowed(url: string): boolean;
}

export interface HtmlRequestOptions extends FetchOptions {
  browserFallback?: boolean;
}

export interface HtmlSource {
  fetchHtml(url: string, options?: HtmlRequestOptions): Promise<string | null>;
}

export interface ListingRef {
  url: string;
  adId: number | null;
}

export type SellerType = 'dealer' | 'private' | 'unknown';

export interface ExtractedListing {
  adId: number | null;
  url: string;
  title: string | null;
  priceAmount: number | null;
  discountedPriceAmount: number | null;
  currency: string | null;
  year: number | null;
  yearMonthRaw: string | null;
  mileageKm: number | null;
  fuelType: string | null;
  engineCc: number | null;
  powerKw: number | null;
  powerHp: number | null;
  transmission: string | null;
  drivetrain: string | null;
  bodyType: string | null;
  color: string | null;
  sellerName: string | null;
  sellerType: SellerType;
  location: string | null;
  description: string | null;
  equipment: string[];
  images: string[];
  attributes: Record<string, string>;
  rawHtml: string | null;
}

export interface ListingRecord extends Omit<ExtractedListing, 'adId'> {
  adId: number;
}

export interface StoredListing extends ListingRecord {
  scrapedAtUtc: string;
}

export interface ListingStore {
  exists(adId: number): boolean | Promise<boolean>;
  upsert(record: ListingRecord): void | Promise<void>;
}

export interface ScraperConfig {
  baseUrl: string;
  categories: string[];
  sitemapUrl?: string;
  maxPagesPerCategory: number;
  maxListings: number;
  delayMs: number;
  jitterMs: number;
  timeoutMs: number;
  dbPath: string;
  userAgent: string;
  useBrowserFallback: boolean;
  browserOnly: boolean;
  sitemapViaBrowser: boolean;
  headful: boolean;
  storageStatePath?: string;
  saveStorageStatePath?: string;
  manualAuth: boolean;
  authUrl?: string;
  debugDir?: string;
  storeHtml: boolean;
  useSitemap: boolean;
  resume: boolean;
  verbose: boolean;
  progressEvery: number;
}
