import fs from 'fs/promises';
import path from 'path';
import * as sqlJs from 'sql.js';
import type { Database, SqlValue } from 'sql.js';
import { errorMessage } from '../../logger.js';
import { StartupError } from './errors.js';
import type { ListingRecord, ListingStore, SellerType, StoredListing } from './types.js';

const COLUMNS = [
  'ad_id',
  'url',
  'title',
  'price_amount',
  'price_discount_amount',
  'currency',
  'year',
  'year_month',
  'mileage_km',
  'fuel',
  'engine_cc',
  'power_kw',
  'power_hp',
  'transmission',
  'drivetrain',
  'body_type',
  'color',
  'seller_name',
  'seller_type',
  'location',
  'description',
  'equipment_json',
  'images_json',
  'attributes_json',
  'raw_html',
  'scraped_at'
] as const;

type Row = Record<string, SqlValue>;

function text(value: SqlValue | undefined): string | null {
  return typeof value === 'string' ? value : null;
}

function int(value: SqlValue | undefined): number | null {
  return typeof value === 'number' ? value : null;
}

function jsonList(value: SqlValue | undefined): string[] {
  const raw = text(value);
  if (!raw) {
    return [];
  }
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === 'string') : [];
}

function jsonMap(value: SqlValue | undefined): Record<string, string> {
  const raw = text(value);
  if (!raw) {
    return {};
  }
  const parsed: unknown = JSON.parse(raw);
  const result: Record<string, string> = {};
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    for (const [key, entry] of Object.entries(parsed)) {
      if (typeof entry === 'string') {
        result[key] = entry;
      }
    }
  }
  return result;
}

function sellerType(value: SqlValue | undefined): SellerType {
  return value === 'dealer' || value === 'private' ? value : 'unknown';
}

/** Second-precision UTC timestamp, e.g. 2024-05-01T10:20:30Z. */
export function utcTimestamp(date = new Date()): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

export interface ListingDbOptions {
  flushEvery?: number;
  now?: () => Date;
}

/**
 * SQLite store for listings, one row per ad id. Rows are replaced whole on
 * every upsert and the file is rewritten after each `flushEvery` writes.
 */
export class ListingDb implements ListingStore {
  private db: Database;
  private dbPath: string;
  private pendingWrites = 0;
  private readonly flushEvery: number;
  private readonly now: () => Date;

  private constructor(db: Database, dbPath: string, options: ListingDbOptions) {
    this.db = db;
    this.dbPath = dbPath;
    this.flushEvery = Math.max(1, options.flushEvery ?? 1);
    this.now = options.now ?? (() => new Date());
    this.ensureSchema();
  }

  static async create(dbPath: string, options: ListingDbOptions = {}): Promise<ListingDb> {
    try {
      await fs.mkdir(path.dirname(dbPath), { recursive: true });
      await fs.access(path.dirname(dbPath), fs.constants.W_OK);
    } catch (error) {
      throw new StartupError(`Output directory for ${dbPath} is not writable: ${errorMessage(error)}`, { cause: error });
    }

    // sql.js is CommonJS; under the ESM loader its init function is the default export.
    const SQL = await sqlJs.default();
    let db: Database;
    try {
      const file = await fs.readFile(dbPath);
      db = new SQL.Database(new Uint8Array(file));
    } catch {
      db = new SQL.Database();
    }

    return new ListingDb(db, dbPath, options);
  }

  async close(): Promise<void> {
    await this.flush(true);
    this.db.close();
  }

  exists(adId: number): boolean {
    const stmt = this.db.prepare('SELECT 1 FROM listings WHERE ad_id = ? LIMIT 1');
    try {
      stmt.bind([adId]);
      return stmt.step();
    } finally {
      stmt.free();
    }
  }

  count(): number {
    const result = this.db.exec('SELECT COUNT(*) FROM listings');
    const value = result[0]?.values[0]?.[0];
    return typeof value === 'number' ? value : 0;
  }

  get(adId: number): StoredListing | null {
    const stmt = this.db.prepare(`SELECT ${COLUMNS.join(', ')} FROM listings WHERE ad_id = ?`);
    try {
      stmt.bind([adId]);
      if (!stmt.step()) {
        return null;
      }
      return this.fromRow(stmt.getAsObject());
    } finally {
      stmt.free();
    }
  }

  async upsert(record: ListingRecord): Promise<void> {
    const placeholders = COLUMNS.map(() => '?').join(', ');
    const updates = COLUMNS.filter(column => column !== 'ad_id')
      .map(column => `${column} = excluded.${column}`)
      .join(',\n        ');
    const stmt = this.db.prepare(`
      INSERT INTO listings (${COLUMNS.join(', ')})
      VALUES (${placeholders})
      ON CONFLICT(ad_id) DO UPDATE SET
        ${updates}
    `);

    try {
      stmt.run([
        record.adId,
        record.url,
        record.title,
        record.priceAmount,
        record.discountedPriceAmount,
        record.currency,
        record.year,
        record.yearMonthRaw,
        record.mileageKm,
        record.fuelType,
        record.engineCc,
        record.powerKw,
        record.powerHp,
        record.transmission,
        record.drivetrain,
        record.bodyType,
        record.color,
        record.sellerName,
        record.sellerType,
        record.location,
        record.description,
        JSON.stringify(record.equipment),
        JSON.stringify(record.images),
        JSON.stringify(record.attributes),
        record.rawHtml,
        utcTimestamp(this.now())
      ]);
    } finally {
      stmt.free();
    }
    this.pendingWrites += 1;
    await this.flush();
  }

  async flush(force = false): Promise<void> {
    if (!force && this.pendingWrites < this.flushEvery) {
      return;
    }

    const data = this.db.export();
    const tmpPath = `${this.dbPath}.tmp`;
    await fs.writeFile(tmpPath, Buffer.from(data));
    await fs.rename(tmpPath, this.dbPath);
    this.pendingWrites = 0;
  }

  private fromRow(row: Row): StoredListing {
    return {
      adId: int(row.ad_id) ?? 0,
      url: text(row.url) ?? '',
      title: text(row.title),
      priceAmount: int(row.price_amount),
      discountedPriceAmount: int(row.price_discount_amount),
      currency: text(row.currency),
      year: int(row.year),
      yearMonthRaw: text(row.year_month),
      mileageKm: int(row.mileage_km),
      fuelType: text(row.fuel),
      engineCc: int(row.engine_cc),
      powerKw: int(row.power_kw),
      powerHp: int(row.power_hp),
      transmission: text(row.transmission),
      drivetrain: text(row.drivetrain),
      bodyType: text(row.body_type),
      color: text(row.color),
      sellerName: text(row.seller_name),
      sellerType: sellerType(row.seller_type),
      location: text(row.location),
      description: text(row.description),
      equipment: jsonList(row.equipment_json),
      images: jsonList(row.images_json),
      attributes: jsonMap(row.attributes_json),
      rawHtml: text(row.raw_html),
      scrapedAtUtc: text(row.scraped_at) ?? ''
    };
  }

  private ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS listings (
        ad_id INTEGER PRIMARY KEY,
        url TEXT,
        title TEXT,
        price_amount INTEGER,
        price_discount_amount INTEGER,
        currency TEXT,
        year INTEGER,
        year_month TEXT,
        mileage_km INTEGER,
        fuel TEXT,
        engine_cc INTEGER,
        power_kw INTEGER,
        power_hp INTEGER,
        transmission TEXT,
        drivetrain TEXT,
        body_type TEXT,
        color TEXT,
        seller_name TEXT,
        seller_type TEXT,
        location TEXT,
        description TEXT,
        equipment_json TEXT,
        images_json TEXT,
        attributes_json TEXT,
        raw_html TEXT,
        scraped_at TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_listings_url ON listings(url);
    `);
  }
}
