import fs from 'fs/promises';
import { beforeAll, describe, expect, it } from 'vitest';
import { normalizeLabel, stripAccents } from '../src/scrapers/listings/normalize.js';
import { parseListing } from '../src/scrapers/listings/parser.js';

const BASE = 'https://www.example.hu';
const LISTING_URL = `${BASE}/szemelyauto/opel/astra/opel_astra_1.6_enjoy-999`;

function wrap(body: string, head = ''): string {
  return `<html><head>${head}</head><body>${body}</body></html>`;
}

describe('parseListing', () => {
  let html = '';

  beforeAll(async () => {
    html = await fs.readFile(new URL('./fixtures/listing.html', import.meta.url), 'utf-8');
  });

  it('extracts the full record from a dealer listing', () => {
    const listing = parseListing(html, LISTING_URL, BASE);

    expect(listing).toMatchObject({
      adId: 18734211,
      url: LISTING_URL,
      title: 'OPEL ASTRA 1.6 Enjoy',
      priceAmount: 1990000,
      discountedPriceAmount: 1750000,
      currency: 'HUF',
      year: 2015,
      yearMonthRaw: '2015/6',
      mileageKm: 123456,
      fuelType: 'Benzin',
      engineCc: 1598,
      powerKw: 85,
      powerHp: 116,
      transmission: 'Manuális (5 fokozatú)',
      drivetrain: 'Első kerék',
      bodyType: 'Ferdehátú',
      color: 'Fehér',
      sellerName: 'Példa Autóház Kft.',
      sellerType: 'dealer',
      location: 'Budapest XI. kerület',
      description: 'Megkímélt állapotban, első tulajdonostól, végig vezetett szervizkönyvvel.',
      equipment: ['ABS', 'Klíma', 'Tempomat'],
      images: ['https://www.example.hu/images/astra-1.jpg', 'https://img.example.hu/astra-2.jpg'],
      rawHtml: null
    });
  });

  it('keeps raw labels and their folded forms in the attributes', () => {
    const { attributes } = parseListing(html, LISTING_URL, BASE);

    expect(attributes['Évjárat:']).toBe('2015/6');
    expect(attributes.Evjarat).toBe('2015/6');
    expect(attributes['Km. ora allas']).toBe('123 456 km');
    expect(attributes.Telephely).toBe('Budapest XI. kerület');
  });

  it('is deterministic', () => {
    expect(parseListing(html, LISTING_URL, BASE)).toEqual(parseListing(html, LISTING_URL, BASE));
  });

  it('reads bare label and value lines', () => {
    const page = wrap(
      '<div>Évjárat</div><div>2012/3</div><div>Km. óra állás</div><div>98 000 km</div>' +
        '<div>Teljesítmény</div><div>66 kW, 90 LE</div><span>Hirdetéskód</span><span>4242</span>'
    );

    const listing = parseListing(page, `${BASE}/szemelyauto/opel`, BASE);

    expect(listing.year).toBe(2012);
    expect(listing.yearMonthRaw).toBe('2012/3');
    expect(listing.mileageKm).toBe(98000);
    expect(listing.powerKw).toBe(66);
    expect(listing.powerHp).toBe(90);
    expect(listing.adId).toBe(4242);
  });

  it('prefers the ad code on the page over the URL', () => {
    const withCode = wrap('<table><tr><th>Hirdetéskód</th><td>HA-123</td></tr></table>');
    const withoutCode = wrap('<p>Nincs kód</p>');

    expect(parseListing(withCode, `${BASE}/szemelyauto/opel-999`, BASE).adId).toBe(123);
    expect(parseListing(withoutCode, `${BASE}/szemelyauto/opel-999`, BASE).adId).toBe(999);
    expect(parseListing(withoutCode, `${BASE}/szemelyauto/opel`, BASE).adId).toBeNull();
  });

  it('takes the price from meta tags before page text', () => {
    const page = wrap(
      '<p>Akciós ár: 2 000 000 Ft</p>',
      '<meta property="product:price:amount" content="2 490 000"><meta property="product:price:currency" content="HUF">'
    );

    const listing = parseListing(page, LISTING_URL, BASE);

    expect(listing.priceAmount).toBe(2490000);
    expect(listing.discountedPriceAmount).toBeNull();
    expect(listing.currency).toBe('HUF');
  });

  it('recognises euro prices', () => {
    const listing = parseListing(wrap('<p>12 500 €</p>'), LISTING_URL, BASE);

    expect(listing.priceAmount).toBe(12500);
    expect(listing.currency).toBe('EUR');
  });

  it('falls back to Open Graph title and description', () => {
    const page = wrap(
      '<p>Nincs részletes adat</p>',
      '<meta property="og:title" content="Opel Astra eladó"><meta property="og:description" content="Jó állapotú autó">'
    );

    const listing = parseListing(page, LISTING_URL, BASE);

    expect(listing.title).toBe('Opel Astra eladó');
    expect(listing.description).toBe('Jó állapotú autó');
  });

  it('finds equipment in a section keyed by id', () => {
    const page = wrap('<section id="felszereltseg-lista"><ul><li>ESP</li><li>Radar</li></ul></section>');

    expect(parseListing(page, LISTING_URL, BASE).equipment).toEqual(['ESP', 'Radar']);
  });

  it('marks private sellers', () => {
    const page = wrap('<dl><dt>Magánszemély</dt><dd>Kovács Béla</dd></dl>');
    const listing = parseListing(page, LISTING_URL, BASE);

    expect(listing.sellerType).toBe('private');
    expect(listing.sellerName).toBeNull();
  });

  it('leaves unknown signals null on an empty page', () => {
    const listing = parseListing('<html></html>', LISTING_URL, BASE);

    expect(listing).toMatchObject({
      adId: 999,
      title: null,
      priceAmount: null,
      currency: null,
      year: null,
      sellerType: 'unknown',
      description: null,
      equipment: [],
      images: [],
      attributes: {}
    });
  });
});

describe('label folding', () => {
  it('strips Hungarian accents and trailing colons', () => {
    expect(stripAccents('Őszi ÜZEMANYAG űr')).toBe('Oszi UZEMANYAG ur');
    expect(normalizeLabel('  Évjárat: ')).toBe('Evjarat');
    expect(normalizeLabel('Km. óra állás')).toBe('Km. ora allas');
  });
});
