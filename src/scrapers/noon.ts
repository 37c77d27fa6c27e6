import { config } from '../config.js';
import { errorMessage, log } from '../log.js';
import { parsePage, type ElementHandle, type ParsedPage } from './document.js';
import { extractPriceDetailed, extractRawListing } from './extract.js';
import { httpFetcher } from './fetcher.js';
import { normalizePrice } from './price.js';
import type { ListingRecord, SearchOptions, SearchResult } from './types.js';

export const NOON_MARKETS: Record<string, string> = {
  'Saudi Arabia': 'https://www.noon.com/saudi-en',
  UAE: 'https://www.noon.com/uae-en',
  Egypt: 'https://www.noon.com/egypt-en',
};

const PRIMARY_SELECTOR = 'div[data-qa="plp-product-box"]';
const ALTERNATIVE_SELECTORS = [
  'div[class*="product"]',
  'article',
  'div[data-qa*="product"]',
];
const MIN_PRIMARY_MATCHES = 5;
const MIN_PAGE_SIZE = 10000;
const LINK_SELECTORS = ['a'];

export function buildNoonSearchUrl(market: string, query: string): string {
  const base = NOON_MARKETS[market] ?? NOON_MARKETS['Saudi Arabia'];
  return `${base}/search?q=${encodeURIComponent(query)}`;
}

/**
 * Noon renders most of the grid client-side, so the primary selector can come
 * back short. Falls back to broader selectors and keeps the largest match set.
 */
export function selectNoonProducts(page: ParsedPage): ElementHandle[] {
  const tried: string[] = [];
  let products: ElementHandle[] = [];

  const primary = page.select(PRIMARY_SELECTOR);
  if (primary.ok) {
    products = primary.matches;
    tried.push(`Primary (${PRIMARY_SELECTOR}): ${products.length}`);
  } else {
    tried.push(`Primary selector failed: ${primary.error}`);
  }

  if (products.length < MIN_PRIMARY_MATCHES) {
    for (const selector of ALTERNATIVE_SELECTORS) {
      const alt = page.select(selector);
      if (!alt.ok || alt.matches.length === 0) continue;
      tried.push(`Alt (${selector}): ${alt.matches.length}`);
      if (alt.matches.length > products.length) {
        products = alt.matches;
      }
    }
  }

  log.debug(`Selectors tried: ${tried.join('; ')}`);
  return products;
}

function toRecord(
  product: ElementHandle,
  pageUrl: string,
  idx: number,
  debug: boolean
): ListingRecord | null {
  const raw = extractRawListing(product, LINK_SELECTORS, pageUrl);
  if (raw.title === null) return null;

  const normalized = normalizePrice(raw.rawPrice);

  if (debug) {
    log.info(`[${idx + 1}] Title='${raw.title.slice(0, 50)}...' Price='${raw.rawPrice ?? ''}'`);
    if (raw.rawPrice === null) {
      log.info(`  No price found. Tried: ${extractPriceDetailed(product).tried.join(', ')}`);
    }
  }

  return {
    platform: 'Noon',
    product: raw.title,
    priceRaw: raw.rawPrice,
    priceCurrent: normalized.current,
    priceOriginal: normalized.original,
    discountPercent: normalized.discountPercent,
    link: raw.link,
  };
}

export async function searchNoon(
  query: string,
  opts: SearchOptions = {}
): Promise<SearchResult> {
  const market = opts.market ?? config.DEFAULT_MARKET;
  const fetcher = opts.fetcher ?? httpFetcher;
  const debug = opts.debug ?? config.DEBUG;

  const url = buildNoonSearchUrl(market, query);
  log.debug(`Loading Noon URL: ${url}`);

  const html = await fetcher(url, { signal: opts.signal });
  const page = parsePage(html);

  if (page.title.toLowerCase().includes('error') || page.size < MIN_PAGE_SIZE) {
    log.warn(
      `Possible page load issue - Title: ${page.title}, Source length: ${page.size}`
    );
  }

  const products = selectNoonProducts(page);
  log.info(`Found ${products.length} products on Noon`);

  const items: ListingRecord[] = [];
  products.forEach((product, idx) => {
    try {
      const record = toRecord(product, url, idx, debug);
      if (record) items.push(record);
    } catch (error) {
      log.debug(`Error processing Noon product ${idx + 1}: ${errorMessage(error)}`);
    }
  });

  return { items, url };
}
