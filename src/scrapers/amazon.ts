import { config } from '../config.js';
import { errorMessage, log } from '../log.js';
import { parsePage, type ElementHandle } from './document.js';
import { extractPriceDetailed, extractRawListing } from './extract.js';
import { httpFetcher } from './fetcher.js';
import { normalizePrice } from './price.js';
import type { ListingRecord, SearchOptions, SearchResult } from './types.js';

export const AMAZON_MARKETS: Record<string, string> = {
  'Saudi Arabia': 'https://www.amazon.sa',
  UAE: 'https://www.amazon.ae',
  Egypt: 'https://www.amazon.eg',
};

// data-component-type outlives Amazon's frequent class renames.
const PRODUCT_SELECTOR = 'div[data-component-type="s-search-result"]';
const LINK_SELECTORS = ['h2 a', 'h3 a', 'a'];

export function buildAmazonSearchUrl(market: string, query: string): string {
  const base = AMAZON_MARKETS[market] ?? AMAZON_MARKETS['Saudi Arabia'];
  return `${base}/s?k=${encodeURIComponent(query)}`;
}

/** `.a-price-whole` renders as "4,099." with the decimal mark attached. */
export function stripDecimalMark(rawPrice: string | null): string | null {
  return rawPrice === null ? null : rawPrice.replace(/\.\s*$/, '');
}

function toRecord(
  product: ElementHandle,
  pageUrl: string,
  debug: boolean
): ListingRecord | null {
  const raw = extractRawListing(product, LINK_SELECTORS, pageUrl);
  if (raw.title === null) return null;

  if (debug && raw.rawPrice === null) {
    log.info(`  No price found. Tried: ${extractPriceDetailed(product).tried.join(', ')}`);
  }
  const normalized = normalizePrice(stripDecimalMark(raw.rawPrice));

  return {
    platform: 'Amazon',
    product: raw.title,
    priceRaw: raw.rawPrice,
    priceCurrent: normalized.current,
    priceOriginal: normalized.original,
    discountPercent: normalized.discountPercent,
    link: raw.link,
  };
}

export async function searchAmazon(
  query: string,
  opts: SearchOptions = {}
): Promise<SearchResult> {
  const market = opts.market ?? config.DEFAULT_MARKET;
  const fetcher = opts.fetcher ?? httpFetcher;
  const debug = opts.debug ?? config.DEBUG;

  const url = buildAmazonSearchUrl(market, query);
  log.debug(`Loading Amazon URL: ${url}`);

  const html = await fetcher(url, { signal: opts.signal });
  const page = parsePage(html);

  const selection = page.select(PRODUCT_SELECTOR);
  if (!selection.ok) {
    throw new Error(`Amazon product selector failed: ${selection.error}`);
  }
  log.info(`Found ${selection.matches.length} products on Amazon`);

  const items: ListingRecord[] = [];
  for (const product of selection.matches) {
    try {
      const record = toRecord(product, url, debug);
      if (record) items.push(record);
    } catch (error) {
      log.debug(`Error processing Amazon product: ${errorMessage(error)}`);
    }
  }

  return { items, url };
}
