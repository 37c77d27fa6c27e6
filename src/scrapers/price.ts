import { config } from '../config.js';
import { errorMessage, log } from '../log.js';
import type { NormalizedPrice } from './types.js';

const DISCOUNT_BADGE = /(\d+)\s*%\s*OFF/i;
const PLAIN_PRICE = /^(?:\d{1,2},\d{3}|\d+)$/;

// Ranking badges, delivery and stock notices share the price block on Noon.
const METADATA_KEYWORDS = ['rank', '#', 'in', 'fast', 'left', 'stock'];

const MIN_PRICE = 50;
const MAX_PRICE = 1_000_000;

export interface NormalizeOptions {
  /** How many non-blank lines to scan for prices and badges. */
  maxLines?: number;
}

function emptyPrice(): NormalizedPrice {
  return { current: null, original: null, discountPercent: null };
}

export function computeDiscount(current: number, original: number): number {
  return Math.round(((original - current) / original) * 100);
}

/**
 * Turns a scraped price block such as
 * "4,099\n5,899\n30% OFF\n#2 in Notebook Laptops\nFree Delivery"
 * into `{ current: 4099, original: 5899, discountPercent: 30 }`.
 *
 * Only the first two price candidates are used, in scan order; the smaller
 * becomes `current` whatever order the page printed them in. Never throws.
 */
export function normalizePrice(
  raw: string | null | undefined,
  opts: NormalizeOptions = {}
): NormalizedPrice {
  const result = emptyPrice();
  if (!raw) return result;

  const maxLines = Math.max(1, opts.maxLines ?? config.PRICE_SCAN_LINES);

  try {
    const lines = raw
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .slice(0, maxLines);

    const candidates: number[] = [];
    let badge: number | null = null;

    for (const line of lines) {
      const discountMatch = line.match(DISCOUNT_BADGE);
      if (discountMatch) {
        const pct = parseInt(discountMatch[1] ?? '', 10);
        if (pct >= 0 && pct <= 100) {
          badge = pct;
        }
        continue;
      }

      const lower = line.toLowerCase();
      if (METADATA_KEYWORDS.some((keyword) => lower.includes(keyword))) {
        continue;
      }

      if (PLAIN_PRICE.test(line)) {
        const num = parseInt(line.replace(/,/g, ''), 10);
        if (num > MIN_PRICE && num < MAX_PRICE) {
          candidates.push(num);
        }
      }
    }

    const [first, second] = candidates;
    if (first !== undefined && second !== undefined) {
      result.current = Math.min(first, second);
      result.original = Math.max(first, second);
    } else if (first !== undefined) {
      result.current = first;
    }

    if (badge !== null) {
      result.discountPercent = badge;
    } else if (result.current !== null && result.original !== null) {
      result.discountPercent = computeDiscount(result.current, result.original);
    }
  } catch (error) {
    log.debug(`Error parsing price "${raw}": ${errorMessage(error)}`);
  }

  return result;
}
