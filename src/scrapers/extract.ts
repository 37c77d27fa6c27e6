import type { ElementHandle, QueryResult } from './document.js';
import type { RawListing } from './types.js';
import { canonicalProductUrl } from './urls.js';

export type StrategyOutcome =
  | { kind: 'found'; value: string }
  | { kind: 'empty' }
  | { kind: 'missing' }
  | { kind: 'error'; error: string };

export interface FieldStrategy {
  name: string;
  run(element: ElementHandle): StrategyOutcome;
}

export interface ExtractionTrace {
  value: string | null;
  tried: string[];
}

const MIN_FALLBACK_TITLE_LENGTH = 10;
const CURRENCY_CODES = ['SAR', 'AED'];

function fromText(text: string | null | undefined): StrategyOutcome {
  const trimmed = text?.trim();
  return trimmed ? { kind: 'found', value: trimmed } : { kind: 'empty' };
}

function firstMatch(
  result: QueryResult,
  read: (el: ElementHandle) => string | null
): StrategyOutcome {
  if (!result.ok) return { kind: 'error', error: result.error };
  const [first] = result.matches;
  if (!first) return { kind: 'missing' };
  return fromText(read(first));
}

function selectorText(name: string, selector: string): FieldStrategy {
  return {
    name,
    run: (el) => firstMatch(el.find(selector), (match) => match.text()),
  };
}

export const TITLE_STRATEGIES: readonly FieldStrategy[] = [
  selectorText('h2', 'h2'),
  selectorText('h3', 'h3'),
  selectorText('s-title span', 'span[data-component-type="s-title"]'),
  {
    name: 'long text',
    run: (el) => {
      const result = el.findByOwnText(
        (text) => text.length > MIN_FALLBACK_TITLE_LENGTH
      );
      if (!result.ok) return { kind: 'error', error: result.error };
      if (result.matches.length === 0) return { kind: 'missing' };
      for (const match of result.matches) {
        const text = match.text();
        if (text.length > MIN_FALLBACK_TITLE_LENGTH) {
          return { kind: 'found', value: text };
        }
      }
      return { kind: 'empty' };
    },
  },
];

export const PRICE_STRATEGIES: readonly FieldStrategy[] = [
  selectorText('a-price-whole', '.a-price-whole'),
  selectorText('price class', '[class*="price"]'),
  {
    name: 'data-price',
    run: (el) => {
      const value = el.attr('data-price');
      return value === null ? { kind: 'missing' } : fromText(value);
    },
  },
  {
    name: 'currency indicator',
    run: (el) =>
      firstMatch(
        el.findByOwnText((text) =>
          CURRENCY_CODES.some((code) => text.includes(code))
        ),
        (match) => match.text()
      ),
  },
];

/** Runs strategies in order and stops at the first one that finds text. */
export function runStrategies(
  element: ElementHandle,
  strategies: readonly FieldStrategy[]
): ExtractionTrace {
  const tried: string[] = [];

  for (const strategy of strategies) {
    const outcome = strategy.run(element);
    switch (outcome.kind) {
      case 'found':
        return { value: outcome.value, tried };
      case 'empty':
        tried.push(`${strategy.name} (found but empty)`);
        break;
      case 'error':
        tried.push(`${strategy.name} (error: ${outcome.error})`);
        break;
      case 'missing':
        tried.push(strategy.name);
        break;
    }
  }

  return { value: null, tried };
}

export function extractTitle(element: ElementHandle): string | null {
  return runStrategies(element, TITLE_STRATEGIES).value;
}

export function extractPriceDetailed(element: ElementHandle): ExtractionTrace {
  return runStrategies(element, PRICE_STRATEGIES);
}

export function extractPrice(element: ElementHandle): string | null {
  return extractPriceDetailed(element).value;
}

/**
 * First `href` under any of the selectors, made absolute against `baseUrl`
 * and canonicalized when the store is recognized.
 */
export function extractLink(
  element: ElementHandle,
  selectors: readonly string[],
  baseUrl: string
): string | null {
  for (const selector of selectors) {
    const result = element.find(selector);
    if (!result.ok) continue;

    for (const match of result.matches) {
      const href = match.attr('href')?.trim();
      if (!href) continue;

      let absolute: string;
      try {
        absolute = new URL(href, baseUrl).toString();
      } catch {
        continue;
      }
      return canonicalProductUrl(absolute) ?? absolute;
    }
  }

  return null;
}

export function extractRawListing(
  element: ElementHandle,
  linkSelectors: readonly string[],
  baseUrl: string
): RawListing {
  return {
    title: extractTitle(element),
    rawPrice: extractPrice(element),
    link: extractLink(element, linkSelectors, baseUrl),
  };
}
