import { log } from '../log.js';

function tryParse(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    log.debug(`Could not parse URL: ${url}`);
    return null;
  }
}

function pathParts(url: URL): string[] {
  return url.pathname.replace(/^\/+|\/+$/g, '').split('/');
}

/** "amazon.com" -> "https://www.amazon.com" */
export function normalizeUrl(url: string): string {
  let out = url.trim();
  if (!/^https?:\/\//.test(out)) {
    out = `https://${out}`;
  }
  if (!out.includes('https://www.') && !out.includes('http://www.')) {
    out = out.replace(/^(https?:\/\/)/, '$1www.');
  }
  return out;
}

/**
 * Noon product URLs carry an SEO slug and tracking params; the SKU is the
 * segment right before `p`.
 *
 * https://www.noon.com/saudi-en/some-slug/N38503505A/p/?o=abc
 *   -> https://www.noon.com/saudi-en/N38503505A/p/
 */
export function canonicalNoonUrl(url: string): string | null {
  const parsed = tryParse(url);
  if (!parsed) return null;

  const parts = pathParts(parsed);
  const pIndex = parts.indexOf('p');
  if (pIndex <= 0) return null;

  const sku = parts[pIndex - 1];
  const region = parts[0];
  if (!sku || !region) return null;

  return `https://www.noon.com/${region}/${sku}/p/`;
}

/**
 * Handles /dp/{ASIN} and /gp/product/{ASIN}, keeping the store's own host.
 */
export function canonicalAmazonUrl(url: string): string | null {
  const parsed = tryParse(url);
  if (!parsed) return null;

  const parts = pathParts(parsed);
  let asin: string | undefined;

  const dpIndex = parts.indexOf('dp');
  if (dpIndex !== -1) {
    asin = parts[dpIndex + 1];
  } else if (parts.includes('gp') && parts.includes('product')) {
    asin = parts[parts.indexOf('product') + 1];
  }

  if (!asin) return null;
  return `${parsed.protocol}//${parsed.host}/dp/${asin}/`;
}

export function canonicalProductUrl(url: string): string | null {
  const normalized = normalizeUrl(url);
  const parsed = tryParse(normalized);
  if (!parsed) return null;

  const domain = parsed.hostname.toLowerCase();
  if (domain.includes('noon.com')) {
    return canonicalNoonUrl(normalized);
  }
  if (domain.includes('amazon.')) {
    return canonicalAmazonUrl(normalized);
  }

  log.debug(`Unsupported store domain: ${domain}`);
  return null;
}
