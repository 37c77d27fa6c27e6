export type Platform = 'Amazon' | 'Noon';

export interface RawListing {
  title: string | null;
  rawPrice: string | null;
  link: string | null;
}

export interface NormalizedPrice {
  current: number | null;
  original: number | null;
  discountPercent: number | null;
}

export interface ListingRecord {
  platform: Platform;
  product: string;
  priceRaw: string | null;
  priceCurrent: number | null;
  priceOriginal: number | null;
  discountPercent: number | null;
  link: string | null;
}

export interface SearchResult {
  items: ListingRecord[];
  url: string;
}

export type PageFetcher = (
  url: string,
  opts?: { signal?: AbortSignal }
) => Promise<string>;

export interface SearchOptions {
  market?: string;
  fetcher?: PageFetcher;
  signal?: AbortSignal;
  debug?: boolean;
}
