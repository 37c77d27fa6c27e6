import { config } from './config.js';
import { errorMessage, log } from './log.js';
import { writeResultsCsv } from './output.js';
import { searchAmazon } from './scrapers/amazon.js';
import { searchNoon } from './scrapers/noon.js';
import type {
  ListingRecord,
  PageFetcher,
  Platform,
  SearchOptions,
  SearchResult,
} from './scrapers/types.js';

export interface PipelineOptions {
  market: string;
  query: string;
  dryRun: boolean;
  fetcher?: PageFetcher;
  outputDir?: string;
  abortSignal?: AbortSignal;
}

export interface PipelineResult {
  records: ListingRecord[];
  outputPath: string | null;
}

type PlatformSearch = (query: string, opts: SearchOptions) => Promise<SearchResult>;

const PLATFORMS: ReadonlyArray<[Platform, PlatformSearch]> = [
  ['Amazon', searchAmazon],
  ['Noon', searchNoon],
];

export async function runPipeline(opts: PipelineOptions): Promise<PipelineResult> {
  log.info('Price tracker starting...');
  log.info(`Dry run: ${opts.dryRun}`);
  log.info(`Market: "${opts.market}"`);
  log.info(`Search query: "${opts.query}"`);

  const allRecords: ListingRecord[] = [];

  for (const [platform, search] of PLATFORMS) {
    if (opts.abortSignal?.aborted) {
      log.warn(`Run aborted before ${platform} scrape`);
      break;
    }

    log.info(`Starting ${platform} scrape for "${opts.query}"...`);
    try {
      const result = await search(opts.query, {
        market: opts.market,
        fetcher: opts.fetcher,
        signal: opts.abortSignal,
      });

      if (result.items.length > 0) {
        log.info(`${platform}: scraped ${result.items.length} listings from ${result.url}`);
      } else {
        log.warn(`No ${platform} results found`);
      }
      allRecords.push(...result.items);
    } catch (error) {
      // A failed platform counts as zero listings; the other one still runs.
      log.error(`Error scraping ${platform}: ${errorMessage(error)}`);
    }
  }

  log.info(`Total products found: ${allRecords.length}`);

  if (allRecords.length === 0) {
    log.warn('No results to save');
    return { records: allRecords, outputPath: null };
  }

  log.info(`First ${Math.min(config.PREVIEW_COUNT, allRecords.length)} results:`);
  allRecords.slice(0, config.PREVIEW_COUNT).forEach((record, i) => {
    log.info(
      `${i + 1}. ${record.platform}: ${record.product} - Price: ${record.priceCurrent ?? record.priceRaw ?? 'N/A'}`
    );
  });

  if (opts.dryRun) {
    log.info('Dry run — skipping CSV output');
    return { records: allRecords, outputPath: null };
  }

  const outputPath = await writeResultsCsv(
    allRecords,
    opts.outputDir ?? config.OUTPUT_DIR
  );
  log.info(`Results saved to ${outputPath}`);

  return { records: allRecords, outputPath };
}
