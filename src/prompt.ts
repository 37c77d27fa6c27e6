import { createInterface } from 'node:readline/promises';

export interface SearchInput {
  market: string;
  query: string;
}

/**
 * Fills in whatever the CLI flags left out by asking on stdin.
 * Returns null when the market or product is left blank.
 */
export async function collectSearchInput(
  defaults: { market?: string; query?: string },
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<SearchInput | null> {
  let market = defaults.market?.trim() ?? '';
  let query = defaults.query?.trim() ?? '';

  if (!market || !query) {
    const rl = createInterface({ input, output });
    try {
      if (!market) {
        market = (await rl.question('Enter market (e.g., Saudi Arabia, UAE): ')).trim();
      }
      if (!query) {
        query = (await rl.question('Enter product to search (e.g., laptop, phone): ')).trim();
      }
    } finally {
      rl.close();
    }
  }

  if (!market || !query) return null;
  return { market, query };
}
