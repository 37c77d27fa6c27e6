/** Reads a positive integer from the environment; values below 1 are rejected. */
export function intEnv(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid integer in environment variable: ${name}=${value}`);
  }
  if (parsed < 1) {
    throw new Error(`Environment variable must be at least 1: ${name}=${value}`);
  }
  return parsed;
}

function flagValue(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return undefined;
  const value = process.argv[idx + 1];
  return value && !value.startsWith('--') ? value : undefined;
}

export const config = {
  // Env vars (all optional)
  DEFAULT_MARKET: process.env.MARKET || 'Saudi Arabia',
  OUTPUT_DIR: process.env.OUTPUT_DIR || 'data',
  FETCH_TIMEOUT_MS: intEnv('FETCH_TIMEOUT_MS', 15000),
  PRICE_SCAN_LINES: intEnv('PRICE_SCAN_LINES', 5),
  PORT: process.env.PORT ? intEnv('PORT', 3000) : null,
  API_TOKEN: process.env.API_TOKEN || '',

  // Hardcoded settings
  USER_AGENT:
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  PREVIEW_COUNT: 5,

  // CLI flags
  MARKET_ARG: flagValue('--market'),
  QUERY_ARG: flagValue('--query'),
  DRY_RUN: process.argv.includes('--dry-run'),
  DEBUG: process.argv.includes('--debug') || process.env.DEBUG === 'true',
} as const;
