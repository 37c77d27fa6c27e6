import http from 'node:http';
import { config } from './config.js';
import { errorMessage, log } from './log.js';
import { runPipeline, type PipelineResult } from './pipeline.js';
import { normalizePrice } from './scrapers/price.js';
import type { PageFetcher } from './scrapers/types.js';
import { canonicalProductUrl } from './scrapers/urls.js';

function json(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString()));
    req.on('error', reject);
  });
}

/** Parses a JSON object body; anything else becomes an empty object. */
export function parseJsonObject(body: string): Record<string, unknown> {
  if (!body.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(body);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? { ...parsed }
      : {};
  } catch {
    log.debug('Ignoring request body that is not valid JSON');
    return {};
  }
}

function stringField(body: Record<string, unknown>, key: string): string | null {
  const value = body[key];
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

export interface ServerOptions {
  apiToken?: string;
  fetcher?: PageFetcher;
  outputDir?: string;
}

interface LastRun {
  outputPath: string | null;
  listings: number;
  finishedAt: string;
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const apiToken = opts.apiToken ?? config.API_TOKEN;

  let isRunning = false;
  let lastRun: LastRun | null = null;
  let currentAbortController: AbortController | null = null;

  function authenticate(req: http.IncomingMessage): boolean {
    if (!apiToken) return true; // no token configured = open (dev mode)
    return req.headers.authorization === `Bearer ${apiToken}`;
  }

  // Taken synchronously, before the request body is read, so an overlapping
  // trigger already sees the run.
  function claimRun(): AbortController {
    isRunning = true;
    currentAbortController = new AbortController();
    return currentAbortController;
  }

  function releaseRun() {
    isRunning = false;
    currentAbortController = null;
  }

  async function triggerRun(
    controller: AbortController,
    market: string,
    query: string,
    dryRun: boolean
  ): Promise<PipelineResult> {
    try {
      const result = await runPipeline({
        market,
        query,
        dryRun,
        fetcher: opts.fetcher,
        outputDir: opts.outputDir,
        abortSignal: controller.signal,
      });
      lastRun = {
        outputPath: result.outputPath,
        listings: result.records.length,
        finishedAt: new Date().toISOString(),
      };
      return result;
    } finally {
      releaseRun();
    }
  }

  return http.createServer((req, res) => {
    const url = new URL(req.url || '/', 'http://localhost');

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Authorization, Content-Type');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    // GET / or /health
    if (req.method === 'GET' && (url.pathname === '/' || url.pathname === '/health')) {
      json(res, 200, { status: 'ok', isRunning, lastRun });
      return;
    }

    // POST /trigger
    if (req.method === 'POST' && url.pathname === '/trigger') {
      if (!authenticate(req)) {
        json(res, 401, { error: 'Unauthorized' });
        return;
      }

      if (isRunning) {
        json(res, 409, { error: 'A run is already in progress' });
        return;
      }

      const dryRun = url.searchParams.get('dry_run') === 'true';
      const controller = claimRun();

      readBody(req)
        .then((raw) => {
          const body = parseJsonObject(raw);
          const query = stringField(body, 'query');
          const market = stringField(body, 'market') ?? config.DEFAULT_MARKET;
          if (!query) {
            releaseRun();
            json(res, 400, { error: 'Missing or invalid "query" field' });
            return;
          }

          json(res, 202, { message: 'Run started', market, query, dryRun });

          triggerRun(controller, market, query, dryRun).catch((err) => {
            log.error(`[server] Pipeline error: ${errorMessage(err)}`);
          });
        })
        .catch((err) => {
          releaseRun();
          json(res, 500, { error: errorMessage(err) });
        });
      return;
    }

    // POST /stop
    if (req.method === 'POST' && url.pathname === '/stop') {
      if (!authenticate(req)) {
        json(res, 401, { error: 'Unauthorized' });
        return;
      }

      if (!isRunning || !currentAbortController) {
        json(res, 409, { error: 'No run is currently in progress' });
        return;
      }

      currentAbortController.abort();
      json(res, 200, { message: 'Stop signal sent' });
      return;
    }

    // POST /parse-price
    if (req.method === 'POST' && url.pathname === '/parse-price') {
      readBody(req)
        .then((raw) => {
          const priceText = parseJsonObject(raw).raw;
          if (typeof priceText !== 'string') {
            json(res, 400, { error: 'Missing or invalid "raw" field' });
            return;
          }
          json(res, 200, normalizePrice(priceText));
        })
        .catch((err) => {
          json(res, 500, { error: errorMessage(err) });
        });
      return;
    }

    // POST /canonical-url
    if (req.method === 'POST' && url.pathname === '/canonical-url') {
      readBody(req)
        .then((raw) => {
          const productUrl = stringField(parseJsonObject(raw), 'url');
          if (!productUrl) {
            json(res, 400, { error: 'Missing or invalid "url" field' });
            return;
          }
          json(res, 200, { canonical: canonicalProductUrl(productUrl) });
        })
        .catch((err) => {
          json(res, 500, { error: errorMessage(err) });
        });
      return;
    }

    json(res, 404, { error: 'Not found' });
  });
}

export function startServer(port: number): http.Server {
  const server = createServer();
  server.listen(port, '0.0.0.0', () => {
    log.info(`[server] Price tracker HTTP server listening on port ${port}`);
    log.info('[server] Runs are manual-only, use POST /trigger to start');
  });
  return server;
}
