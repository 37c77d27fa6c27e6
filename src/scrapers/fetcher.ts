import axios from 'axios';
import { config } from '../config.js';
import type { PageFetcher } from './types.js';

export interface FetchOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export async function fetchPage(
  url: string,
  opts: FetchOptions = {}
): Promise<string> {
  const { data } = await axios.get<string>(url, {
    responseType: 'text',
    timeout: opts.timeoutMs ?? config.FETCH_TIMEOUT_MS,
    signal: opts.signal,
    headers: {
      'User-Agent': config.USER_AGENT,
      Accept:
        'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
    },
  });

  return data;
}

export const httpFetcher: PageFetcher = (url, opts) =>
  fetchPage(url, { signal: opts?.signal });
