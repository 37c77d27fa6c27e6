import { config } from './config.js';

export function ts(): string {
  return new Date().toISOString();
}

export const log = {
  info(message: string): void {
    console.log(`[${ts()}] ${message}`);
  },
  warn(message: string): void {
    console.warn(`[${ts()}] ${message}`);
  },
  error(message: string, err?: unknown): void {
    if (err === undefined) {
      console.error(`[${ts()}] ${message}`);
    } else {
      console.error(`[${ts()}] ${message}`, err);
    }
  },
  debug(message: string): void {
    if (config.DEBUG) {
      console.log(`[${ts()}] [debug] ${message}`);
    }
  },
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
