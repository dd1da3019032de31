import path from 'node:path';
import { homedir } from 'node:os';
import { CancelledError } from './errors.js';

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function getHarvestDir(): string {
  return resolvePath('~/.comment-harvest');
}

/**
 * Resolve after `ms`, or reject with CancelledError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Parse a newline-separated list of URLs.
 * Skips empty lines and lines starting with #.
 */
export function parseUrlList(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
