import type { EventEmitter } from 'node:events';

/**
 * Abort `controller` on the first SIGINT from any of `sources`.
 *
 * A terminal readline interface puts stdin in raw mode, so Ctrl-C arrives as
 * the interface's own 'SIGINT' event rather than a process signal; pass it
 * alongside `process` while one is open. Returns a function that detaches
 * every listener.
 */
export function abortOnInterrupt(
  controller: AbortController,
  sources: EventEmitter[],
  onInterrupt?: () => void,
): () => void {
  const handler = (): void => {
    if (controller.signal.aborted) return;
    onInterrupt?.();
    controller.abort();
  };
  for (const source of sources) {
    source.on('SIGINT', handler);
  }
  return () => {
    for (const source of sources) {
      source.removeListener('SIGINT', handler);
    }
  };
}
