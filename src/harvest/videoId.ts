import { InputError } from '../shared/errors.js';

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const PATH_PREFIXES = new Set(['shorts', 'embed', 'live', 'v']);
const HAS_SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*:\/\//;

function toUrl(locator: string): URL {
  // "youtu.be/abc" and "www.youtube.com/watch?v=abc" carry no scheme
  return new URL(HAS_SCHEME.test(locator) ? locator : `https://${locator}`);
}

/**
 * Extract the video id from a watch URL, a short link, a /shorts/ or
 * /embed/ URL, or a bare id. The scheme may be left off.
 */
export function parseVideoId(locator: string): string {
  const trimmed = locator.trim();
  if (!trimmed) {
    throw new InputError('Empty video URL', { locator });
  }
  if (VIDEO_ID_PATTERN.test(trimmed)) {
    return trimmed;
  }

  let url: URL;
  try {
    url = toUrl(trimmed);
  } catch (err) {
    throw new InputError(`Invalid video URL: ${trimmed}`, { locator, cause: String(err) });
  }

  let id = url.searchParams.get('v')?.trim() ?? '';
  if (!id) {
    const host = url.hostname.replace(/^(www|m)\./, '');
    const segments = url.pathname.split('/').filter((s) => s.length > 0);
    if (host === 'youtu.be') {
      id = segments[0] ?? '';
    } else if (segments.length >= 2 && PATH_PREFIXES.has(segments[0] ?? '')) {
      id = segments[1] ?? '';
    }
  }

  if (!id) {
    throw new InputError(`No video id in URL: ${trimmed}`, { locator });
  }
  if (!VIDEO_ID_PATTERN.test(id)) {
    throw new InputError(`Invalid video id "${id}" in URL: ${trimmed}`, { locator });
  }
  return id;
}
