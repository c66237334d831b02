/**
 * Bounded HTTP fetch for URL registration
 */

import type { Result } from '../types/index.js';
import { success, failure } from '../types/index.js';

import { readChunks } from './streams.js';

export interface FetchedObject {
  chunks: AsyncIterable<Uint8Array>;
  contentLength: number | null;
  contentType: string | null;
  fileName: string | null;
}

/**
 * Opens a remote object for streaming
 */
export interface UrlFetcher {
  open: (url: URL, signal: AbortSignal) => Promise<Result<FetchedObject>>;
}

const MAX_REDIRECTS = 5;

/**
 * filename from a Content-Disposition header, if any
 */
export function fileNameFromDisposition(header: string | null): string | null {
  if (header === null) {
    return null;
  }
  const encoded = /filename\*\s*=\s*(?:UTF-8'')?([^;]+)/i.exec(header);
  if (encoded?.[1] !== undefined) {
    try {
      return decodeURIComponent(encoded[1].trim().replace(/^"|"$/g, ''));
    } catch {
      return null;
    }
  }
  const plain = /filename\s*=\s*"?([^";]+)"?/i.exec(header);
  return plain?.[1]?.trim() ?? null;
}

/**
 * Last path segment of a URL, decoded
 */
export function fileNameFromUrl(url: URL): string | null {
  const segment = url.pathname.split('/').filter((part) => part !== '').pop();
  if (segment === undefined) {
    return null;
  }
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * fetch-based fetcher. Redirects are followed manually so every hop is
 * checked by isSafe before it is requested.
 */
export function createHttpUrlFetcher(deps: {
  isSafe: (url: string) => Result<URL>;
  fetchImpl?: typeof fetch;
}): UrlFetcher {
  const fetchImpl = deps.fetchImpl ?? fetch;

  return {
    async open(url: URL, signal: AbortSignal): Promise<Result<FetchedObject>> {
      let current = url;

      for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
        let response: Response;
        try {
          response = await fetchImpl(current, { redirect: 'manual', signal });
        } catch (err) {
          if (signal.aborted) {
            return failure('TRANSFER_ABORTED', 'Download took too long');
          }
          console.error(`[fetch] request to ${current.host} failed:`, err);
          return failure('FETCH_FAILED', 'Could not reach the URL');
        }

        const location = response.headers.get('location');
        if (response.status >= 300 && response.status < 400 && location !== null) {
          await response.body?.cancel();
          let target: string;
          try {
            target = new URL(location, current).toString();
          } catch {
            return failure('FETCH_FAILED', 'Remote server sent an invalid redirect');
          }
          const next = deps.isSafe(target);
          if (!next.success) {
            return next;
          }
          current = next.data;
          continue;
        }

        if (!response.ok || response.body === null) {
          await response.body?.cancel();
          return failure('FETCH_FAILED', `Remote server answered ${response.status}`, {
            status: response.status,
          });
        }

        const length = Number(response.headers.get('content-length'));
        return success({
          chunks: readChunks(response.body, signal),
          contentLength: Number.isFinite(length) && length > 0 ? length : null,
          contentType: response.headers.get('content-type'),
          fileName:
            fileNameFromDisposition(response.headers.get('content-disposition')) ??
            fileNameFromUrl(current),
        });
      }

      return failure('FETCH_FAILED', 'Too many redirects');
    },
  };
}
