/**
 * Herald: HTTP Helpers
 *
 * Read-only GETs for source adapters. Every failure mode (network error,
 * timeout, non-2xx, empty body) surfaces as SourceUnavailableError.
 */

import { SourceUnavailableError } from './errors';

export const USER_AGENT = 'Mozilla/5.0 (compatible; Herald/1.0)';

export interface FetchTextOptions {
  /** Source name used in the error message */
  source: string;
  signal?: AbortSignal;
  headers?: Record<string, string>;
  /** Reject a 2xx response whose body is blank (default: true) */
  requireBody?: boolean;
}

export async function fetchText(url: string, options: FetchTextOptions): Promise<string> {
  let res: Response;
  try {
    res = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT, ...options.headers },
      signal: options.signal,
    });
  } catch (error) {
    const reason = options.signal?.aborted ? 'request aborted (timeout)' : `request failed for ${url}`;
    throw new SourceUnavailableError(options.source, reason, { cause: error });
  }

  if (!res.ok) {
    throw new SourceUnavailableError(options.source, `HTTP ${res.status} from ${url}`);
  }

  let body: string;
  try {
    body = await res.text();
  } catch (error) {
    throw new SourceUnavailableError(options.source, `unreadable body from ${url}`, { cause: error });
  }

  if ((options.requireBody ?? true) && body.trim() === '') {
    throw new SourceUnavailableError(options.source, `empty body from ${url}`);
  }

  return body;
}
