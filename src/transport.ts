/**
 * Single HTTP GET against the LegiScan API
 */

import { TransportError } from './errors.js';
import { redactApiKey } from './utils.js';

export interface FetchOptions {
  /** Operation name, used in error messages */
  operation: string;
  timeoutMs?: number;
}

/**
 * Fetch a URL and return the response body as text. No retries.
 */
export async function fetchRaw(url: string, options: FetchOptions): Promise<string> {
  const { operation, timeoutMs } = options;
  const signal = timeoutMs !== undefined ? AbortSignal.timeout(timeoutMs) : undefined;

  let response: Response;
  try {
    response = await fetch(url, { signal });
  } catch (err) {
    const reason =
      err instanceof Error && err.name === 'TimeoutError'
        ? `request timed out after ${timeoutMs}ms`
        : `request failed: ${err instanceof Error ? err.message : String(err)}`;
    // fetch's own message may quote the URL, key included
    throw new TransportError(operation, redactApiKey(`${reason} (${url})`), undefined, { cause: err });
  }

  if (!response.ok) {
    throw new TransportError(
      operation,
      redactApiKey(`API error: ${response.status} ${response.statusText} (${url})`),
      response.status
    );
  }

  try {
    return await response.text();
  } catch (err) {
    throw new TransportError(operation, 'failed to read response body', response.status, { cause: err });
  }
}
