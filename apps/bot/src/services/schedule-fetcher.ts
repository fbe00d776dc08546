/**
 * Schedule Fetcher
 *
 * Downloads the club's schedule page. No retries: a failed fetch aborts the
 * cycle and the next scheduled run tries again.
 */

import { FetchError, getErrorMessage } from '../errors.js';

export interface FetchScheduleOptions {
  /** Abort the request after this many milliseconds (default: 10000) */
  timeoutMs?: number;
}

const REQUEST_HEADERS = {
  accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'accept-language': 'en-US,en;q=0.9',
  'user-agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36',
};

export async function fetchSchedulePage(
  url: string,
  options: FetchScheduleOptions = {}
): Promise<string> {
  const { timeoutMs = 10000 } = options;

  let response: Response;
  try {
    response = await fetch(url, {
      headers: REQUEST_HEADERS,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const timedOut = error instanceof Error && error.name === 'TimeoutError';
    throw new FetchError(
      timedOut
        ? `Timed out after ${timeoutMs}ms fetching ${url}`
        : `Failed to fetch ${url}: ${getErrorMessage(error)}`,
      url,
      undefined,
      { timedOut }
    );
  }

  if (!response.ok) {
    throw new FetchError(`Failed to load schedule page: HTTP ${response.status}`, url, response.status);
  }

  let html: string;
  try {
    html = await response.text();
  } catch (error) {
    throw new FetchError(`Failed to read schedule page body: ${getErrorMessage(error)}`, url, response.status);
  }
  console.log(`[ScheduleFetcher] Fetched ${html.length} characters from ${url}`);
  return html;
}
