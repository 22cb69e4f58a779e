/**
 * HTTP helpers shared by the workers
 */

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * One request, aborted after `timeout` ms. Network failures and timeouts reject.
 */
export async function fetchWithTimeout(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  timeout: number
): Promise<Response> {
  return fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeout) });
}

/**
 * Status line for error messages, e.g. "HTTP 503: Service Unavailable"
 */
export function describeStatus(response: Response): string {
  return `HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ''}`;
}

/**
 * Escape text for an XML text node or attribute
 */
export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
