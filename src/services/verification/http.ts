export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  fetch?: FetchLike;
  timeoutMs?: number;
}

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;
const USER_AGENT = 'reference-parser/0.1';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringField(value: Record<string, unknown>, key: string): string | null {
  const field = value[key];
  return typeof field === 'string' && field.length > 0 ? field : null;
}

/** First element of a string array field ("title": ["..."]) */
export function firstString(value: unknown): string | null {
  if (!Array.isArray(value)) return null;
  const first: unknown = value[0];
  return typeof first === 'string' ? first : null;
}

/** Append the contact address some APIs ask for ("polite pool") */
export function withMailto(url: string, mailto: string | null | undefined): string {
  if (!mailto) return url;
  return `${url}${url.includes('?') ? '&' : '?'}mailto=${encodeURIComponent(mailto)}`;
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * GET a JSON document. A 404 resolves to null; any other non-2xx status
 * rejects with "HTTP <status>".
 */
export async function fetchJson(url: string, options: HttpOptions = {}): Promise<unknown> {
  const doFetch = options.fetch ?? fetch;
  const response = await doFetch(url, {
    headers: { Accept: 'application/json', 'User-Agent': USER_AGENT },
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS),
  });

  if (response.status === 404) return null;
  if (!response.ok) throw new Error(`HTTP ${response.status}`);
  const body: unknown = await response.json();
  return body;
}

/**
 * HEAD a URL, following redirects. Resolves to the final status.
 */
export async function headStatus(url: string, options: HttpOptions = {}): Promise<number> {
  const doFetch = options.fetch ?? fetch;
  const response = await doFetch(url, {
    method: 'HEAD',
    redirect: 'follow',
    headers: { 'User-Agent': USER_AGENT },
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS),
  });
  return response.status;
}
