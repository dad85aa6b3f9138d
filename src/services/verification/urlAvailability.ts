import type { UrlCheck } from '../../types';
import { headStatus, messageOf, type HttpOptions } from './http';

/**
 * HEAD the URL and call it available on a final 2xx/3xx. A bare site root
 * ("https://example.org") is not taken as a link to the work itself.
 */
export async function checkUrl(url: string, options: HttpOptions = {}): Promise<UrlCheck> {
  if (!/^https?:\/\//i.test(url)) {
    return { url, available: false, status: null, error: 'Not an http(s) URL' };
  }
  if (!/^https?:\/\/[^/]+\/./i.test(url)) {
    return { url, available: false, status: null, error: 'Site root only' };
  }

  try {
    const status = await headStatus(url, options);
    return { url, available: status >= 200 && status < 400, status };
  } catch (err) {
    return { url, available: false, status: null, error: messageOf(err) };
  }
}
