/**
 * Cookie persistence across the requests of a session.
 */

import type { AxiosInstance } from 'axios';
import type { CookieJar } from 'tough-cookie';

/**
 * Sends the jar's cookies for `url` with every request and stores every
 * `Set-Cookie` the responses carry. Cookies the jar refuses (another
 * domain, unparsable) are dropped. An explicit `Cookie` header on a
 * request wins over the jar.
 */
export function installCookieJar(
  transport: AxiosInstance,
  jar: CookieJar,
  url: string
): void {
  transport.interceptors.request.use(async (config) => {
    const cookie = await jar.getCookieString(url);
    if (cookie !== '' && !config.headers.has('Cookie')) {
      config.headers.set('Cookie', cookie);
    }
    return config;
  });

  transport.interceptors.response.use(async (response) => {
    const setCookie: unknown = response.headers['set-cookie'];
    if (Array.isArray(setCookie)) {
      for (const header of setCookie) {
        if (typeof header === 'string') {
          await jar.setCookie(header, url, { ignoreError: true });
        }
      }
    }
    return response;
  });
}
