/**
 * Authentication hooks.
 *
 * A hook signs each outgoing request before the transport sends it. Assign
 * one to `session.auth`, or pass it as the `auth` option.
 *
 * @example
 * ```typescript
 * const session = new GraphQLSession('http://localhost:4000/graphql');
 * session.auth = bearerAuth(token);
 *
 * // Or any object with a sign method
 * session.auth = {
 *   sign(request) {
 *     request.headers.set('X-Api-Key', apiKey);
 *     return request;
 *   },
 * };
 * ```
 */

import type { AuthHook, RequestSigner, SignableRequest } from './types';

/**
 * Runs a hook of either shape.
 */
export function applyAuth(
  hook: AuthHook,
  request: SignableRequest
): SignableRequest | Promise<SignableRequest> {
  return typeof hook === 'function' ? hook(request) : hook.sign(request);
}

/**
 * Sets `Authorization: <scheme> <token>`.
 */
export function tokenAuth(token: string, scheme = 'Token'): RequestSigner {
  return {
    sign(request) {
      request.headers.set('Authorization', `${scheme} ${token}`);
      return request;
    },
  };
}

export function bearerAuth(token: string): RequestSigner {
  return tokenAuth(token, 'Bearer');
}

/**
 * HTTP basic authentication.
 */
export function basicAuth(username: string, password: string): RequestSigner {
  const credentials = Buffer.from(`${username}:${password}`).toString('base64');
  return tokenAuth(credentials, 'Basic');
}
