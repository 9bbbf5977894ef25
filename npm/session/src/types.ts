/**
 * Core types for graphql-session.
 */

import type {
  AxiosAdapter,
  AxiosRequestConfig,
  CreateAxiosDefaults,
  InternalAxiosRequestConfig,
} from 'axios';
import type { CookieJar } from 'tough-cookie';

// =============================================================================
// JSON Values
// =============================================================================

/**
 * Any value that survives a JSON round trip.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Variables of a GraphQL operation, keyed by variable name (without `$`).
 */
export type Variables = JsonObject;

// =============================================================================
// File Uploads
// =============================================================================

/**
 * Maps a file identifier to the operations paths the file is substituted
 * into, e.g. `{ '0': ['variables.cv'] }`.
 */
export type FileMap = Record<string, readonly string[]>;

/**
 * Raw content of an uploaded file.
 */
export type FileContent = Blob | Uint8Array | ArrayBuffer | string;

/**
 * `[filename, content, contentType]`
 */
export type FileDescriptor = readonly [
  filename: string,
  content: FileContent,
  contentType: string,
];

/**
 * Files to upload, keyed by the identifiers used in the {@link FileMap}.
 */
export type UploadFiles = Record<string, FileDescriptor>;

// =============================================================================
// Payloads
// =============================================================================

/**
 * The `{ query, variables }` object sent as the JSON body, or as the
 * `operations` part of a multipart request.
 */
export interface OperationPayload {
  readonly query: string;
  readonly variables?: Variables;
  readonly operationName?: string;
}

/**
 * GraphQL response body as servers send it. The session never inspects it.
 */
export interface GraphQLResponse<TData = unknown> {
  readonly data?: TData | null;
  readonly errors?: ReadonlyArray<GraphQLErrorResponse>;
  readonly extensions?: Record<string, unknown>;
}

/**
 * GraphQL error in the response.
 */
export interface GraphQLErrorResponse {
  readonly message: string;
  readonly locations?: ReadonlyArray<{ line: number; column: number }>;
  readonly path?: ReadonlyArray<string | number>;
  readonly extensions?: Record<string, unknown>;
}

// =============================================================================
// Authentication
// =============================================================================

/**
 * Outgoing request as seen by an auth hook.
 */
export type SignableRequest = InternalAxiosRequestConfig;

/**
 * Request-signing capability. Runs before every request the session sends.
 * Throwing aborts the request.
 */
export interface RequestSigner {
  sign(request: SignableRequest): SignableRequest | Promise<SignableRequest>;
}

export type SignFunction = (
  request: SignableRequest
) => SignableRequest | Promise<SignableRequest>;

export type AuthHook = RequestSigner | SignFunction;

// =============================================================================
// Configuration
// =============================================================================

/**
 * Receives one line per request event, with optional structured data.
 */
export type Logger = (message: string, data?: unknown) => void;

/**
 * Transport defaults that the session does not manage itself.
 */
export type TransportDefaults = Omit<
  CreateAxiosDefaults,
  'url' | 'baseURL' | 'headers' | 'timeout' | 'adapter'
>;

/**
 * Options for a session, besides its endpoint.
 */
export interface SessionOptions {
  /**
   * Default headers to include in every request.
   */
  readonly headers?: Record<string, string>;

  /**
   * Timeout for requests in milliseconds, `0` for none.
   * @default 0
   */
  readonly timeout?: number;

  /**
   * Auth hook applied before every request.
   */
  readonly auth?: AuthHook | null;

  /**
   * Cookie store shared by all requests of the session.
   * @default new CookieJar()
   */
  readonly cookieJar?: CookieJar;

  /**
   * Request logger. Nothing is logged without one.
   */
  readonly logger?: Logger;

  /**
   * Transport adapter, e.g. an in-process stand-in.
   * @default the platform's http adapter
   */
  readonly adapter?: AxiosAdapter;

  /**
   * Further transport defaults: agents, proxy, redirects, status validation.
   */
  readonly transport?: TransportDefaults;
}

/**
 * Configuration for {@link createSession}.
 */
export interface SessionConfig extends SessionOptions {
  /**
   * The GraphQL endpoint URL.
   */
  readonly url: string;
}

/**
 * Per-request transport config. The destination is always the session's
 * endpoint, so `url`, `baseURL` and `method` are not accepted.
 */
export type SessionRequestConfig<D = unknown> = Omit<
  AxiosRequestConfig<D>,
  'url' | 'baseURL' | 'method'
>;

/**
 * Per-request config for {@link GraphQLSession.query}.
 */
export interface QueryConfig extends Omit<SessionRequestConfig, 'data'> {
  /**
   * Operation to run when the document holds several.
   */
  readonly operationName?: string;
}
