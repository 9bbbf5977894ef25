/**
 * GraphQL session implementation.
 *
 * An HTTP session bound to a single GraphQL endpoint: connection state
 * (auth hook, cookies, default headers) persists across requests, and every
 * request goes to the endpoint given at construction.
 */

import axios, {
  type AxiosInstance,
  type AxiosResponse,
  type Method,
} from 'axios';
import type { DocumentNode } from 'graphql';
import { CookieJar } from 'tough-cookie';
import { applyAuth } from './auth';
import { installCookieJar } from './cookies';
import { ErrorCode, GraphQLSessionError } from './errors';
import { installLogging } from './logging';
import { buildMultipartBody } from './multipart';
import { buildPayload, documentText, validateUpload } from './operation';
import type {
  AuthHook,
  FileMap,
  GraphQLResponse,
  QueryConfig,
  SessionConfig,
  SessionOptions,
  SessionRequestConfig,
  UploadFiles,
  Variables,
} from './types';

/**
 * Default transport configuration. Like a general-purpose HTTP session,
 * every status resolves as a response; callers inspect it.
 */
const DEFAULT_CONFIG = {
  timeout: 0,
  validateStatus: (): boolean => true,
};

/**
 * Creates a new session.
 *
 * @example
 * ```typescript
 * // Just the endpoint
 * const session = createSession('http://localhost:4000/graphql');
 *
 * // Or with configuration
 * const session = createSession({
 *   url: 'https://api.example.com/graphql',
 *   headers: { 'X-Client': 'reports' },
 *   auth: bearerAuth(token),
 * });
 * ```
 */
export function createSession(config: string | SessionConfig): GraphQLSession {
  if (typeof config === 'string') {
    return new GraphQLSession(config);
  }
  const { url, ...options } = config;
  return new GraphQLSession(url, options);
}

/**
 * A HTTP session for GraphQL requests.
 *
 * Besides {@link GraphQLSession.query}, the session offers one method per
 * HTTP verb. They take no URL: the destination is always the endpoint.
 *
 * @example
 * ```typescript
 * const session = new GraphQLSession('http://localhost:4000/graphql');
 *
 * const response = await session.query(
 *   `mutation uploadWeatherData($town: String, $data: Upload) {
 *     uploadWeatherData(town: $town, data: $data) { ok }
 *   }`,
 *   { town: 'Sutherland', data: null },
 *   { '0': ['variables.data'] },
 *   { '0': ['weather.csv', csv, 'text/csv'] }
 * );
 *
 * console.log(response.status, response.data);
 * ```
 */
export class GraphQLSession {
  readonly endpoint: string;
  readonly cookies: CookieJar;
  readonly transport: AxiosInstance;
  private authHook: AuthHook | null;

  constructor(endpoint: string, options: SessionOptions = {}) {
    if (!URL.canParse(endpoint)) {
      throw new GraphQLSessionError(
        `Invalid GraphQL endpoint: '${endpoint}'`,
        ErrorCode.InvalidEndpoint,
        { endpoint }
      );
    }

    this.endpoint = endpoint;
    this.cookies = options.cookieJar ?? new CookieJar();
    this.authHook = options.auth ?? null;
    this.transport = axios.create({
      validateStatus: DEFAULT_CONFIG.validateStatus,
      ...options.transport,
      timeout: options.timeout ?? DEFAULT_CONFIG.timeout,
      headers: { ...options.headers },
      adapter: options.adapter,
    });

    // Request interceptors run last-registered first: auth, cookies, logging.
    if (options.logger) {
      installLogging(this.transport, options.logger);
    }
    installCookieJar(this.transport, this.cookies, this.endpoint);
    this.transport.interceptors.request.use((request) =>
      this.authHook ? applyAuth(this.authHook, request) : request
    );
  }

  /**
   * The auth hook applied before every request, or `null`.
   */
  get auth(): AuthHook | null {
    return this.authHook;
  }

  set auth(hook: AuthHook | null) {
    this.authHook = hook;
  }

  /**
   * Merges headers into the defaults sent with every request.
   */
  setHeaders(headers: Record<string, string>): void {
    for (const [name, value] of Object.entries(headers)) {
      this.transport.defaults.headers[name] = value;
    }
  }

  /**
   * Sends a GraphQL query or mutation.
   *
   * Without files the operation goes out as a JSON body. With files it is a
   * multipart request: `variables` holds `null` for each file, `fileMap`
   * maps each file identifier to the paths of those variables (such as
   * `variables.data`, or `variables.files.0` for a list of files), and
   * `files` maps the same identifiers to `[filename, content, contentType]`.
   *
   * The transport's response is returned as is; GraphQL errors in its body
   * are left for the caller.
   *
   * @throws {UploadValidationError} if the file map and the files do not
   * fit together. Nothing is sent in that case.
   */
  async query<TData = unknown>(
    document: string | DocumentNode,
    variables?: Variables | null,
    fileMap?: FileMap | null,
    files?: UploadFiles | null,
    config: QueryConfig = {}
  ): Promise<AxiosResponse<GraphQLResponse<TData>>> {
    const query = documentText(document);
    const upload = validateUpload(variables, fileMap, files);
    const { operationName, ...requestConfig } = config;

    if (upload === null) {
      return this.send<GraphQLResponse<TData>>(
        'post',
        requestConfig,
        buildPayload(query, variables, operationName)
      );
    }
    return this.send<GraphQLResponse<TData>>(
      'post',
      requestConfig,
      buildMultipartBody(query, upload, operationName)
    );
  }

  get<T = unknown>(config?: SessionRequestConfig): Promise<AxiosResponse<T>> {
    return this.send<T>('get', config);
  }

  delete<T = unknown>(config?: SessionRequestConfig): Promise<AxiosResponse<T>> {
    return this.send<T>('delete', config);
  }

  head<T = unknown>(config?: SessionRequestConfig): Promise<AxiosResponse<T>> {
    return this.send<T>('head', config);
  }

  options<T = unknown>(config?: SessionRequestConfig): Promise<AxiosResponse<T>> {
    return this.send<T>('options', config);
  }

  post<T = unknown>(data?: unknown, config?: SessionRequestConfig): Promise<AxiosResponse<T>> {
    return this.send<T>('post', config, data);
  }

  put<T = unknown>(data?: unknown, config?: SessionRequestConfig): Promise<AxiosResponse<T>> {
    return this.send<T>('put', config, data);
  }

  patch<T = unknown>(data?: unknown, config?: SessionRequestConfig): Promise<AxiosResponse<T>> {
    return this.send<T>('patch', config, data);
  }

  private send<T>(
    method: Method,
    config: SessionRequestConfig = {},
    data?: unknown
  ): Promise<AxiosResponse<T>> {
    return this.transport.request<T>({
      ...config,
      method,
      url: this.endpoint,
      baseURL: undefined,
      data: data ?? config.data,
    });
  }
}
