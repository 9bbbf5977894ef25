/**
 * graphql-session - HTTP sessions for GraphQL endpoints
 *
 * A session binds one endpoint, keeps auth, cookies and default headers
 * across requests, and sends queries and mutations as JSON or, with files,
 * as GraphQL multipart requests.
 */

export * from './session';
export * from './types';
export * from './errors';
export * from './auth';
export {
  buildPayload,
  documentText,
  nullFileVariables,
  validateUpload,
  type Upload,
} from './operation';
export { buildMultipartBody } from './multipart';
