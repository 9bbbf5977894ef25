/**
 * Errors raised by the session before a request leaves the process.
 *
 * Transport failures and JSON encoding failures are not wrapped; they reach
 * the caller as the transport or the encoder raised them.
 */

/**
 * Error codes.
 */
export const ErrorCode = {
  InvalidEndpoint: 'INVALID_ENDPOINT',
  InvalidQuery: 'INVALID_QUERY',
  InvalidUpload: 'INVALID_UPLOAD',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base graphql-session error.
 */
export class GraphQLSessionError extends Error {
  readonly code: ErrorCode;
  readonly extensions: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    extensions: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'GraphQLSessionError';
    this.code = code;
    this.extensions = extensions;
  }

  toJSON(): { message: string; code: ErrorCode; extensions: Record<string, unknown> } {
    return {
      message: this.message,
      code: this.code,
      extensions: this.extensions,
    };
  }
}

/**
 * The file map and the files of an upload do not fit together.
 */
export class UploadValidationError extends GraphQLSessionError {
  constructor(message: string, extensions: Record<string, unknown> = {}) {
    super(message, ErrorCode.InvalidUpload, extensions);
    this.name = 'UploadValidationError';
  }
}

/**
 * Type guard for session errors.
 */
export function isGraphQLSessionError(
  value: unknown
): value is GraphQLSessionError {
  return value instanceof GraphQLSessionError;
}
