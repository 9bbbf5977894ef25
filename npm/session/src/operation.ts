/**
 * Operation assembly: turning a document, its variables and optional files
 * into the payload the session sends.
 */

import { print, type DocumentNode } from 'graphql';
import { ErrorCode, GraphQLSessionError, UploadValidationError } from './errors';
import type {
  FileMap,
  JsonObject,
  JsonValue,
  OperationPayload,
  UploadFiles,
  Variables,
} from './types';

const VARIABLES_PREFIX = 'variables.';

/**
 * Returns the document text, printing parsed documents.
 */
export function documentText(document: string | DocumentNode): string {
  const text = typeof document === 'string' ? document : print(document);
  if (text.trim() === '') {
    throw new GraphQLSessionError(
      'The query must be a non-empty GraphQL document',
      ErrorCode.InvalidQuery
    );
  }
  return text;
}

/**
 * Builds the `{ query, variables }` payload. `variables` is left out when
 * absent, `operationName` only appears when given.
 */
export function buildPayload(
  query: string,
  variables?: Variables | null,
  operationName?: string
): OperationPayload {
  const payload: { query: string; variables?: Variables; operationName?: string } = {
    query,
  };
  if (variables !== undefined && variables !== null) {
    payload.variables = variables;
  }
  if (operationName !== undefined) {
    payload.operationName = operationName;
  }
  return payload;
}

/**
 * A checked upload: the file map and the files it refers to.
 */
export interface Upload {
  readonly variables: Variables;
  readonly fileMap: FileMap;
  readonly files: UploadFiles;
}

/**
 * Checks the upload arguments of a query.
 *
 * Returns `null` when the query carries no files, so it goes out as JSON.
 */
export function validateUpload(
  variables: Variables | null | undefined,
  fileMap: FileMap | null | undefined,
  files: UploadFiles | null | undefined
): Upload | null {
  const hasMap = isNonEmpty(fileMap);
  const hasFiles = isNonEmpty(files);
  if (hasMap && (!variables || !hasFiles)) {
    throw new UploadValidationError(
      'The file map requires the variables and files arguments'
    );
  }
  if (hasFiles && (!variables || !hasMap)) {
    throw new UploadValidationError(
      'The files argument requires the variables and file map arguments'
    );
  }
  if (!variables || !fileMap || !files || !hasMap) {
    return null;
  }

  const mapKeys = Object.keys(fileMap).sort();
  const fileKeys = Object.keys(files).sort();
  if (
    mapKeys.length !== fileKeys.length ||
    mapKeys.some((key, index) => key !== fileKeys[index])
  ) {
    throw new UploadValidationError(
      'The file map and the files must have the same keys',
      { fileMapKeys: mapKeys, fileKeys }
    );
  }

  for (const [id, descriptor] of Object.entries(files)) {
    if (!isTriple(descriptor)) {
      throw new UploadValidationError(
        'The values of the files argument must be 3-tuples with the filename, ' +
          'the file content and the content type',
        { id }
      );
    }
  }

  for (const [id, paths] of Object.entries(fileMap)) {
    if (!isPathList(paths)) {
      throw new UploadValidationError(
        `File map paths must start with '${VARIABLES_PREFIX}'`,
        { id }
      );
    }
  }

  return { variables, fileMap, files };
}

function isNonEmpty(value: object | null | undefined): boolean {
  return value !== null && value !== undefined && Object.keys(value).length > 0;
}

// Descriptors and paths come from untyped callers too.
function isTriple(value: unknown): boolean {
  return Array.isArray(value) && value.length === 3;
}

function isPathList(value: unknown): boolean {
  return (
    Array.isArray(value) &&
    value.every(
      (path: unknown) =>
        typeof path === 'string' && path.startsWith(VARIABLES_PREFIX)
    )
  );
}

/**
 * Returns a copy of `variables` with every path of the file map set to
 * `null`. Missing objects along a path are created.
 */
export function nullFileVariables(
  variables: Variables,
  fileMap: FileMap
): Variables {
  const copy = structuredClone(variables);
  for (const paths of Object.values(fileMap)) {
    for (const path of paths) {
      setNull(copy, path.slice(VARIABLES_PREFIX.length).split('.'), path);
    }
  }
  return copy;
}

function setNull(root: JsonObject, segments: string[], path: string): void {
  let node: JsonObject | JsonValue[] = root;
  for (let i = 0; i < segments.length - 1; i++) {
    const segment = segments[i];
    checkSegment(node, segment, path);
    const child = readChild(node, segment);
    if (child === undefined || child === null) {
      const created: JsonObject = {};
      writeChild(node, segment, created);
      node = created;
    } else if (typeof child === 'object') {
      node = child;
    } else {
      throw new UploadValidationError(
        `Cannot map a file to '${path}': '${segment}' is not an object`,
        { path }
      );
    }
  }
  const last = segments[segments.length - 1];
  checkSegment(node, last, path);
  writeChild(node, last, null);
}

const RESERVED_SEGMENTS = new Set(['__proto__', 'constructor', 'prototype']);
const LIST_INDEX = /^\d+$/;

function checkSegment(
  node: JsonObject | JsonValue[],
  segment: string,
  path: string
): void {
  if (segment === '' || RESERVED_SEGMENTS.has(segment)) {
    throw new UploadValidationError(
      `Cannot map a file to '${path}': '${segment}' is not a valid path segment`,
      { path }
    );
  }
  if (Array.isArray(node) && !LIST_INDEX.test(segment)) {
    throw new UploadValidationError(
      `Cannot map a file to '${path}': '${segment}' is not a list index`,
      { path }
    );
  }
}

// Segments are checked first: lists only see indexes, objects only own keys.
function readChild(
  node: JsonObject | JsonValue[],
  key: string
): JsonValue | undefined {
  if (Array.isArray(node)) {
    return node[Number(key)];
  }
  return Object.hasOwn(node, key) ? node[key] : undefined;
}

function writeChild(
  node: JsonObject | JsonValue[],
  key: string,
  value: JsonValue
): void {
  if (Array.isArray(node)) {
    node[Number(key)] = value;
    return;
  }
  node[key] = value;
}
