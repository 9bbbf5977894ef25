/**
 * Multipart request bodies for file uploads.
 *
 * Parts follow the GraphQL multipart request convention: an `operations`
 * field, a `map` field, then one file part per identifier of the map.
 */

import { nullFileVariables, type Upload } from './operation';
import type { FileContent } from './types';

/**
 * Builds the multipart body of an upload. The transport sets the
 * `multipart/form-data` content type and boundary when it sends it.
 */
export function buildMultipartBody(
  query: string,
  upload: Upload,
  operationName?: string
): FormData {
  const operations: Record<string, unknown> = {
    query,
    variables: nullFileVariables(upload.variables, upload.fileMap),
  };
  if (operationName !== undefined) {
    operations.operationName = operationName;
  }

  const form = new FormData();
  form.append('operations', JSON.stringify(operations));
  form.append('map', JSON.stringify(upload.fileMap));

  for (const id of Object.keys(upload.fileMap)) {
    const [filename, content, contentType] = upload.files[id];
    form.append(id, toBlob(content, contentType), filename);
  }

  return form;
}

function toBlob(content: FileContent, contentType: string): Blob {
  const part = content instanceof ArrayBuffer ? new Uint8Array(content) : content;
  return new Blob([part], { type: contentType });
}
