import { parse, print } from 'graphql';
import { describe, expect, it } from 'vitest';
import { ErrorCode, GraphQLSessionError, UploadValidationError } from './errors';
import {
  buildPayload,
  documentText,
  nullFileVariables,
  validateUpload,
} from './operation';
import type { FileMap, UploadFiles, Variables } from './types';

describe('documentText', () => {
  it('returns strings unchanged', () => {
    expect(documentText('query{ping}')).toBe('query{ping}');
  });

  it('prints parsed documents', () => {
    const document = parse('query Ping { ping }');

    expect(documentText(document)).toBe(print(document));
  });

  it('rejects blank documents', () => {
    expect(() => documentText('  \n')).toThrow(GraphQLSessionError);
    expect(() => documentText('')).toThrow(
      'The query must be a non-empty GraphQL document'
    );
  });
});

describe('buildPayload', () => {
  it('leaves out absent variables', () => {
    expect(buildPayload('query{ping}')).toEqual({ query: 'query{ping}' });
    expect('variables' in buildPayload('query{ping}', null)).toBe(false);
  });

  it('keeps empty variables', () => {
    expect(buildPayload('query{ping}', {})).toEqual({
      query: 'query{ping}',
      variables: {},
    });
  });

  it('adds the operation name when given', () => {
    expect(buildPayload('query A { a } query B { b }', { id: 1 }, 'B')).toEqual({
      query: 'query A { a } query B { b }',
      variables: { id: 1 },
      operationName: 'B',
    });
  });
});

describe('validateUpload', () => {
  const variables: Variables = { proposal: null };
  const fileMap: FileMap = { '0': ['variables.proposal'] };
  const files: UploadFiles = { '0': ['proposal.pdf', 'content', 'application/pdf'] };

  it('returns null without files', () => {
    expect(validateUpload(variables, undefined, undefined)).toBeNull();
    expect(validateUpload(undefined, null, null)).toBeNull();
  });

  it('treats empty maps as no upload', () => {
    expect(validateUpload(undefined, {}, {})).toBeNull();
  });

  it('returns the checked upload', () => {
    expect(validateUpload(variables, fileMap, files)).toEqual({
      variables,
      fileMap,
      files,
    });
  });

  it('requires variables and files with a file map', () => {
    const message = 'The file map requires the variables and files arguments';

    expect(() => validateUpload(undefined, fileMap, undefined)).toThrow(message);
    expect(() => validateUpload(variables, fileMap, undefined)).toThrow(message);
    expect(() => validateUpload(undefined, fileMap, files)).toThrow(message);
  });

  it('requires variables and a file map with files', () => {
    const message =
      'The files argument requires the variables and file map arguments';

    expect(() => validateUpload(undefined, undefined, files)).toThrow(message);
    expect(() => validateUpload(variables, undefined, files)).toThrow(message);
  });

  it('requires the same keys in the file map and the files', () => {
    const mismatched: FileMap = {
      '1': ['variables.proposal'],
      '2': ['variables.block'],
    };
    const twoFiles: UploadFiles = {
      '0': ['a.txt', 'a', 'text/plain'],
      '1': ['c.txt', 'c', 'text/plain'],
    };

    expect(() => validateUpload(variables, mismatched, twoFiles)).toThrow(
      'The file map and the files must have the same keys'
    );
  });

  it('reports mismatched keys in the error extensions', () => {
    try {
      validateUpload(variables, { '1': ['variables.proposal'] }, files);
      expect.unreachable('validateUpload should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(UploadValidationError);
      expect(error).toMatchObject({
        code: ErrorCode.InvalidUpload,
        extensions: { fileMapKeys: ['1'], fileKeys: ['0'] },
      });
    }
  });

  it('requires 3-tuples as file descriptors', () => {
    const untyped: UploadFiles = JSON.parse('{"0": ["a.txt", "a"]}');

    expect(() => validateUpload(variables, fileMap, untyped)).toThrow(
      'The values of the files argument must be 3-tuples'
    );
  });

  it('requires paths inside the variables', () => {
    expect(() =>
      validateUpload(variables, { '0': ['query'] }, files)
    ).toThrow("File map paths must start with 'variables.'");
  });
});

describe('nullFileVariables', () => {
  it('sets mapped variables to null', () => {
    expect(
      nullFileVariables(
        { name: 'John Doe', cv: 'placeholder' },
        { '0': ['variables.cv'] }
      )
    ).toEqual({ name: 'John Doe', cv: null });
  });

  it('does not mutate the given variables', () => {
    const variables: Variables = { cv: 'placeholder' };

    nullFileVariables(variables, { '0': ['variables.cv'] });

    expect(variables).toEqual({ cv: 'placeholder' });
  });

  it('fills list entries and nested objects', () => {
    expect(
      nullFileVariables(
        { files: ['a', 'b'], input: { title: 'Report' } },
        {
          '0': ['variables.files.0'],
          '1': ['variables.files.1', 'variables.input.attachment'],
        }
      )
    ).toEqual({
      files: [null, null],
      input: { title: 'Report', attachment: null },
    });
  });

  it('creates missing objects along a path', () => {
    expect(
      nullFileVariables({}, { '0': ['variables.input.document'] })
    ).toEqual({ input: { document: null } });
  });

  it('rejects paths through scalar values', () => {
    expect(() =>
      nullFileVariables({ name: 'John Doe' }, { '0': ['variables.name.file'] })
    ).toThrow("Cannot map a file to 'variables.name.file': 'name' is not an object");
  });

  it('rejects prototype segments without touching Object.prototype', () => {
    for (const path of [
      'variables.__proto__.polluted',
      'variables.constructor.prototype.polluted',
      'variables.input.__proto__',
    ]) {
      expect(() =>
        nullFileVariables({ cv: null, input: {} }, { '0': [path] })
      ).toThrow(UploadValidationError);
    }

    expect(() =>
      nullFileVariables({ cv: null }, { '0': ['variables.__proto__.polluted'] })
    ).toThrow(
      "Cannot map a file to 'variables.__proto__.polluted': '__proto__' is not a valid path segment"
    );
    expect('polluted' in {}).toBe(false);
  });

  it('rejects empty segments', () => {
    expect(() => nullFileVariables({ cv: null }, { '0': ['variables.'] })).toThrow(
      "Cannot map a file to 'variables.': '' is not a valid path segment"
    );
    expect(() =>
      nullFileVariables({ input: {} }, { '0': ['variables.input..file'] })
    ).toThrow(UploadValidationError);
  });

  it('rejects list segments that are not indexes', () => {
    expect(() =>
      nullFileVariables({ files: ['a'] }, { '0': ['variables.files.x'] })
    ).toThrow("Cannot map a file to 'variables.files.x': 'x' is not a list index");
    expect(() =>
      nullFileVariables({ files: [{}] }, { '0': ['variables.files.first.file'] })
    ).toThrow(UploadValidationError);
  });
});
