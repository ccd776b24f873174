import test from 'node:test';
import assert from 'node:assert/strict';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import {
  UPLOAD_ERROR_CATALOG_V1,
  UPLOAD_ERROR_KINDS,
  isUploadErrorKind,
} from '../../packages/shared/src/contracts/editor-upload';

interface ExampleLike {
  kind?: unknown;
  httpStatus?: unknown;
  request?: { fileName?: unknown };
  body?: { url?: unknown; error?: { message?: unknown } };
}

test('docs editor upload examples cover every error kind and match the catalog status', async () => {
  const examplesDir = path.join(process.cwd(), 'docs', 'editor-upload', 'examples');
  const files = (await readdir(examplesDir))
    .filter((file) => file.endsWith('.json'))
    .sort();

  const observedKinds = new Set<string>();

  for (const file of files) {
    const raw = await readFile(path.join(examplesDir, file), 'utf8');
    const example = JSON.parse(raw) as ExampleLike;

    assert.equal(typeof example.kind, 'string', `${file} must define a string "kind"`);
    assert.equal(typeof example.httpStatus, 'number', `${file} must define a numeric "httpStatus"`);
    assert.equal(typeof example.request?.fileName, 'string', `${file} must define "request.fileName"`);

    if (example.kind === 'Stored') {
      assert.equal(example.httpStatus, 200, `${file} must use status 200`);
      assert.equal(typeof example.body?.url, 'string', `${file} must define "body.url"`);
      assert.equal(example.body?.error, undefined, `${file} must not define "body.error"`);
      continue;
    }

    assert.ok(isUploadErrorKind(example.kind), `${file} references a kind outside the v1 catalog`);
    const catalogEntry = UPLOAD_ERROR_CATALOG_V1[example.kind];
    assert.equal(example.httpStatus, catalogEntry.httpStatus, `${file} must match the catalog status`);
    assert.equal(typeof example.body?.error?.message, 'string', `${file} must define "body.error.message"`);
    assert.equal(example.body?.url, undefined, `${file} must not define "body.url"`);

    observedKinds.add(example.kind);
  }

  assert.deepEqual(
    Array.from(observedKinds).sort(),
    [...UPLOAD_ERROR_KINDS].sort(),
    'docs/editor-upload/examples must contain one example for each error kind',
  );
});

test('every rejection kind except storage failures is a client error', () => {
  for (const kind of UPLOAD_ERROR_KINDS) {
    const expected = kind === 'StorageWriteError' ? 500 : 400;
    assert.equal(UPLOAD_ERROR_CATALOG_V1[kind].httpStatus, expected, kind);
  }
});
