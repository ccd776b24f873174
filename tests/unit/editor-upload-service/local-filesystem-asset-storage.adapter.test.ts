import test, { type TestContext } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fsPromises } from 'node:fs';
import { mkdtemp, readdir, readFile, rm, stat, symlink, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { LocalFilesystemAssetStorageAdapter } from '../../../services/editor-upload-service/src/infrastructure/storage/local-filesystem-asset-storage.adapter';
import type { UploadPipelineConfig } from '../../../services/editor-upload-service/src/domain/uploads/upload-policy';

const NAME_A = `${'a1'.repeat(16)}.png`;
const NAME_B = `${'b2'.repeat(16)}.jpg`;

async function withTempRoot(run: (root: string, storage: LocalFilesystemAssetStorageAdapter) => Promise<void>) {
  const parent = await mkdtemp(path.join(os.tmpdir(), 'editor-uploads-'));
  const root = path.join(parent, 'media', 'uploads', 'editor');
  const config: UploadPipelineConfig = {
    maxUploadBytes: 1024,
    allowedExtensions: ['.png', '.jpg'],
    uploadRoot: root,
    publicBaseUrl: '/media/editor-images',
    nameAttempts: 3,
    echoFileName: false,
  };

  try {
    await run(root, new LocalFilesystemAssetStorageAdapter(config));
  } finally {
    await rm(parent, { recursive: true, force: true });
  }
}

test('LocalFilesystemAssetStorageAdapter creates the root and writes the exact bytes', async () => {
  await withTempRoot(async (root, storage) => {
    const bytes = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0xff]);

    const result = await storage.writeAsset(NAME_A, bytes);

    assert.deepEqual(result, { written: true, path: path.join(root, NAME_A) });
    assert.deepEqual(await readFile(path.join(root, NAME_A)), bytes);
    assert.equal((await stat(path.join(root, NAME_A))).mode & 0o133, 0);
  });
});

test('LocalFilesystemAssetStorageAdapter never overwrites an existing file', async () => {
  await withTempRoot(async (root, storage) => {
    await storage.writeAsset(NAME_A, Buffer.from('first'));

    const second = await storage.writeAsset(NAME_A, Buffer.from('second'));

    assert.equal(second.written, false);
    assert.equal(second.written ? undefined : second.reason, 'exists');
    assert.equal(await readFile(path.join(root, NAME_A), 'utf8'), 'first');
  });
});

test('LocalFilesystemAssetStorageAdapter treats a planted symlink as an existing entry', async () => {
  await withTempRoot(async (root, storage) => {
    await storage.writeAsset(NAME_B, Buffer.from('seed'));
    const outside = path.join(path.dirname(root), 'outside.txt');
    await writeFile(outside, 'untouched');
    await symlink(outside, path.join(root, NAME_A));

    const result = await storage.writeAsset(NAME_A, Buffer.from('payload'));

    assert.equal(result.written ? undefined : result.reason, 'exists');
    assert.equal(await readFile(outside, 'utf8'), 'untouched');
  });
});

test('LocalFilesystemAssetStorageAdapter refuses names that are not generated storage names', async () => {
  await withTempRoot(async (root, storage) => {
    for (const name of ['../escape.png', 'cat.png', `sub/${NAME_A}`, `/${NAME_A}`]) {
      const result = await storage.writeAsset(name, Buffer.from('x'));
      assert.deepEqual(result, { written: false, reason: 'outside-root' }, name);
    }

    await assert.rejects(readdir(root), /ENOENT/);
  });
});

test('LocalFilesystemAssetStorageAdapter does not write once the request is cancelled', async () => {
  await withTempRoot(async (root, storage) => {
    const abort = new AbortController();
    abort.abort();

    const result = await storage.writeAsset(NAME_A, Buffer.from('x'), abort.signal);

    assert.equal(result.written ? undefined : result.reason, 'io-error');
    await assert.rejects(readdir(root), /ENOENT/);
  });
});

test('LocalFilesystemAssetStorageAdapter lists and reads stored images only', async () => {
  await withTempRoot(async (root, storage) => {
    assert.deepEqual(await storage.listAssets(), []);

    await storage.writeAsset(NAME_B, Buffer.from('jpeg'));
    await storage.writeAsset(NAME_A, Buffer.from('png!'));
    await writeFile(path.join(root, 'README.txt'), 'not an asset');

    const listed = await storage.listAssets();
    assert.deepEqual(
      listed.map((entry) => [entry.name, entry.sizeBytes]),
      [
        [NAME_A, 4],
        [NAME_B, 4],
      ],
    );
    assert.ok(listed.every((entry) => Number.isFinite(Date.parse(entry.modifiedAt))));

    assert.equal((await storage.readAsset(NAME_A))?.toString(), 'png!');
    assert.equal(await storage.readAsset(`${'c3'.repeat(16)}.png`), undefined);
    assert.equal(await storage.readAsset('README.txt'), undefined);
  });
});

function ioError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

/** Opens the real file, then fails every write through the returned handle. */
function failWritesAfterOpen(t: TestContext) {
  const realOpen = fsPromises.open;
  t.mock.method(fsPromises, 'open', async (...args: Parameters<typeof realOpen>) => {
    const handle = await realOpen(...args);
    return {
      async writeFile() {
        throw ioError('EIO: i/o error, write', 'EIO');
      },
      close: () => handle.close(),
    };
  });
}

test('LocalFilesystemAssetStorageAdapter removes the partial file when the request is cancelled mid-write', async () => {
  await withTempRoot(async (root, storage) => {
    const abort = new AbortController();
    const pending = storage.writeAsset(NAME_A, Buffer.alloc(64 * 1024 * 1024, 0x5a), abort.signal);
    setImmediate(() => abort.abort());

    const result = await pending;

    assert.equal(result.written ? undefined : result.reason, 'io-error');
    assert.deepEqual(await readdir(root), []);
  });
});

test('LocalFilesystemAssetStorageAdapter removes the partial file when a write fails after open', async (t) => {
  await withTempRoot(async (root, storage) => {
    failWritesAfterOpen(t);

    const result = await storage.writeAsset(NAME_A, Buffer.from('payload'));

    assert.equal(result.written, false);
    assert.equal(result.written ? undefined : result.reason, 'io-error');
    assert.equal(result.written ? undefined : errorMessage(result.error), 'EIO: i/o error, write');
    assert.deepEqual(await readdir(root), []);
  });
});

test('LocalFilesystemAssetStorageAdapter still reports the write failure when cleanup fails too', async (t) => {
  await withTempRoot(async (_root, storage) => {
    failWritesAfterOpen(t);
    const rmMock = t.mock.method(fsPromises, 'rm', async () => {
      throw ioError('EBUSY: resource busy or locked, rm', 'EBUSY');
    });

    const result = await storage.writeAsset(NAME_A, Buffer.from('payload'));
    rmMock.mock.restore();

    assert.equal(result.written ? undefined : result.reason, 'io-error');
    assert.equal(result.written ? undefined : errorMessage(result.error), 'EIO: i/o error, write');
  });
});

test('LocalFilesystemAssetStorageAdapter skips images removed while listing', async (t) => {
  await withTempRoot(async (root, storage) => {
    await storage.writeAsset(NAME_A, Buffer.from('png!'));
    await storage.writeAsset(NAME_B, Buffer.from('jpeg'));

    const realLstat = fsPromises.lstat;
    const lstatMock = t.mock.method(fsPromises, 'lstat', async (target: string) => {
      if (target === path.join(root, NAME_A)) {
        throw ioError(`ENOENT: no such file or directory, lstat '${target}'`, 'ENOENT');
      }
      return realLstat(target);
    });

    const listed = await storage.listAssets();
    lstatMock.mock.restore();

    assert.deepEqual(listed.map((entry) => entry.name), [NAME_B]);
  });
});

function errorMessage(error: unknown): string | undefined {
  return error instanceof Error ? error.message : undefined;
}
