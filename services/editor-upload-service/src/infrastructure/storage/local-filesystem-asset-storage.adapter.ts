import type { Dirent } from 'node:fs';
import { lstat, mkdir, open, readdir, readFile, rm, type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJsonLogEntry } from '@editor-uploads/shared';
import type {
  AssetStoragePort,
  StoredAssetEntry,
  WriteAssetResult,
} from '../../application/uploads/ports/asset-storage.port';
import { UPLOAD_PIPELINE_CONFIG } from '../../application/uploads/upload-pipeline-config.token';
import type { UploadPipelineConfig } from '../../domain/uploads/upload-policy';
import { isSafeStorageName } from '../../domain/uploads/storage-name';

const FILE_MODE = 0o644;
const SERVICE_NAME = 'editor-upload-service';

@Injectable()
export class LocalFilesystemAssetStorageAdapter implements AssetStoragePort {
  private readonly logger = new Logger(LocalFilesystemAssetStorageAdapter.name);

  constructor(
    @Inject(UPLOAD_PIPELINE_CONFIG)
    private readonly config: UploadPipelineConfig,
  ) {}

  async writeAsset(name: string, bytes: Buffer, signal?: AbortSignal): Promise<WriteAssetResult> {
    const target = this.resolveWithinRoot(name);
    if (!target) {
      return { written: false, reason: 'outside-root' };
    }

    if (signal?.aborted) {
      return { written: false, reason: 'io-error', error: signal.reason };
    }

    try {
      await mkdir(this.root, { recursive: true });
    } catch (error) {
      return { written: false, reason: 'io-error', error };
    }

    let handle: FileHandle;
    try {
      // wx: O_CREAT | O_EXCL, fails on any existing entry including a symlink.
      handle = await open(target, 'wx', FILE_MODE);
    } catch (error) {
      return { written: false, reason: errorCode(error) === 'EEXIST' ? 'exists' : 'io-error', error };
    }

    try {
      try {
        await handle.writeFile(bytes, { signal });
      } finally {
        await handle.close();
      }
    } catch (error) {
      await this.removePartial(target, name);
      return { written: false, reason: 'io-error', error };
    }

    return { written: true, path: target };
  }

  async readAsset(name: string): Promise<Buffer | undefined> {
    const target = this.resolveWithinRoot(name);
    if (!target) {
      return undefined;
    }

    try {
      const stats = await lstat(target);
      if (!stats.isFile()) {
        return undefined;
      }
      return await readFile(target);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }

  async listAssets(): Promise<StoredAssetEntry[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(this.root, { withFileTypes: true });
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const names = entries
      .filter((entry) => entry.isFile() && isSafeStorageName(entry.name))
      .map((entry) => entry.name)
      .sort();

    const listed = await Promise.all(
      names.map(async (name): Promise<StoredAssetEntry | undefined> => {
        try {
          const stats = await lstat(path.join(this.root, name));
          return {
            name,
            sizeBytes: stats.size,
            modifiedAt: stats.mtime.toISOString(),
          };
        } catch (error) {
          // Removed between readdir and lstat.
          if (errorCode(error) === 'ENOENT') {
            return undefined;
          }
          throw error;
        }
      }),
    );

    return listed.filter((entry): entry is StoredAssetEntry => entry !== undefined);
  }

  private async removePartial(target: string, name: string): Promise<void> {
    try {
      await rm(target, { force: true });
    } catch (error) {
      this.logger.error(JSON.stringify(createJsonLogEntry({
        level: 'error',
        service: SERVICE_NAME,
        message: 'Failed to remove partially written editor image.',
        correlationId: 'system',
        assetName: name,
        error,
      })));
    }
  }

  private get root(): string {
    return path.resolve(this.config.uploadRoot);
  }

  /** Only a bare safe name directly under the root resolves; anything else is refused. */
  private resolveWithinRoot(name: string): string | undefined {
    if (!isSafeStorageName(name)) {
      return undefined;
    }

    const target = path.resolve(this.root, name);
    const relative = path.relative(this.root, target);
    if (relative !== name || path.isAbsolute(relative)) {
      return undefined;
    }

    return target;
  }
}

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
