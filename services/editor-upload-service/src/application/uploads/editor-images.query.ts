import { Inject, Injectable } from '@nestjs/common';
import type { EditorBrowseBody } from '@editor-uploads/shared';
import { contentTypeForStorageName } from '../../domain/uploads/image-format';
import type { UploadPipelineConfig } from '../../domain/uploads/upload-policy';
import { isSafeStorageName, joinPublicUrl } from '../../domain/uploads/storage-name';
import { ASSET_STORAGE_PORT, type AssetStoragePort } from './ports/asset-storage.port';
import { UPLOAD_PIPELINE_CONFIG } from './upload-pipeline-config.token';

export interface StoredEditorImage {
  bytes: Buffer;
  contentType: string;
}

@Injectable()
export class EditorImagesQuery {
  constructor(
    @Inject(ASSET_STORAGE_PORT)
    private readonly assetStorage: AssetStoragePort,
    @Inject(UPLOAD_PIPELINE_CONFIG)
    private readonly config: UploadPipelineConfig,
  ) {}

  async browse(): Promise<EditorBrowseBody> {
    const entries = await this.assetStorage.listAssets();

    return {
      files: entries.map((entry) => ({
        name: entry.name,
        url: joinPublicUrl(this.config.publicBaseUrl, entry.name),
      })),
    };
  }

  async read(name: string): Promise<StoredEditorImage | undefined> {
    if (!isSafeStorageName(name)) {
      return undefined;
    }

    const contentType = contentTypeForStorageName(name);
    if (!contentType) {
      return undefined;
    }

    const bytes = await this.assetStorage.readAsset(name);
    return bytes ? { bytes, contentType } : undefined;
  }
}
