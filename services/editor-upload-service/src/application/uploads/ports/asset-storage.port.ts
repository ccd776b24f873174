export const ASSET_STORAGE_PORT = Symbol('ASSET_STORAGE_PORT');

export type WriteAssetResult =
  | {
      written: true;
      path: string;
    }
  | {
      written: false;
      reason: 'exists' | 'outside-root' | 'io-error';
      error?: unknown;
    };

export interface StoredAssetEntry {
  name: string;
  sizeBytes: number;
  modifiedAt: string;
}

export interface AssetStoragePort {
  writeAsset(name: string, bytes: Buffer, signal?: AbortSignal): Promise<WriteAssetResult>;
  readAsset(name: string): Promise<Buffer | undefined>;
  listAssets(): Promise<StoredAssetEntry[]>;
}
