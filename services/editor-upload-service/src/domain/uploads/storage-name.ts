import { randomBytes as cryptoRandomBytes } from 'node:crypto';
import type { ImageExtension } from './image-format';

export type RandomBytesSource = (size: number) => Uint8Array;

const IDENTIFIER_BYTES = 16;
const STORAGE_NAME_PATTERN = /^[a-f0-9]{32}\.(jpg|jpeg|png|gif|webp)$/;

/**
 * `{128-bit random hex}.{ext}`. The client file name never takes part, so the
 * result cannot carry path segments or any substring of it.
 */
export function generateStorageName(
  extension: ImageExtension,
  randomBytes: RandomBytesSource = cryptoRandomBytes,
): string {
  const bytes = randomBytes(IDENTIFIER_BYTES);
  if (bytes.length !== IDENTIFIER_BYTES) {
    throw new Error(`Random source returned ${bytes.length} bytes, expected ${IDENTIFIER_BYTES}.`);
  }

  const identifier = Array.from(bytes)
    .map((value) => value.toString(16).padStart(2, '0'))
    .join('');

  return `${identifier}${extension}`;
}

export function isSafeStorageName(name: string): boolean {
  return STORAGE_NAME_PATTERN.test(name);
}

export function joinPublicUrl(publicBaseUrl: string, storageName: string): string {
  return `${publicBaseUrl.replace(/\/+$/, '')}/${storageName}`;
}
