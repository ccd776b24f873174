export type ImageFormat = 'jpeg' | 'png' | 'gif' | 'webp';

export type ImageExtension = '.jpg' | '.jpeg' | '.png' | '.gif' | '.webp';

export const SUPPORTED_IMAGE_EXTENSIONS: readonly ImageExtension[] = ['.jpg', '.jpeg', '.png', '.gif', '.webp'];

const FORMAT_BY_EXTENSION: Record<ImageExtension, ImageFormat> = {
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
  '.png': 'png',
  '.gif': 'gif',
  '.webp': 'webp',
};

const CONTENT_TYPE_BY_FORMAT: Record<ImageFormat, string> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
};

export function isImageExtension(value: string): value is ImageExtension {
  return SUPPORTED_IMAGE_EXTENSIONS.some((extension) => extension === value);
}

export function isImageFormat(value: unknown): value is ImageFormat {
  return value === 'jpeg' || value === 'png' || value === 'gif' || value === 'webp';
}

export function formatForExtension(extension: ImageExtension): ImageFormat {
  return FORMAT_BY_EXTENSION[extension];
}

export function contentTypeForFormat(format: ImageFormat): string {
  return CONTENT_TYPE_BY_FORMAT[format];
}

export function contentTypeForStorageName(name: string): string | undefined {
  const dot = name.lastIndexOf('.');
  if (dot < 0) {
    return undefined;
  }

  const extension = name.slice(dot).toLowerCase();
  return isImageExtension(extension) ? contentTypeForFormat(formatForExtension(extension)) : undefined;
}
