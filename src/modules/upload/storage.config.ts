import { logger } from '../../utils/logging';

export type StorageType = 'cloudflare' | 'local' | 'both';

export interface StorageMode {
  type: StorageType;
  useCloudflare: boolean;
  useLocal: boolean;
}

const isStorageType = (value: string): value is StorageType =>
  value === 'cloudflare' || value === 'local' || value === 'both';

/**
 * Decide where avatars go. Cloudflare without credentials falls back to local.
 */
export const resolveStorageMode = (type: string, hasCloudflareConfig: boolean): StorageMode => {
  const storageType = type.toLowerCase();

  if (!isStorageType(storageType)) {
    logger.warn(`Invalid STORAGE_TYPE: ${type}, defaulting to 'local'`);
    return { type: 'local', useCloudflare: false, useLocal: true };
  }

  const useCloudflare = storageType === 'cloudflare' || storageType === 'both';
  const useLocal = storageType === 'local' || storageType === 'both';

  if (useCloudflare && !hasCloudflareConfig) {
    logger.warn('STORAGE_TYPE requires Cloudflare but config is missing. Falling back to local only.');
    return { type: 'local', useCloudflare: false, useLocal: true };
  }

  return { type: storageType, useCloudflare, useLocal };
};
