/**
 * Storage Service - routes avatar uploads according to the storage mode
 * (cloudflare, local, or both)
 */

import { logger } from '../../utils/logging';
import { StorageMode } from './storage.config';
import { UploadFile } from './upload.types';

export interface AvatarStorage {
  upload(file: UploadFile, publicId: string): Promise<string>;
}

export interface StorageBackends {
  cloudflare?: AvatarStorage;
  local?: AvatarStorage;
}

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * With both backends enabled the Cloudflare URL wins and local storage acts as
 * the fallback when Cloudflare fails.
 */
export class ConfiguredAvatarStorage implements AvatarStorage {
  constructor(
    private readonly mode: StorageMode,
    private readonly backends: StorageBackends
  ) {}

  async upload(file: UploadFile, publicId: string): Promise<string> {
    let url: string | null = null;
    let lastError: unknown = null;

    if (this.mode.useCloudflare && this.backends.cloudflare) {
      try {
        url = await this.backends.cloudflare.upload(file, publicId);
      } catch (error) {
        lastError = error;
        logger.error('Cloudflare upload failed', { error: messageOf(error) });
      }
    }

    if (!url && this.mode.useLocal && this.backends.local) {
      try {
        url = await this.backends.local.upload(file, publicId);
      } catch (error) {
        lastError = error;
        logger.error('Local storage save failed', { error: messageOf(error) });
      }
    }

    if (!url) {
      throw new Error(`Failed to upload file to any storage${lastError ? `: ${messageOf(lastError)}` : ''}`);
    }

    return url;
  }
}
