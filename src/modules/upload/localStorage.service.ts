/**
 * Local Storage Service - saves uploads under UPLOAD_DIR, served at /uploads
 */

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { UploadFile } from './upload.types';

export interface LocalStorageConfig {
  uploadDir: string;
  baseUrl: string;
}

const AVATAR_DIR = 'avatars';

const extensionFor = (file: UploadFile): string => {
  const ext = path.extname(file.fileName);
  if (ext) {
    return ext.toLowerCase();
  }
  const [, subtype] = file.mimeType.split('/');
  return subtype ? `.${subtype}` : '';
};

/**
 * Unique file name: sanitized public id, timestamp and a short uuid
 */
export const generateFileName = (file: UploadFile, publicId: string): string => {
  const baseName = publicId.replace(/[^a-zA-Z0-9_-]/g, '_') || 'file';
  const uuid = uuidv4().substring(0, 8);
  return `${baseName}-${Date.now()}-${uuid}${extensionFor(file)}`;
};

export class LocalFileStorage {
  constructor(private readonly config: LocalStorageConfig) {}

  async upload(file: UploadFile, publicId: string): Promise<string> {
    const targetDir = path.join(this.config.uploadDir, AVATAR_DIR);
    await fs.mkdir(targetDir, { recursive: true });

    const uniqueFileName = generateFileName(file, publicId);
    await fs.writeFile(path.join(targetDir, uniqueFileName), file.buffer);

    const baseUrl = this.config.baseUrl.replace(/\/+$/, '');
    return `${baseUrl}/uploads/${AVATAR_DIR}/${uniqueFileName}`;
  }
}
