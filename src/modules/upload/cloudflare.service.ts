/**
 * Cloudflare Images upload over the REST API.
 */

import { z } from 'zod';
import { logger } from '../../utils/logging';
import { UploadFile } from './upload.types';

const cloudflareUploadResponseSchema = z.object({
  success: z.boolean(),
  result: z
    .object({
      id: z.string(),
      filename: z.string(),
      variants: z.array(z.string()),
    })
    .nullish(),
  errors: z
    .array(
      z.object({
        code: z.number(),
        message: z.string(),
      })
    )
    .optional(),
});

export interface CloudflareConfig {
  accountId: string;
  apiToken: string;
}

export class CloudflareImageUploader {
  constructor(
    private readonly config: CloudflareConfig,
    private readonly fetchFn: typeof fetch = fetch
  ) {}

  private get imagesApiUrl(): string {
    return `https://api.cloudflare.com/client/v4/accounts/${this.config.accountId}/images/v1`;
  }

  /**
   * @returns the public URL of the first variant
   */
  async upload(file: UploadFile, publicId: string): Promise<string> {
    const formData = new FormData();
    formData.append('file', new Blob([file.buffer], { type: file.mimeType }), file.fileName);
    formData.append('metadata', JSON.stringify({ owner: publicId }));

    const response = await this.fetchFn(this.imagesApiUrl, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.config.apiToken}`,
      },
      body: formData,
    });

    const parsed = cloudflareUploadResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected Cloudflare response (status ${response.status})`);
    }

    const data = parsed.data;
    if (!response.ok || !data.success) {
      const errorMessage = data.errors?.[0]?.message || `Upload failed with status ${response.status}`;
      logger.error('Error uploading to Cloudflare', { fileName: file.fileName, error: errorMessage });
      throw new Error(errorMessage);
    }

    if (!data.result) {
      throw new Error('Upload succeeded but no result returned');
    }

    return data.result.variants[0] || data.result.filename;
  }
}
