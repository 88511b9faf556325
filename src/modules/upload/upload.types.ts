export interface UploadFile {
  buffer: Buffer;
  fileName: string;
  mimeType: string;
}

export const AVATAR_MIME_TYPES = ['image/jpeg', 'image/jpg', 'image/png', 'image/gif', 'image/webp'];
