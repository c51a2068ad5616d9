// Upload validation for POST /process-image

import path from 'path';
import sharp from 'sharp';
import type { UploadedFile } from 'express-fileupload';
import { ValidationError } from '../core/errors.js';

const formatMegabytes = (bytes: number): number => Number((bytes / (1024 * 1024)).toFixed(2));

export interface UploadLimits {
  allowedExtensions: string[];
  maxUploadBytes: number;
}

/**
 * Checks the uploaded image and returns it re-encoded as PNG so every
 * generator receives the same format.
 */
export async function readUploadedImage(
  upload: UploadedFile | UploadedFile[] | undefined,
  limits: UploadLimits
): Promise<Buffer> {
  if (!upload) {
    throw new ValidationError('No image file provided. Upload it in the "image" field.');
  }
  if (Array.isArray(upload)) {
    throw new ValidationError('Only one image may be uploaded per job.');
  }

  const extension = path.extname(upload.name).slice(1).toLowerCase();
  if (!limits.allowedExtensions.includes(extension)) {
    throw new ValidationError(
      `File type not allowed. Allowed types: ${limits.allowedExtensions.join(', ')}`
    );
  }

  if (upload.truncated || upload.size > limits.maxUploadBytes) {
    throw new ValidationError(
      `File is too large. Maximum size is ${formatMegabytes(limits.maxUploadBytes)} MB.`,
      413
    );
  }

  try {
    const image = sharp(upload.data);
    const metadata = await image.metadata();
    if (!metadata.width || !metadata.height) {
      throw new Error('image has no dimensions');
    }
    return await image.png().toBuffer();
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid or corrupted image file: ${detail}`);
  }
}
