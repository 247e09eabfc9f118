/**
 * Uploaded file decoding
 */

import type { UploadedFile } from '../../api/types.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const DATA_URL_PREFIX = /^data:[^;,]*;base64,/;

export type DecodeResult =
  | { success: true; content: Buffer }
  | { success: false; error: string };

/**
 * Decode an uploaded file's base64 content and check it against the declared size
 * Accepts a data URL prefix and MIME-style line breaks
 */
export function decodeUploadedFile(file: Pick<UploadedFile, 'file_content' | 'file_size'>): DecodeResult {
  const encoded = file.file_content.replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');

  if (encoded.length === 0) {
    return { success: false, error: 'DecodeError: file_content is empty' };
  }

  if (encoded.length % 4 !== 0 || !BASE64_PATTERN.test(encoded)) {
    return { success: false, error: 'DecodeError: file_content is not valid base64' };
  }

  const content = Buffer.from(encoded, 'base64');

  if (content.length !== file.file_size) {
    return {
      success: false,
      error: `DecodeError: decoded ${content.length} bytes but file_size declares ${file.file_size}`,
    };
  }

  return { success: true, content };
}
