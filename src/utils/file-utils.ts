import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import { fileTypeFromBuffer } from 'file-type';
import { logger } from './logger.js';
import { describeError } from '../errors.js';
import { getExtensionFromUrl, normalizeExtension } from './url-utils.js';
import { MediaKind } from '../types.js';

export interface MediaInfo {
  kind: MediaKind;
  extension: string;
}

export function getContentHash(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Classifies downloaded bytes by their magic numbers. The URL only supplies the
 * extension when the bytes are not a recognised image or video.
 */
export async function detectMedia(data: Uint8Array, sourceUrl: string): Promise<MediaInfo> {
  const fallback = getExtensionFromUrl(sourceUrl);

  let detected: { ext: string; mime: string } | undefined;
  try {
    detected = await fileTypeFromBuffer(data);
  } catch (error) {
    logger.debug(`Could not sniff file type for ${sourceUrl}: ${describeError(error)}`);
    return { kind: 'unknown', extension: fallback };
  }

  if (!detected) {
    return { kind: 'unknown', extension: fallback };
  }

  if (detected.mime.startsWith('image/')) {
    return { kind: 'images', extension: normalizeExtension(detected.ext) };
  }
  if (detected.mime.startsWith('video/')) {
    return { kind: 'videos', extension: normalizeExtension(detected.ext) };
  }

  return { kind: 'unknown', extension: fallback };
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
