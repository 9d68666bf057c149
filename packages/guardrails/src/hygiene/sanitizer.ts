/**
 * FILE PURPOSE: Image hygiene gate (size, decodability, dimensions, metadata)
 *
 * WHY: No classifier should ever see malformed, oversized, or
 *      metadata-bearing input.
 * HOW: sharp reads the header for format + dimensions, then decodes to raw
 *      sRGB pixels (alpha flattened on white) and re-encodes a PNG from those
 *      pixels alone. EXIF/ICC/XMP cannot survive the round trip.
 */

import sharp from 'sharp';
import type { SanitizedImage, StageOutcome } from '../types.js';
import { block, pass } from '../types.js';

const RASTER_FORMATS = new Set(['jpeg', 'png', 'webp', 'gif', 'tiff', 'avif', 'heif']);

export interface HygieneLimits {
  maxImageBytes: number;
  maxPixels: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function sanitizeImage(
  imageBytes: Buffer,
  limits: HygieneLimits,
): Promise<StageOutcome<SanitizedImage>> {
  if (imageBytes.length > limits.maxImageBytes) {
    return block('Image too large');
  }

  let width: number;
  let height: number;
  try {
    const meta = await sharp(imageBytes).metadata();
    if (!meta.format || !RASTER_FORMATS.has(meta.format)) {
      return block(`Invalid image: unsupported format ${meta.format ?? 'unknown'}`);
    }
    if (!meta.width || !meta.height) {
      return block('Invalid image: missing dimensions');
    }
    width = meta.width;
    height = meta.height;
  } catch (err) {
    return block(`Invalid image: ${errorMessage(err)}`);
  }

  if (width * height > limits.maxPixels) {
    return block('Image dimensions too large');
  }

  try {
    const { data: pixels, info } = await sharp(imageBytes)
      .flatten({ background: '#ffffff' })
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });

    const rebuilt = await sharp(pixels, {
      raw: { width: info.width, height: info.height, channels: info.channels },
    })
      .png()
      .toBuffer();

    return pass({ data: rebuilt, width: info.width, height: info.height, format: 'png' });
  } catch (err) {
    return block(`Invalid image: ${errorMessage(err)}`);
  }
}
