/**
 * FILE PURPOSE: Deterministic identity for a (prompt, image) pair
 *
 * sha256(prompt + "|" + (image ? sha256(image) : "")). A zero-length image
 * hashes to sha256("") and so differs from "no image".
 */

import { createHash } from 'node:crypto';

export function sha256Hex(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/** Hex sha256 of the image bytes, or null when no image was supplied. */
export function computeImageHash(imageBytes: Buffer | null | undefined): string | null {
  if (imageBytes === null || imageBytes === undefined) return null;
  return sha256Hex(imageBytes);
}

export function fingerprint(prompt: string, imageBytes?: Buffer | null): string {
  const imageHash = computeImageHash(imageBytes) ?? '';
  return sha256Hex(`${prompt}|${imageHash}`);
}
