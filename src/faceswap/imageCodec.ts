import sharp from 'sharp';
import type { RasterImage } from '../types/detection';

type RasterFormat = RasterImage['format'];

function asRasterFormat(format: string | undefined): RasterFormat | null {
  return format === 'jpeg' || format === 'png' || format === 'webp' ? format : null;
}

/**
 * Decodes and orientation-normalises image bytes. Formats other than
 * JPEG/PNG/WebP (BMP, TIFF, a GIF's first frame) are re-encoded as PNG.
 */
export async function decodeImage(bytes: Buffer): Promise<RasterImage> {
  const metadata = await sharp(bytes).metadata();
  const format = asRasterFormat(metadata.format);

  let pipeline = sharp(bytes).rotate();
  if (!format) {
    pipeline = pipeline.png();
  }
  const { data, info } = await pipeline.toBuffer({ resolveWithObject: true });
  return { buffer: data, width: info.width, height: info.height, format: format ?? 'png' };
}

/**
 * Dimensions after scaling so the longest side equals `longestSide`, truncated.
 */
export function scaledSize(width: number, height: number, longestSide: number): { width: number; height: number } {
  const scale = longestSide / Math.max(width, height);
  return {
    width: Math.max(1, Math.trunc(width * scale)),
    height: Math.max(1, Math.trunc(height * scale)),
  };
}

export async function resizeToLongestSide(image: RasterImage, longestSide: number): Promise<RasterImage> {
  const size = scaledSize(image.width, image.height, longestSide);
  const { data, info } = await sharp(image.buffer)
    .resize(size.width, size.height, { fit: 'fill' })
    .toFormat(image.format)
    .toBuffer({ resolveWithObject: true });
  return { buffer: data, width: info.width, height: info.height, format: image.format };
}

export async function encodeJpeg(image: RasterImage, quality: number): Promise<Buffer> {
  return sharp(image.buffer).flatten({ background: '#ffffff' }).jpeg({ quality }).toBuffer();
}
