import sharp from 'sharp';
import type { FaceSwapper } from './faceModel';
import type { BoundingBox, Detection, RasterImage, ReferenceFace } from '../types/detection';

interface Region {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * Integer region of `box` inside a width x height image, or null when the
 * clamped box is empty.
 */
export function clampRegion(box: BoundingBox, width: number, height: number): Region | null {
  const x1 = Math.max(0, Math.trunc(box.x1));
  const y1 = Math.max(0, Math.trunc(box.y1));
  const x2 = Math.min(width, Math.trunc(box.x2));
  const y2 = Math.min(height, Math.trunc(box.y2));
  if (x2 <= x1 || y2 <= y1) {
    return null;
  }
  return { left: x1, top: y1, width: x2 - x1, height: y2 - y1 };
}

/**
 * Fallback swapper for when no swap model is available: pastes the
 * reference face over the target box at partial opacity.
 */
export class BlendFaceSwapper implements FaceSwapper {
  readonly name = 'blend';

  constructor(private readonly opacity: number = 0.7) {}

  async swap(image: RasterImage, target: Detection, reference: ReferenceFace): Promise<RasterImage> {
    const region = clampRegion(target.box, image.width, image.height);
    if (!region) {
      return image;
    }

    const source = clampRegion(reference.face.box, reference.image.width, reference.image.height)
      ?? { left: 0, top: 0, width: reference.image.width, height: reference.image.height };

    const patch = await sharp(reference.image.buffer)
      .extract(source)
      .resize(region.width, region.height, { fit: 'fill' })
      .removeAlpha()
      .ensureAlpha(this.opacity)
      .png()
      .toBuffer();

    const buffer = await sharp(image.buffer)
      .composite([{ input: patch, left: region.left, top: region.top }])
      .toFormat(image.format)
      .toBuffer();

    return { ...image, buffer };
  }
}
