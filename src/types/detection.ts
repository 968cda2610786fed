export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

/**
 * Head pose in degrees.
 */
export interface Pose {
  pitch: number;
  yaw: number;
  roll: number;
}

export interface Detection {
  box: BoundingBox;
  confidence: number;       // 0-1
  pose?: Pose;
}

export function detectionSize(detection: Detection): { width: number; height: number } {
  const { x1, y1, x2, y2 } = detection.box;
  return {
    width: Math.trunc(x2) - Math.trunc(x1),
    height: Math.trunc(y2) - Math.trunc(y1),
  };
}

/**
 * Decoded raster image carried between pipeline steps. The buffer holds
 * encoded bytes (normalised orientation), width/height are pixel dimensions.
 */
export interface RasterImage {
  buffer: Buffer;
  width: number;
  height: number;
  format: 'jpeg' | 'png' | 'webp';
}

/**
 * The fixed face used as the substitution source across all transforms.
 */
export interface ReferenceFace {
  image: RasterImage;
  face: Detection;
}
