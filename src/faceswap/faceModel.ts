import type { Detection, RasterImage, ReferenceFace } from '../types/detection';

/**
 * Locates faces in a decoded image. An empty array means no face, not an error.
 */
export interface FaceDetector {
  readonly name: string;
  detect(image: RasterImage, signal?: AbortSignal): Promise<Detection[]>;
}

/**
 * Replaces the face at `target` with the reference face. The result is a new
 * image with the same dimensions; callers chain calls to swap several faces.
 */
export interface FaceSwapper {
  readonly name: string;
  swap(image: RasterImage, target: Detection, reference: ReferenceFace, signal?: AbortSignal): Promise<RasterImage>;
}
