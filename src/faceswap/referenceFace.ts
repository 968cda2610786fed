import * as fs from 'fs-extra';
import type { FaceDetector } from './faceModel';
import { decodeImage } from './imageCodec';
import type { ReferenceFace } from '../types/detection';
import { LazyResource } from '../utils/singleFlight';
import { PipelineError } from '../utils/errorHandler';

/**
 * The face every transform substitutes in. Loaded and detected once per
 * process; concurrent first callers share the load.
 */
export class ReferenceFaceProvider {
  private readonly resource: LazyResource<ReferenceFace>;

  constructor(private readonly imagePath: string, private readonly detector: FaceDetector) {
    this.resource = new LazyResource('Reference face', () => this.load());
  }

  get(): Promise<ReferenceFace> {
    return this.resource.get();
  }

  private async load(): Promise<ReferenceFace> {
    if (!(await fs.pathExists(this.imagePath))) {
      throw new PipelineError(`Reference face not found: ${this.imagePath}`, 'REFERENCE_FACE_UNAVAILABLE', 503);
    }

    const image = await decodeImage(await fs.readFile(this.imagePath));
    const faces = await this.detector.detect(image);
    const face = faces[0];
    if (!face) {
      throw new PipelineError(`No face detected in reference image ${this.imagePath}`, 'REFERENCE_FACE_UNAVAILABLE', 503);
    }
    return { image, face };
  }
}
