import * as crypto from 'crypto';
import type { FaceDetector, FaceSwapper } from './faceModel';
import type { ImageFetcher } from './imageFetcher';
import { decodeImage, encodeJpeg, resizeToLongestSide } from './imageCodec';
import { planDetectionTiers, type DetectionTier } from './detectionTiers';
import { selectQualifyingFaces } from './qualityGate';
import type { Candidate } from '../types/candidate';
import type { Detection, RasterImage, ReferenceFace } from '../types/detection';
import type { TransformResult } from '../types/transform';
import type { QualityGateConfig } from '../config/config';
import { type ArtifactStore, artifactName } from '../storage/artifactStore';
import { logger } from '../utils/logger';
import { PipelineError, describeError, isAbortError, toPipelineError } from '../utils/errorHandler';

export interface QualityGatedTransformDeps {
  fetcher: ImageFetcher;
  detector: FaceDetector;
  swapper: FaceSwapper;
  artifacts: ArtifactStore;
}

export interface QualityGatedTransformOptions {
  detectionTiers: readonly number[];
  gate: QualityGateConfig;
  jpegQuality: number;
}

interface LocatedFaces {
  image: RasterImage;
  detections: Detection[];
  tier: DetectionTier;
}

function cancelled(candidate: Candidate): PipelineError {
  return new PipelineError(`Transform of ${candidate.identityKey} cancelled`, 'TRANSFORM_CANCELLED', 499, true);
}

/**
 * Ad-hoc candidate for a single user-supplied URL.
 */
export function directCandidate(url: string, label: string = url): Candidate {
  const digest = crypto.createHash('sha1').update(url).digest('hex');
  return {
    identityKey: `url:${digest}`,
    label,
    sourceTag: 'direct',
    popularityScore: 0,
    flagged: false,
    imageUrl: url,
  };
}

/**
 * Per-candidate state machine: acquire, detect (with downscale tiers),
 * quality gate, swap each qualifying face onto the running output, persist.
 * Expected dead ends come back as outcomes; transform() never throws.
 */
export class QualityGatedTransform {
  constructor(
    private readonly deps: QualityGatedTransformDeps,
    private readonly options: QualityGatedTransformOptions
  ) {}

  async transform(candidate: Candidate, reference: ReferenceFace, signal?: AbortSignal): Promise<TransformResult> {
    try {
      return await this.run(candidate, reference, signal);
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        logger.debug(`Transform of ${candidate.identityKey} cancelled`);
        return {
          outcome: 'transform_error',
          candidate,
          reason: 'cancelled',
          error: cancelled(candidate),
        };
      }
      const failure = toPipelineError(error, 'TRANSFORM_FAILED', `Transform of ${candidate.identityKey} failed: ${describeError(error)}`);
      logger.warn(`Transform error for ${candidate.identityKey}: ${failure.message}`);
      return { outcome: 'transform_error', candidate, reason: failure.message, error: failure };
    }
  }

  private async run(candidate: Candidate, reference: ReferenceFace, signal?: AbortSignal): Promise<TransformResult> {
    this.checkpoint(candidate, signal);

    let image: RasterImage;
    try {
      const bytes = await this.deps.fetcher.fetch(candidate.imageUrl, signal);
      image = await decodeImage(bytes);
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) throw error;
      const reason = `could not load ${candidate.imageUrl}: ${describeError(error)}`;
      logger.info(`Source unavailable for ${candidate.identityKey}: ${describeError(error)}`);
      return {
        outcome: 'source_unavailable',
        candidate,
        reason,
        error: new PipelineError(reason, 'SOURCE_UNAVAILABLE', 502, true, error),
      };
    }

    const located = await this.locateFaces(candidate, image, signal);
    if (!located) {
      return { outcome: 'no_face_detected', candidate, reason: `no face found in ${image.width}x${image.height} image` };
    }

    const { qualifying, rejected } = selectQualifyingFaces(
      located.detections,
      located.image.width,
      located.image.height,
      this.options.gate
    );
    for (const rejection of rejected) {
      logger.debug(`Rejected face in ${candidate.identityKey}: ${rejection.reasons.join(', ')}`);
    }
    if (qualifying.length === 0) {
      const firstReasons = rejected[0]?.reasons.join(', ') ?? 'no detail';
      return {
        outcome: 'no_qualifying_face',
        candidate,
        reason: `${located.detections.length} face(s) detected, none qualified (${firstReasons})`,
      };
    }

    let output = located.image;
    for (const detection of qualifying) {
      this.checkpoint(candidate, signal);
      output = await this.deps.swapper.swap(output, detection, reference, signal);
    }

    this.checkpoint(candidate, signal);
    const bytes = await encodeJpeg(output, this.options.jpegQuality);
    const artifact = await this.deps.artifacts.save(artifactName(candidate), bytes);

    logger.info(`Swapped ${qualifying.length} face(s) in ${candidate.identityKey} (${located.tier.label}) -> ${artifact.name}`);
    return { outcome: 'success', candidate, artifact, facesSwapped: qualifying.length };
  }

  private async locateFaces(candidate: Candidate, original: RasterImage, signal?: AbortSignal): Promise<LocatedFaces | null> {
    const tiers = planDetectionTiers(original.width, original.height, this.options.detectionTiers);

    for (const tier of tiers) {
      this.checkpoint(candidate, signal);
      const image = tier.longestSide === null ? original : await resizeToLongestSide(original, tier.longestSide);
      const detections = await this.deps.detector.detect(image, signal);
      if (detections.length > 0) {
        logger.debug(`Found ${detections.length} face(s) in ${candidate.identityKey} at ${tier.label} (${image.width}x${image.height})`);
        return { image, detections, tier };
      }
    }

    logger.debug(`No faces in ${candidate.identityKey} after ${tiers.length} tier(s)`);
    return null;
  }

  private checkpoint(candidate: Candidate, signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw cancelled(candidate);
    }
  }
}
