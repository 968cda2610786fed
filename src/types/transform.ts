import type { Candidate } from './candidate';
import type { PipelineError } from '../utils/errorHandler';

export type TransformOutcome =
  | 'success'
  | 'no_face_detected'
  | 'no_qualifying_face'
  | 'source_unavailable'
  | 'transform_error';

export const TRANSFORM_OUTCOMES: readonly TransformOutcome[] = [
  'success',
  'no_face_detected',
  'no_qualifying_face',
  'source_unavailable',
  'transform_error',
];

export interface ArtifactRef {
  name: string;
  reference: string;        // Path or URL path the artifact is served under
}

export interface SuccessfulTransform {
  outcome: 'success';
  candidate: Candidate;
  artifact: ArtifactRef;
  facesSwapped: number;
}

export interface SkippedTransform {
  outcome: 'no_face_detected' | 'no_qualifying_face';
  candidate: Candidate;
  reason: string;
}

export interface FailedTransform {
  outcome: 'source_unavailable' | 'transform_error';
  candidate: Candidate;
  reason: string;
  error: PipelineError;
}

export type TransformResult = SuccessfulTransform | SkippedTransform | FailedTransform;

export function isSuccess(result: TransformResult): result is SuccessfulTransform {
  return result.outcome === 'success';
}
