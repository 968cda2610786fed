import { type Detection, detectionSize } from '../types/detection';
import type { QualityGateConfig } from '../config/config';

export interface GateVerdict {
  accepted: boolean;
  reasons: string[];
}

export interface GateSelection {
  qualifying: Detection[];
  rejected: Array<{ detection: Detection; reasons: string[] }>;
}

/**
 * Checks one detection against the gate. All bounds are inclusive; every
 * failed check is reported.
 */
export function evaluateDetection(
  detection: Detection,
  imageWidth: number,
  imageHeight: number,
  gate: QualityGateConfig
): GateVerdict {
  const reasons: string[] = [];
  const { width, height } = detectionSize(detection);

  const imageArea = imageWidth * imageHeight;
  const areaRatio = imageArea > 0 ? (width * height) / imageArea : 0;
  if (areaRatio < gate.minAreaRatio) {
    reasons.push(`face too small: ${(areaRatio * 100).toFixed(1)}% of image`);
  }

  if (detection.confidence < gate.minConfidence) {
    reasons.push(`low confidence: ${detection.confidence.toFixed(2)}`);
  }

  if (detection.pose) {
    if (Math.abs(detection.pose.yaw) > gate.maxAbsYaw) {
      reasons.push(`profile view: yaw ${detection.pose.yaw.toFixed(1)}°`);
    }
    if (Math.abs(detection.pose.pitch) > gate.maxAbsPitch) {
      reasons.push(`tilted: pitch ${detection.pose.pitch.toFixed(1)}°`);
    }
  }

  if (width < gate.minWidth) {
    reasons.push(`face too narrow: ${width}px`);
  } else if (width > gate.maxWidth) {
    reasons.push(`face too wide: ${width}px`);
  }

  const aspectRatio = height > 0 ? width / height : 0;
  if (aspectRatio < gate.minAspectRatio || aspectRatio > gate.maxAspectRatio) {
    reasons.push(`unusual aspect ratio: ${aspectRatio.toFixed(2)}`);
  }

  return { accepted: reasons.length === 0, reasons };
}

export function selectQualifyingFaces(
  detections: readonly Detection[],
  imageWidth: number,
  imageHeight: number,
  gate: QualityGateConfig
): GateSelection {
  const selection: GateSelection = { qualifying: [], rejected: [] };
  for (const detection of detections) {
    const verdict = evaluateDetection(detection, imageWidth, imageHeight, gate);
    if (verdict.accepted) {
      selection.qualifying.push(detection);
    } else {
      selection.rejected.push({ detection, reasons: verdict.reasons });
    }
  }
  return selection;
}
