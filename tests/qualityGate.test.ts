import { describe, it, expect } from 'vitest';
import { evaluateDetection, selectQualifyingFaces } from '../src/faceswap/qualityGate';
import type { Detection } from '../src/types/detection';
import type { QualityGateConfig } from '../src/config/config';

const gate: QualityGateConfig = {
  minAreaRatio: 0.08,
  minConfidence: 0.6,
  maxAbsYaw: 45,
  maxAbsPitch: 35,
  minWidth: 100,
  maxWidth: 2000,
  minAspectRatio: 0.6,
  maxAspectRatio: 1.4,
};

function face(x2: number, y2: number, extra: Partial<Detection> = {}): Detection {
  return { box: { x1: 0, y1: 0, x2, y2 }, confidence: 0.9, ...extra };
}

describe('evaluateDetection', () => {
  it('should accept a face covering exactly 8% of the image', () => {
    // 250 x 320 = 80000 of 1000 x 1000
    expect(evaluateDetection(face(250, 320), 1000, 1000, gate)).toEqual({ accepted: true, reasons: [] });
  });

  it('should reject a face covering 7.9% of the image', () => {
    // 250 x 316 = 79000 of 1000 x 1000
    expect(evaluateDetection(face(250, 316), 1000, 1000, gate)).toEqual({
      accepted: false,
      reasons: ['face too small: 7.9% of image'],
    });
  });

  it('should treat the confidence bound as inclusive', () => {
    expect(evaluateDetection(face(300, 300, { confidence: 0.6 }), 1000, 1000, gate).accepted).toBe(true);
    expect(evaluateDetection(face(300, 300, { confidence: 0.59 }), 1000, 1000, gate).reasons).toEqual([
      'low confidence: 0.59',
    ]);
  });

  it('should check pose only when present', () => {
    expect(evaluateDetection(face(300, 300), 1000, 1000, gate).accepted).toBe(true);
    expect(evaluateDetection(face(300, 300, { pose: { pitch: 0, yaw: 45, roll: 0 } }), 1000, 1000, gate).accepted).toBe(true);
    expect(evaluateDetection(face(300, 300, { pose: { pitch: 0, yaw: -46, roll: 0 } }), 1000, 1000, gate).reasons).toEqual([
      'profile view: yaw -46.0°',
    ]);
    expect(evaluateDetection(face(300, 300, { pose: { pitch: 36, yaw: 0, roll: 80 } }), 1000, 1000, gate).reasons).toEqual([
      'tilted: pitch 36.0°',
    ]);
  });

  it('should reject faces narrower than the minimum width', () => {
    // 99 x 120 in 300 x 300 is 13% of the image
    expect(evaluateDetection(face(99, 120), 300, 300, gate).reasons).toEqual(['face too narrow: 99px']);
    expect(evaluateDetection(face(100, 120), 300, 300, gate).accepted).toBe(true);
  });

  it('should reject faces wider than the maximum width', () => {
    expect(evaluateDetection(face(2001, 2001), 3000, 3000, gate).reasons).toEqual(['face too wide: 2001px']);
  });

  it('should reject unusual aspect ratios, including zero height', () => {
    expect(evaluateDetection(face(300, 150), 500, 500, gate).reasons).toEqual(['unusual aspect ratio: 2.00']);
    expect(evaluateDetection(face(300, 0), 500, 500, gate).reasons).toEqual([
      'face too small: 0.0% of image',
      'unusual aspect ratio: 0.00',
    ]);
  });

  it('should truncate fractional box coordinates', () => {
    const detection: Detection = { box: { x1: 0.9, y1: 0.9, x2: 250.7, y2: 320.2 }, confidence: 0.9 };
    expect(evaluateDetection(detection, 1000, 1000, gate).accepted).toBe(true);
  });

  it('should report every failed check', () => {
    const verdict = evaluateDetection(face(50, 100, { confidence: 0.2 }), 1000, 1000, gate);
    expect(verdict.reasons).toEqual([
      'face too small: 0.5% of image',
      'low confidence: 0.20',
      'face too narrow: 50px',
      'unusual aspect ratio: 0.50',
    ]);
  });
});

describe('selectQualifyingFaces', () => {
  it('should split detections into qualifying and rejected', () => {
    const good = face(300, 300);
    const small = face(100, 100);
    const selection = selectQualifyingFaces([small, good], 1000, 1000, gate);

    expect(selection.qualifying).toEqual([good]);
    expect(selection.rejected).toEqual([{ detection: small, reasons: ['face too small: 1.0% of image'] }]);
  });
});
