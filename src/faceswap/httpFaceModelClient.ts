import axios from 'axios';
import { z } from 'zod';
import type { FaceDetector, FaceSwapper } from './faceModel';
import { decodeImage } from './imageCodec';
import type { Detection, RasterImage, ReferenceFace } from '../types/detection';
import { LazyResource } from '../utils/singleFlight';
import { PipelineError, describeError, isAbortError } from '../utils/errorHandler';

const DetectResponseSchema = z.object({
  faces: z.array(z.object({
    bbox: z.tuple([z.number(), z.number(), z.number(), z.number()]),
    score: z.number(),
    pose: z.tuple([z.number(), z.number(), z.number()]).nullish(),
  })),
});

const SwapResponseSchema = z.object({
  image: z.string().min(1),
  format: z.string().optional(),
});

const HealthSchema = z.object({
  status: z.string().optional(),
  swap: z.boolean().optional(),
}).passthrough();

export type ModelHealth = z.infer<typeof HealthSchema>;

function encodeImage(image: RasterImage): { image: string; format: RasterImage['format'] } {
  return { image: image.buffer.toString('base64'), format: image.format };
}

function toBbox(detection: Detection): [number, number, number, number] {
  const { x1, y1, x2, y2 } = detection.box;
  return [x1, y1, x2, y2];
}

/**
 * Client for the face model server (detection and swap over HTTP/JSON,
 * images as base64). The server's readiness is checked once and shared by
 * every caller; a failed check is retried on the next call.
 */
export class HttpFaceModelClient implements FaceDetector, FaceSwapper {
  readonly name = 'face-model-http';
  private readonly readiness: LazyResource<ModelHealth>;

  constructor(private readonly baseUrl: string, private readonly timeoutMs: number) {
    this.readiness = new LazyResource('Face model server', () => this.checkHealth());
  }

  get isReady(): boolean {
    return this.readiness.isReady;
  }

  async ensureReady(): Promise<ModelHealth> {
    return this.readiness.get();
  }

  async detect(image: RasterImage, signal?: AbortSignal): Promise<Detection[]> {
    await this.ensureReady();
    const data = await this.post('/detect', encodeImage(image), signal);
    const parsed = DetectResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new PipelineError('Face model returned an unexpected detection response', 'TRANSFORM_FAILED');
    }
    return parsed.data.faces.map(face => {
      const [x1, y1, x2, y2] = face.bbox;
      const detection: Detection = { box: { x1, y1, x2, y2 }, confidence: face.score };
      if (face.pose) {
        const [pitch, yaw, roll] = face.pose;
        detection.pose = { pitch, yaw, roll };
      }
      return detection;
    });
  }

  async swap(image: RasterImage, target: Detection, reference: ReferenceFace, signal?: AbortSignal): Promise<RasterImage> {
    await this.ensureReady();
    const data = await this.post('/swap', {
      ...encodeImage(image),
      target: { bbox: toBbox(target), score: target.confidence },
      source: { ...encodeImage(reference.image), bbox: toBbox(reference.face) },
    }, signal);
    const parsed = SwapResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new PipelineError('Face model returned an unexpected swap response', 'TRANSFORM_FAILED');
    }
    return decodeImage(Buffer.from(parsed.data.image, 'base64'));
  }

  private async checkHealth(): Promise<ModelHealth> {
    try {
      const response = await axios.get(`${this.baseUrl}/health`, { timeout: Math.min(this.timeoutMs, 10000) });
      return HealthSchema.parse(response.data);
    } catch (error) {
      throw new PipelineError(
        `Face model server at ${this.baseUrl} is not available: ${describeError(error)}`,
        'MODEL_UNAVAILABLE',
        503,
        true,
        error
      );
    }
  }

  private async post(route: string, body: object, signal?: AbortSignal): Promise<unknown> {
    try {
      const response = await axios.post(`${this.baseUrl}${route}`, body, {
        timeout: this.timeoutMs,
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        signal,
      });
      return response.data;
    } catch (error) {
      if (isAbortError(error)) throw error;
      throw new PipelineError(`Face model ${route} failed: ${describeError(error)}`, 'MODEL_UNAVAILABLE', 503, true, error);
    }
  }
}
