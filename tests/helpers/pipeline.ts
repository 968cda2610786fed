import * as fs from 'fs-extra';
import * as path from 'path';
import sharp from 'sharp';
import { vi } from 'vitest';
import { TrendSwapService, type TrendSwapSettings } from '../../src/service/trendSwapService';
import { ResultCache } from '../../src/cache/resultCache';
import { MemoryCacheStore } from '../../src/cache/cacheStore';
import { BatchGenerator } from '../../src/batch/batchGenerator';
import { CandidateSource } from '../../src/trends/candidateSource';
import { ContentSafetyFilter } from '../../src/safety/contentSafetyFilter';
import { QualityGatedTransform } from '../../src/faceswap/qualityGatedTransform';
import { ReferenceFaceProvider } from '../../src/faceswap/referenceFace';
import type { FaceDetector, FaceSwapper } from '../../src/faceswap/faceModel';
import type { ImageFetcher } from '../../src/faceswap/imageFetcher';
import type { ImageSearchProvider } from '../../src/search/imageSearch';
import { MemoryArtifactStore } from '../../src/storage/artifactStore';
import type { Detection, RasterImage } from '../../src/types/detection';
import type { RawTrendItem } from '../../src/types/candidate';
import type { SuccessfulTransform } from '../../src/types/transform';

/**
 * Five hot posts: two flagged, one with a blocked title, two usable.
 */
export const TRENDING: RawTrendItem[] = [
  { identityKey: 't3_item1', title: 'Beach day', url: 'https://i.example.com/1.jpg', score: 1500, flagged: true },
  { identityKey: 't3_item2', title: 'nsfw meme', url: 'https://i.example.com/2.jpg', score: 1400, flagged: false },
  { identityKey: 't3_item3', title: 'Gym selfie', url: 'https://i.example.com/3.jpg', score: 1300, flagged: true },
  { identityKey: 't3_item4', title: 'Graduation photo', url: 'https://i.example.com/4.jpg', score: 900, flagged: false },
  { identityKey: 't3_item5', title: 'Family reunion', url: 'https://i.example.com/5.jpg', score: 500, flagged: false },
];

const REFERENCE_FACE: Detection = { box: { x1: 20, y1: 20, x2: 80, y2: 80 }, confidence: 0.99 };
// 10% of an 800x600 photo, inside every other bound
export const QUALIFYING_FACE: Detection = { box: { x1: 200, y1: 100, x2: 400, y2: 340 }, confidence: 0.9 };

export const SETTINGS: TrendSwapSettings = {
  targetSuccesses: 2,
  maxAttempts: 10,
  trendGroups: ['pics'],
  perGroupLimit: 25,
  searchGroups: ['pics'],
  searchLimit: 5,
  imageLimit: 5,
};

export interface PipelineFixtures {
  tempDir: string;
  referencePath: string;
  photo: Buffer;
}

/**
 * A 100x100 reference image on disk and an 800x600 JPEG "download".
 */
export async function createFixtures(name: string): Promise<PipelineFixtures> {
  const tempDir = path.join(process.cwd(), 'tests', 'tmp', `${name}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await fs.ensureDir(tempDir);
  const referencePath = path.join(tempDir, 'reference.png');
  await sharp({ create: { width: 100, height: 100, channels: 3, background: { r: 0, g: 0, b: 255 } } })
    .png()
    .toFile(referencePath);
  const photo = await sharp({ create: { width: 800, height: 600, channels: 3, background: { r: 200, g: 120, b: 80 } } })
    .jpeg()
    .toBuffer();
  return { tempDir, referencePath, photo };
}

export interface HarnessOptions {
  referencePath?: string;
  imageUrls?: string[];
}

/**
 * The real pipeline with in-process stand-ins for Reddit, the image host,
 * the face model and image search. The clock only moves via `advance`.
 */
export function createHarness(fixtures: PipelineFixtures, options: HarnessOptions = {}) {
  let now = 1_000_000;
  const clock = () => now;
  let photoFaces: Detection[] = [QUALIFYING_FACE];

  const provider = {
    name: 'fake',
    hot: vi.fn(async (_group: string, _limit: number, _signal?: AbortSignal) => TRENDING),
    search: vi.fn(async (_group: string, _query: string, _limit: number, _signal?: AbortSignal) => TRENDING.slice(3)),
  };
  const candidates = new CandidateSource(provider, new ContentSafetyFilter({ terms: ['nsfw'] }), {
    groupTimeoutMs: 1000,
    maxCandidates: 20,
    imageHosts: [],
    cacheTtlMs: 60_000,
    now: clock,
  });

  // The reference image is the only 100px-wide image in play
  const detector: FaceDetector = {
    name: 'fake',
    detect: async (image: RasterImage) => (image.width === 100 ? [REFERENCE_FACE] : photoFaces),
  };
  const swapper: FaceSwapper = { name: 'fake', swap: async (image: RasterImage) => image };
  const fetcher: ImageFetcher = { fetch: async () => fixtures.photo };
  const artifacts = new MemoryArtifactStore('/artifacts');
  const transform = new QualityGatedTransform(
    { fetcher, detector, swapper, artifacts },
    {
      detectionTiers: [1920, 800],
      gate: {
        minAreaRatio: 0.08,
        minConfidence: 0.6,
        maxAbsYaw: 45,
        maxAbsPitch: 35,
        minWidth: 100,
        maxWidth: 2000,
        minAspectRatio: 0.6,
        maxAspectRatio: 1.4,
      },
      jpegQuality: 85,
    }
  );

  const generator = new BatchGenerator(candidates, transform, {
    groups: SETTINGS.trendGroups,
    perGroupLimit: SETTINGS.perGroupLimit,
    poolSize: 1,
    shuffle: false,
  });

  const batchCache = new ResultCache<SuccessfulTransform[]>({
    name: 'batch',
    store: new MemoryCacheStore(),
    ttlMs: 3_600_000,
    whileRegenerating: 'wait',
    waitTimeoutMs: 10_000,
    shouldStore: (payload) => payload.length > 0,
    now: clock,
  });

  const imageUrls = options.imageUrls ?? ['https://images.example.org/person.jpg'];
  const imageSearch: ImageSearchProvider = { name: 'fake', search: async () => imageUrls };

  const service = new TrendSwapService(
    {
      batchCache,
      generator,
      transform,
      references: new ReferenceFaceProvider(options.referencePath ?? fixtures.referencePath, detector),
      candidates,
      imageSearch,
    },
    SETTINGS,
    clock
  );

  return {
    service,
    provider,
    batchCache,
    artifacts,
    setFaces: (faces: Detection[]) => {
      photoFaces = faces;
    },
    advance: (ms: number) => {
      now += ms;
    },
  };
}

export type Harness = ReturnType<typeof createHarness>;
