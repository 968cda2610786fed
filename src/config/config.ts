import * as fs from 'fs-extra';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { PipelineError } from '../utils/errorHandler';

dotenv.config();

const ServerSchema = z.object({
  port: z.number().int().positive().default(5000),
  artifactRoute: z.string().default('/artifacts'),
});

const RedditSchema = z.object({
  clientId: z.string().optional(),
  clientSecret: z.string().optional(),
  userAgent: z.string().default('trendswap/1.0 (by trendswap)'),
  timeoutMs: z.number().int().positive().default(10000),
});

const TrendsSchema = z.object({
  groups: z.array(z.string().min(1)).min(1).default(['wholesomememes', 'memes', 'aww', 'funny']),
  searchGroups: z.array(z.string().min(1)).min(1).default(['memes', 'dankmemes', 'wholesomememes']),
  perGroupLimit: z.number().int().positive().default(15), // over-fetch: filtering and failed swaps cut the yield
  searchLimit: z.number().int().positive().default(10),
  maxCandidates: z.number().int().positive().default(20),
  groupTimeoutMs: z.number().int().positive().default(10000),
  cacheTtlMs: z.number().int().positive().default(2 * 60 * 60 * 1000),
  imageHosts: z.array(z.string()).default(['i.redd.it', 'i.imgur.com']),
});

const SafetySchema = z.object({
  blockListPath: z.string().default('config/blocked-terms.json'),
});

const FaceModelSchema = z.object({
  baseUrl: z.string().url().default('http://127.0.0.1:8100'),
  timeoutMs: z.number().int().positive().default(60000),
  swapMode: z.enum(['model', 'blend']).default('model'),
  referenceFacePath: z.string().default('assets/reference_face.jpg'),
  blendOpacity: z.number().min(0).max(1).default(0.7),
});

const QualityGateSchema = z.object({
  minAreaRatio: z.number().min(0).max(1).default(0.08),
  minConfidence: z.number().min(0).max(1).default(0.6),
  maxAbsYaw: z.number().positive().default(45),
  maxAbsPitch: z.number().positive().default(35),
  minWidth: z.number().int().nonnegative().default(100),
  maxWidth: z.number().int().positive().default(2000),
  minAspectRatio: z.number().positive().default(0.6),
  maxAspectRatio: z.number().positive().default(1.4),
});

const TransformSchema = z.object({
  downloadTimeoutMs: z.number().int().positive().default(15000),
  detectionTiers: z.array(z.number().int().positive()).default([1920, 800]),
  jpegQuality: z.number().int().min(1).max(100).default(85),
  gate: QualityGateSchema.default({}),
});

const BatchSchema = z.object({
  targetSuccesses: z.number().int().positive().default(2),
  maxAttempts: z.number().int().positive().default(20),
  poolSize: z.number().int().positive().default(2),
  shuffle: z.boolean().default(true),
});

const CacheSchema = z.object({
  store: z.enum(['file', 'memory']).default('file'),
  filePath: z.string().default('state/batch-cache.json'),
  ttlMs: z.number().int().positive().default(24 * 60 * 60 * 1000),
  whileRegenerating: z.enum(['wait', 'serve-stale']).default('serve-stale'),
  waitTimeoutMs: z.number().int().positive().default(120000),
  warmIntervalMs: z.number().int().nonnegative().default(15 * 60 * 1000), // 0 disables the warmer
});

const SearchSchema = z.object({
  imageLimit: z.number().int().positive().default(10),
  minResults: z.number().int().nonnegative().default(5),
  timeoutMs: z.number().int().positive().default(10000),
  userAgent: z.string().default('trendswap/1.0 (image lookup)'),
});

const StorageSchema = z.object({
  artifactDir: z.string().default('static/artifacts'),
});

export const ConfigSchema = z.object({
  server: ServerSchema.default({}),
  reddit: RedditSchema.default({}),
  trends: TrendsSchema.default({}),
  safety: SafetySchema.default({}),
  faceModel: FaceModelSchema.default({}),
  transform: TransformSchema.default({}),
  batch: BatchSchema.default({}),
  cache: CacheSchema.default({}),
  search: SearchSchema.default({}),
  storage: StorageSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type QualityGateConfig = z.infer<typeof QualityGateSchema>;

// Environment variables that are optional (resolve to the schema default if missing)
const OPTIONAL_ENV_VARS = new Set([
  'REDDIT_CLIENT_ID',
  'REDDIT_CLIENT_SECRET',
  'REDDIT_USER_AGENT',
  'FACE_MODEL_URL',
  'REFERENCE_FACE_PATH',
]);

function resolveEnvValue(value: string): string | undefined {
  if (!value.startsWith('env:')) {
    return value;
  }
  const envKey = value.substring(4);
  const envValue = process.env[envKey];
  if (envValue === undefined || envValue === '') {
    if (!OPTIONAL_ENV_VARS.has(envKey)) {
      throw new PipelineError(`Environment variable ${envKey} is not set`, 'CONFIG_INVALID');
    }
    return undefined;
  }
  return envValue;
}

function resolveEnvObject(value: unknown): unknown {
  if (typeof value === 'string') {
    return resolveEnvValue(value);
  }
  if (Array.isArray(value)) {
    return value.map(item => resolveEnvObject(item));
  }
  if (value && typeof value === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      resolved[key] = resolveEnvObject(entry);
    }
    return resolved;
  }
  return value;
}

/**
 * Loads config/config.json (or the example file), resolves `env:` references
 * and fills defaults. Missing files yield the defaults.
 */
export function loadConfig(configDir: string = path.join(process.cwd(), 'config')): Config {
  const configPath = path.join(configDir, 'config.json');
  const examplePath = path.join(configDir, 'config.example.json');

  let configData: unknown = {};

  if (fs.existsSync(configPath)) {
    configData = fs.readJsonSync(configPath);
  } else if (fs.existsSync(examplePath)) {
    configData = fs.readJsonSync(examplePath);
    console.warn(`Using example config file. Please create config/config.json for production.`);
  } else {
    console.warn(`No configuration file found in ${configDir}; using defaults.`);
  }

  const resolved = resolveEnvObject(configData);
  const parsed = ConfigSchema.safeParse(resolved);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new PipelineError(`Invalid configuration: ${issues}`, 'CONFIG_INVALID');
  }

  const result = parsed.data;

  // PORT wins over the file so hosting platforms can assign one
  const envPort = process.env.PORT ? parseInt(process.env.PORT, 10) : NaN;
  if (Number.isInteger(envPort) && envPort > 0) {
    result.server.port = envPort;
  }

  return result;
}

export const config = loadConfig();
