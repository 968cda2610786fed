import * as fs from 'fs-extra';
import * as path from 'path';
import * as crypto from 'crypto';
import type { Candidate } from '../types/candidate';
import type { ArtifactRef } from '../types/transform';
import { logger } from '../utils/logger';

/**
 * Write-once byte store for transform output, addressed by name.
 */
export interface ArtifactStore {
  save(name: string, bytes: Buffer): Promise<ArtifactRef>;
  exists(name: string): Promise<boolean>;
  reference(name: string): ArtifactRef;
}

/**
 * Deterministic artifact name for a candidate: the same source item always
 * maps to the same file.
 */
export function artifactName(candidate: Pick<Candidate, 'sourceTag' | 'identityKey'>): string {
  const digest = crypto
    .createHash('sha256')
    .update(`${candidate.sourceTag}:${candidate.identityKey}`)
    .digest('hex');
  return `swapped-${digest.slice(0, 16)}.jpg`;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

export class FileArtifactStore implements ArtifactStore {
  constructor(
    private readonly directory: string,
    private readonly publicRoute: string
  ) {}

  reference(name: string): ArtifactRef {
    return { name, reference: `${this.publicRoute.replace(/\/+$/, '')}/${name}` };
  }

  pathFor(name: string): string {
    return path.join(this.directory, path.basename(name));
  }

  async exists(name: string): Promise<boolean> {
    return fs.pathExists(this.pathFor(name));
  }

  /**
   * Writes `bytes` unless the name is taken; an existing artifact is kept as is.
   */
  async save(name: string, bytes: Buffer): Promise<ArtifactRef> {
    await fs.ensureDir(this.directory);
    try {
      await fs.writeFile(this.pathFor(name), bytes, { flag: 'wx' });
      logger.debug(`Stored artifact ${name} (${bytes.length} bytes)`);
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
      logger.debug(`Artifact ${name} already exists, reusing it`);
    }
    return this.reference(name);
  }
}

export class MemoryArtifactStore implements ArtifactStore {
  readonly files = new Map<string, Buffer>();

  constructor(private readonly publicRoute: string = '/artifacts') {}

  reference(name: string): ArtifactRef {
    return { name, reference: `${this.publicRoute}/${name}` };
  }

  async exists(name: string): Promise<boolean> {
    return this.files.has(name);
  }

  async save(name: string, bytes: Buffer): Promise<ArtifactRef> {
    if (!this.files.has(name)) {
      this.files.set(name, bytes);
    }
    return this.reference(name);
  }
}
