import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { FileArtifactStore, MemoryArtifactStore, artifactName } from '../src/storage/artifactStore';

vi.mock('../src/utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  }
}));

describe('artifactName', () => {
  it('should be stable per source item', () => {
    const name = artifactName({ sourceTag: 'pics', identityKey: 't3_abc' });

    expect(name).toMatch(/^swapped-[0-9a-f]{16}\.jpg$/);
    expect(artifactName({ sourceTag: 'pics', identityKey: 't3_abc' })).toBe(name);
    expect(artifactName({ sourceTag: 'aww', identityKey: 't3_abc' })).not.toBe(name);
  });
});

describe('FileArtifactStore', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = path.join(process.cwd(), 'tests', 'tmp', `artifacts-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  });

  afterEach(async () => {
    if (await fs.pathExists(tempDir)) {
      await fs.remove(tempDir);
    }
  });

  it('should create the directory and write the artifact', async () => {
    const store = new FileArtifactStore(tempDir, '/artifacts/');

    const ref = await store.save('swapped-1.jpg', Buffer.from('first'));

    expect(ref).toEqual({ name: 'swapped-1.jpg', reference: '/artifacts/swapped-1.jpg' });
    expect(await fs.readFile(path.join(tempDir, 'swapped-1.jpg'), 'utf8')).toBe('first');
    expect(await store.exists('swapped-1.jpg')).toBe(true);
  });

  it('should keep the first write for a name', async () => {
    const store = new FileArtifactStore(tempDir, '/artifacts');

    await store.save('swapped-1.jpg', Buffer.from('first'));
    await store.save('swapped-1.jpg', Buffer.from('second'));

    expect(await fs.readFile(path.join(tempDir, 'swapped-1.jpg'), 'utf8')).toBe('first');
  });

  it('should keep names inside the directory', () => {
    const store = new FileArtifactStore(tempDir, '/artifacts');

    expect(store.pathFor('../../etc/passwd')).toBe(path.join(tempDir, 'passwd'));
  });
});

describe('MemoryArtifactStore', () => {
  it('should keep the first write for a name', async () => {
    const store = new MemoryArtifactStore();

    await store.save('a.jpg', Buffer.from('first'));
    const ref = await store.save('a.jpg', Buffer.from('second'));

    expect(ref.reference).toBe('/artifacts/a.jpg');
    expect(store.files.get('a.jpg')?.toString()).toBe('first');
  });
});
