import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CandidateSource, type CandidateSourceOptions } from '../src/trends/candidateSource';
import { isStaticImageUrl, isHttpUrl } from '../src/trends/imageFilter';
import { ContentSafetyFilter } from '../src/safety/contentSafetyFilter';
import type { TrendProvider } from '../src/trends/trendProvider';
import type { RawTrendItem } from '../src/types/candidate';

vi.mock('../src/utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  }
}));

type GroupResponse = RawTrendItem[] | Error | 'hang';

class FakeProvider implements TrendProvider {
  readonly name = 'fake';
  readonly hot = vi.fn(async (group: string, _limit: number, _signal?: AbortSignal) => this.respond(group));
  readonly search = vi.fn(async (group: string, _query: string, _limit: number, _signal?: AbortSignal) => this.respond(group));

  constructor(private readonly responses: Record<string, GroupResponse>) {}

  private respond(group: string): Promise<RawTrendItem[]> {
    const response = this.responses[group] ?? [];
    if (response === 'hang') return new Promise<RawTrendItem[]>(() => undefined);
    if (response instanceof Error) return Promise.reject(response);
    return Promise.resolve(response);
  }
}

function item(identityKey: string, score: number, overrides: Partial<RawTrendItem> = {}): RawTrendItem {
  return {
    identityKey,
    title: `Post ${identityKey}`,
    url: `https://i.example.com/${identityKey}.jpg`,
    score,
    flagged: false,
    ...overrides,
  };
}

const safety = new ContentSafetyFilter({ terms: ['nsfw'] });

describe('CandidateSource', () => {
  let now: number;
  let options: CandidateSourceOptions;

  beforeEach(() => {
    now = 1_000;
    options = {
      groupTimeoutMs: 50,
      maxCandidates: 50,
      imageHosts: ['i.redd.it'],
      cacheTtlMs: 1_000,
      now: () => now,
    };
  });

  describe('refine', () => {
    it('should keep the last-seen item for a duplicate identity key', () => {
      const source = new CandidateSource(new FakeProvider({}), safety, options);

      const candidates = source.refine([
        { group: 'pics', item: item('t3_1', 10, { title: 'first sighting' }) },
        { group: 'funny', item: item('t3_1', 50, { title: 'second sighting' }) },
        { group: 'funny', item: item('t3_2', 20) },
      ]);

      expect(candidates.map(c => c.identityKey)).toEqual(['t3_1', 't3_2']);
      expect(candidates[0]).toMatchObject({ label: 'second sighting', sourceTag: 'funny', popularityScore: 50 });
    });

    it('should drop animated, flagged and blocked items', () => {
      const source = new CandidateSource(new FakeProvider({}), safety, options);

      const candidates = source.refine([
        { group: 'pics', item: item('t3_gif', 90, { url: 'https://i.example.com/dance.gif' }) },
        { group: 'pics', item: item('t3_flagged', 80, { flagged: true }) },
        { group: 'pics', item: item('t3_blocked', 70, { title: 'nsfw content' }) },
        { group: 'pics', item: item('t3_host', 60, { url: 'https://i.redd.it/abc123' }) },
        { group: 'pics', item: item('t3_page', 50, { url: 'https://example.com/article' }) },
        { group: 'pics', item: item('t3_ok', 40) },
      ]);

      expect(candidates.map(c => c.identityKey)).toEqual(['t3_host', 't3_ok']);
    });

    it('should order by score and cap the list', () => {
      const source = new CandidateSource(new FakeProvider({}), safety, { ...options, maxCandidates: 2 });

      const candidates = source.refine([
        { group: 'pics', item: item('t3_low', 5) },
        { group: 'pics', item: item('t3_high', 500) },
        { group: 'pics', item: item('t3_mid', 50) },
      ]);

      expect(candidates.map(c => c.identityKey)).toEqual(['t3_high', 't3_mid']);
    });
  });

  describe('fetch', () => {
    it('should merge groups and skip a failing one', async () => {
      const provider = new FakeProvider({
        pics: [item('t3_a', 10)],
        broken: new Error('HTTP 503'),
        funny: [item('t3_b', 30)],
      });
      const source = new CandidateSource(provider, safety, options);

      const candidates = await source.fetch(['pics', 'broken', 'funny'], 25);

      expect(candidates.map(c => c.identityKey)).toEqual(['t3_b', 't3_a']);
      expect(provider.hot).toHaveBeenCalledTimes(3);
      expect(provider.hot).toHaveBeenCalledWith('pics', 25, expect.any(AbortSignal));
    });

    it('should not wait for a group past its timeout', async () => {
      const provider = new FakeProvider({
        slow: 'hang',
        pics: [item('t3_a', 10)],
      });
      const source = new CandidateSource(provider, safety, options);

      const candidates = await source.fetch(['slow', 'pics'], 25);

      expect(candidates.map(c => c.identityKey)).toEqual(['t3_a']);
    });

    it('should serve repeat fetches from cache until the TTL expires', async () => {
      const provider = new FakeProvider({ pics: [item('t3_a', 10)] });
      const source = new CandidateSource(provider, safety, options);

      await source.fetch(['pics'], 25);
      now = 1_500;
      await source.fetch(['pics'], 25);
      expect(provider.hot).toHaveBeenCalledTimes(1);

      now = 2_000;
      await source.fetch(['pics'], 25);
      expect(provider.hot).toHaveBeenCalledTimes(2);
    });

    it('should refetch after invalidate', async () => {
      const provider = new FakeProvider({ pics: [item('t3_a', 10)] });
      const source = new CandidateSource(provider, safety, options);

      await source.fetch(['pics'], 25);
      await source.invalidate(['pics']);
      await source.fetch(['pics'], 25);

      expect(provider.hot).toHaveBeenCalledTimes(2);
    });

    it('should cache each per-group limit separately', async () => {
      const provider = new FakeProvider({});
      provider.hot.mockImplementation(async (group: string, limit: number) =>
        Array.from({ length: limit }, (_, i) => item(`${group}_${i}`, i))
      );
      const source = new CandidateSource(provider, safety, options);

      expect(await source.fetch(['pics'], 2)).toHaveLength(2);
      expect(await source.fetch(['pics'], 15)).toHaveLength(15);
      expect(await source.fetch(['pics'], 2)).toHaveLength(2);

      expect(provider.hot).toHaveBeenCalledTimes(2);
      expect(provider.hot.mock.calls.map(call => call[1])).toEqual([2, 15]);
    });

    it('should invalidate every limit for a group list unless one is named', async () => {
      const provider = new FakeProvider({ pics: [item('t3_a', 10)] });
      const source = new CandidateSource(provider, safety, options);

      await source.fetch(['pics'], 2);
      await source.fetch(['pics'], 15);
      await source.invalidate(['pics'], 2);
      await source.fetch(['pics'], 2);
      await source.fetch(['pics'], 15);
      expect(provider.hot).toHaveBeenCalledTimes(3);

      await source.invalidate(['pics']);
      await source.fetch(['pics'], 2);
      await source.fetch(['pics'], 15);
      expect(provider.hot).toHaveBeenCalledTimes(5);
    });

    it('should not cache a fetch where every group failed', async () => {
      const provider = new FakeProvider({ pics: new Error('down'), funny: new Error('down') });
      const source = new CandidateSource(provider, safety, options);

      expect(await source.fetch(['pics', 'funny'], 25)).toEqual([]);
      expect(await source.fetch(['pics', 'funny'], 25)).toEqual([]);

      expect(provider.hot).toHaveBeenCalledTimes(4);
    });
  });

  describe('search', () => {
    it('should query every group and never cache', async () => {
      const provider = new FakeProvider({ pics: [item('t3_a', 10)], funny: [item('t3_b', 20)] });
      const source = new CandidateSource(provider, safety, options);

      const first = await source.search('golden retriever', ['pics', 'funny'], 10);
      await source.search('golden retriever', ['pics', 'funny'], 10);

      expect(first.map(c => c.identityKey)).toEqual(['t3_b', 't3_a']);
      expect(provider.search).toHaveBeenCalledTimes(4);
      expect(provider.search).toHaveBeenCalledWith('pics', 'golden retriever', 10, expect.any(AbortSignal));
      expect(provider.hot).not.toHaveBeenCalled();
    });
  });
});

describe('isStaticImageUrl', () => {
  const hosts = ['i.redd.it', 'i.imgur.com'];

  it.each([
    'https://i.example.com/photo.jpg',
    'https://i.example.com/photo.JPEG',
    'http://cdn.example.com/a/b/c.png?width=640',
    'https://i.example.com/photo.webp',
    'https://i.redd.it/abc123',
  ])('should accept %s', (url) => {
    expect(isStaticImageUrl(url, hosts)).toBe(true);
  });

  it.each([
    'https://i.imgur.com/clip.gifv',
    'https://i.redd.it/dance.gif',
    'https://v.redd.it/video.mp4',
    'https://example.com/article',
    'ftp://files.example.com/photo.jpg',
    'not a url',
  ])('should reject %s', (url) => {
    expect(isStaticImageUrl(url, hosts)).toBe(false);
  });
});

describe('isHttpUrl', () => {
  it('should accept http and https only', () => {
    expect(isHttpUrl(' https://example.com/a.jpg ')).toBe(true);
    expect(isHttpUrl('http://example.com')).toBe(true);
    expect(isHttpUrl('file:///etc/passwd')).toBe(false);
    expect(isHttpUrl('golden retriever')).toBe(false);
  });
});
