import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios from 'axios';
import { RedditClient } from '../src/trends/redditClient';
import { okResponse } from './helpers/http';

vi.mock('axios');
vi.mock('../src/utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  }
}));

function listing(posts: unknown[]) {
  return okResponse({ kind: 'Listing', data: { children: posts.map(data => ({ kind: 't3', data })) } });
}

describe('RedditClient', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe('public endpoints', () => {
    const client = new RedditClient({ userAgent: 'trendswap-test/1.0', timeoutMs: 5000 });

    it('should fetch hot posts and map them to raw items', async () => {
      vi.mocked(axios.get).mockResolvedValueOnce(listing([
        { name: 't3_a', title: 'Sunset', url: 'https://i.redd.it/a.jpg', score: 120, over_18: true },
        { name: 't3_b', title: 'Broken', url: 'https://i.redd.it/b.jpg', score: 'many' },
        { name: 't3_c', title: 'Puppy', url: 'https://i.redd.it/c.jpg', score: 45 },
      ]));

      const items = await client.hot('pics', 25);

      expect(items).toEqual([
        { identityKey: 't3_a', title: 'Sunset', url: 'https://i.redd.it/a.jpg', score: 120, flagged: true },
        { identityKey: 't3_c', title: 'Puppy', url: 'https://i.redd.it/c.jpg', score: 45, flagged: false },
      ]);
      expect(axios.get).toHaveBeenCalledWith('https://www.reddit.com/r/pics/hot.json', expect.objectContaining({
        params: { limit: 25, raw_json: 1 },
        headers: { 'User-Agent': 'trendswap-test/1.0' },
        timeout: 5000,
      }));
      expect(client.usesOAuth).toBe(false);
    });

    it('should search within a group', async () => {
      vi.mocked(axios.get).mockResolvedValueOnce(listing([]));

      await client.search('aww', 'golden retriever', 5);

      expect(axios.get).toHaveBeenCalledWith('https://www.reddit.com/r/aww/search.json', expect.objectContaining({
        params: { q: 'golden retriever', restrict_sr: 1, sort: 'relevance', limit: 5, raw_json: 1 },
      }));
    });

    it('should reject a response that is not a listing', async () => {
      vi.mocked(axios.get).mockResolvedValueOnce(okResponse({ error: 403, message: 'Forbidden' }));

      await expect(client.hot('pics', 25)).rejects.toMatchObject({ code: 'SOURCE_UNAVAILABLE' });
    });

    it('should propagate request failures', async () => {
      vi.mocked(axios.get).mockRejectedValueOnce(new Error('Request failed with status code 429'));

      await expect(client.hot('pics', 25)).rejects.toThrow('Request failed with status code 429');
    });
  });

  describe('app-only OAuth', () => {
    let now: number;
    let client: RedditClient;

    beforeEach(() => {
      now = 1_000_000;
      client = new RedditClient({
        userAgent: 'trendswap-test/1.0',
        timeoutMs: 5000,
        clientId: 'test-client',
        clientSecret: 'test-secret',
        now: () => now,
      });
      vi.mocked(axios.post).mockResolvedValue(okResponse({ access_token: 'test-token', token_type: 'bearer', expires_in: 3600 }));
      vi.mocked(axios.get).mockResolvedValue(listing([]));
    });

    it('should call the OAuth host with a bearer token', async () => {
      await client.hot('pics', 10);

      expect(client.usesOAuth).toBe(true);
      expect(axios.post).toHaveBeenCalledWith(
        'https://www.reddit.com/api/v1/access_token',
        'grant_type=client_credentials',
        expect.objectContaining({ auth: { username: 'test-client', password: 'test-secret' } })
      );
      expect(axios.get).toHaveBeenCalledWith('https://oauth.reddit.com/r/pics/hot', expect.objectContaining({
        headers: { 'User-Agent': 'trendswap-test/1.0', Authorization: 'bearer test-token' },
      }));
    });

    it('should share one token request between concurrent calls', async () => {
      await Promise.all([client.hot('pics', 10), client.hot('aww', 10), client.hot('funny', 10)]);

      expect(axios.post).toHaveBeenCalledTimes(1);
      expect(axios.get).toHaveBeenCalledTimes(3);
    });

    it('should renew the token a minute before it expires', async () => {
      await client.hot('pics', 10);

      now += 3_539_999;
      await client.hot('pics', 10);
      expect(axios.post).toHaveBeenCalledTimes(1);

      now += 1;
      await client.hot('pics', 10);
      expect(axios.post).toHaveBeenCalledTimes(2);
    });
  });
});
