import axios from 'axios';
import { z } from 'zod';
import type { ImageSearchProvider } from './imageSearch';
import { logger } from '../utils/logger';

const WIKI_API = 'https://en.wikipedia.org/w/api.php';

const PHOTO_EXTENSIONS = ['.jpg', '.jpeg', '.png'];
// File titles with these words are almost never portraits
const SKIP_WORDS = ['icon', 'logo', 'signature', 'flag', 'map', 'chart', 'diagram'];

const SearchResponseSchema = z.object({
  query: z.object({
    search: z.array(z.object({ title: z.string() })).default([]),
  }).default({}),
});

const PageImagesSchema = z.object({
  query: z.object({
    pages: z.record(z.object({
      images: z.array(z.object({ title: z.string() })).default([]),
    })).default({}),
  }).default({}),
});

const ImageInfoSchema = z.object({
  query: z.object({
    pages: z.record(z.object({
      imageinfo: z.array(z.object({ url: z.string().optional() })).default([]),
    })).default({}),
  }).default({}),
});

export function isPortraitCandidate(fileTitle: string): boolean {
  const lower = fileTitle.toLowerCase();
  return PHOTO_EXTENSIONS.some(ext => lower.includes(ext)) && !SKIP_WORDS.some(word => lower.includes(word));
}

/**
 * Images from the best-matching Wikipedia article: search, list the article's
 * files, keep likely photos, resolve each file to its URL.
 */
export class WikimediaImageSearch implements ImageSearchProvider {
  readonly name = 'wikimedia';

  constructor(private readonly options: { userAgent: string; timeoutMs: number }) {}

  async search(query: string, limit: number, signal?: AbortSignal): Promise<string[]> {
    const found = SearchResponseSchema.parse(await this.query({
      list: 'search',
      srsearch: query,
      srlimit: 1,
    }, signal));

    const page = found.query.search[0];
    if (!page) {
      logger.info(`No Wikipedia page found for "${query}"`);
      return [];
    }

    const images = PageImagesSchema.parse(await this.query({
      titles: page.title,
      prop: 'images',
      imlimit: 50,
    }, signal));

    const fileTitles = Object.values(images.query.pages)
      .slice(0, 1)
      .flatMap(entry => entry.images.map(image => image.title))
      .filter(isPortraitCandidate);

    if (fileTitles.length === 0) {
      logger.info(`No suitable images on "${page.title}"`);
      return [];
    }

    const urls: string[] = [];
    for (const fileTitle of fileTitles) {
      if (urls.length >= limit) break;
      const info = ImageInfoSchema.parse(await this.query({
        titles: fileTitle,
        prop: 'imageinfo',
        iiprop: 'url',
      }, signal));
      const url = Object.values(info.query.pages)[0]?.imageinfo[0]?.url;
      if (url) {
        urls.push(url);
      }
    }
    return urls;
  }

  private async query(params: Record<string, string | number>, signal?: AbortSignal): Promise<unknown> {
    const response = await axios.get(WIKI_API, {
      params: { action: 'query', format: 'json', ...params },
      headers: { 'User-Agent': this.options.userAgent },
      timeout: this.options.timeoutMs,
      signal,
    });
    return response.data;
  }
}
