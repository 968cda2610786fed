import axios from 'axios';
import { z } from 'zod';
import type { ImageSearchProvider } from './imageSearch';

const DDG_API = 'https://api.duckduckgo.com/';
const DDG_ORIGIN = 'https://duckduckgo.com';

const InstantAnswerSchema = z.object({
  Image: z.string().optional(),
  RelatedTopics: z.array(z.unknown()).default([]),
});

const TopicSchema = z.object({
  Icon: z.object({ URL: z.string().optional() }).optional(),
});

function absolutize(url: string): string {
  return url.startsWith('/') ? `${DDG_ORIGIN}${url}` : url;
}

/**
 * DuckDuckGo instant answers: the main image plus related-topic icons.
 */
export class DuckDuckGoImageSearch implements ImageSearchProvider {
  readonly name = 'duckduckgo';

  constructor(private readonly options: { timeoutMs: number }) {}

  async search(query: string, limit: number, signal?: AbortSignal): Promise<string[]> {
    const response = await axios.get(DDG_API, {
      params: { q: query, format: 'json', no_html: 1 },
      timeout: this.options.timeoutMs,
      signal,
    });

    const answer = InstantAnswerSchema.parse(response.data);
    const urls: string[] = [];

    if (answer.Image) {
      urls.push(absolutize(answer.Image));
    }

    for (const raw of answer.RelatedTopics) {
      const topic = TopicSchema.safeParse(raw);
      const iconUrl = topic.success ? topic.data.Icon?.URL : undefined;
      if (iconUrl && !iconUrl.endsWith('.ico')) {
        urls.push(absolutize(iconUrl));
      }
    }

    return urls.slice(0, limit);
  }
}
