import { logger } from '../utils/logger';
import { describeError } from '../utils/errorHandler';

/**
 * Free-text image lookup. Results are image URLs in no guaranteed order.
 */
export interface ImageSearchProvider {
  readonly name: string;
  search(query: string, limit: number, signal?: AbortSignal): Promise<string[]>;
}

/**
 * Asks the primary provider first and tops the list up from the fallback when
 * the primary found fewer than `minResults` images. A failing provider counts
 * as having found nothing.
 */
export class FallbackImageSearch implements ImageSearchProvider {
  readonly name: string;

  constructor(
    private readonly primary: ImageSearchProvider,
    private readonly fallback: ImageSearchProvider,
    private readonly minResults: number
  ) {
    this.name = `${primary.name}+${fallback.name}`;
  }

  async search(query: string, limit: number, signal?: AbortSignal): Promise<string[]> {
    const urls = await this.safeSearch(this.primary, query, limit, signal);
    if (urls.length >= this.minResults) {
      return urls.slice(0, limit);
    }

    logger.info(`${this.primary.name} found ${urls.length} images for "${query}", asking ${this.fallback.name}`);
    const seen = new Set(urls);
    for (const url of await this.safeSearch(this.fallback, query, limit, signal)) {
      if (!seen.has(url)) {
        seen.add(url);
        urls.push(url);
      }
    }
    return urls.slice(0, limit);
  }

  private async safeSearch(
    provider: ImageSearchProvider,
    query: string,
    limit: number,
    signal?: AbortSignal
  ): Promise<string[]> {
    try {
      return await provider.search(query, limit, signal);
    } catch (error) {
      logger.warn(`Image search via ${provider.name} failed: ${describeError(error)}`);
      return [];
    }
  }
}
