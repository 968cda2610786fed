import axios from 'axios';

export interface ImageFetcher {
  fetch(url: string, signal?: AbortSignal): Promise<Buffer>;
}

// Some image hosts refuse requests that do not look like a browser
const BROWSER_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
  Accept: 'image/webp,image/apng,image/*,*/*;q=0.8',
};

export class HttpImageFetcher implements ImageFetcher {
  constructor(
    private readonly timeoutMs: number,
    private readonly maxBytes: number = 25 * 1024 * 1024
  ) {}

  async fetch(url: string, signal?: AbortSignal): Promise<Buffer> {
    const response = await axios.get<ArrayBuffer>(url, {
      responseType: 'arraybuffer',
      timeout: this.timeoutMs,
      maxContentLength: this.maxBytes,
      maxRedirects: 5,
      headers: BROWSER_HEADERS,
      signal,
    });
    return Buffer.from(response.data);
  }
}
