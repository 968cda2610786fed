import * as path from 'path';

const STATIC_EXTENSIONS = new Set(['jpg', 'jpeg', 'png', 'webp', 'bmp']);
const MOTION_EXTENSIONS = new Set(['gif', 'gifv', 'mp4', 'webm']);

function parseHttpUrl(url: string): URL | null {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * True when the URL points at a still raster image: a known image extension,
 * or a known image host serving something that is not animated.
 */
export function isStaticImageUrl(url: string, imageHosts: readonly string[]): boolean {
  const parsed = parseHttpUrl(url);
  if (!parsed) return false;

  const extension = path.posix.extname(parsed.pathname).slice(1).toLowerCase();
  if (STATIC_EXTENSIONS.has(extension)) return true;
  if (MOTION_EXTENSIONS.has(extension)) return false;

  const host = parsed.hostname.toLowerCase();
  return imageHosts.some(imageHost => imageHost.toLowerCase() === host);
}

export function isHttpUrl(value: string): boolean {
  return parseHttpUrl(value.trim()) !== null;
}
