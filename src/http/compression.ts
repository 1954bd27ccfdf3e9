import { gzipSync } from 'zlib';

/**
 * Body of a response, gzipped or as is.
 */
export type EncodedBody =
  | { encoding: 'gzip'; data: Buffer }
  | { encoding: 'identity'; data: string };

export const DEFAULT_COMPRESSION_THRESHOLD = 1024;

/**
 * Gzip `text` when it is larger than `threshold` bytes.
 */
export function compressIfNeeded(text: string, threshold: number = DEFAULT_COMPRESSION_THRESHOLD): EncodedBody {
  if (Buffer.byteLength(text) <= threshold) {
    return { encoding: 'identity', data: text };
  }
  return { encoding: 'gzip', data: gzipSync(text) };
}

/**
 * Whether an Accept-Encoding header allows gzip (`gzip` or `*`, with q > 0).
 */
export function acceptsGzip(acceptEncoding?: string): boolean {
  if (!acceptEncoding) {
    return false;
  }

  for (const part of acceptEncoding.split(',')) {
    const [coding, ...params] = part.trim().toLowerCase().split(';');
    if (coding.trim() !== 'gzip' && coding.trim() !== '*') {
      continue;
    }
    const q = params.map((p) => p.trim()).find((p) => p.startsWith('q='));
    if (q === undefined || Number(q.slice(2)) > 0) {
      return true;
    }
  }
  return false;
}
