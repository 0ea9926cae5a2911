import { CacheControlSourceReadError } from '../errors/index.js';
import type { CacheControlHeader } from '../types/index.js';
import {
  parseCacheControl,
  parseCacheControlStrict,
} from './cache-control-parser.js';
import type { LenientParseOptions, ParseOptions } from './parse-options.js';

/**
 * Anything that yields the header text in chunks: a Node `Readable`, a web
 * `ReadableStream` or an async generator. Byte chunks are decoded as UTF-8.
 */
export type CacheControlSource = AsyncIterable<string | Uint8Array>;

/**
 * Drain a source into a single string.
 *
 * @throws {CacheControlSourceReadError} when the source fails mid-read
 */
export async function readCacheControlSource(
  source: CacheControlSource,
): Promise<string> {
  const decoder = new TextDecoder();
  let text = '';
  try {
    for await (const chunk of source) {
      text +=
        typeof chunk === 'string'
          ? chunk
          : decoder.decode(chunk, { stream: true });
    }
  } catch (error) {
    throw new CacheControlSourceReadError(error);
  }
  return text + decoder.decode();
}

export async function parseCacheControlFromStream(
  source: CacheControlSource,
  options: LenientParseOptions = {},
): Promise<CacheControlHeader> {
  return parseCacheControl(await readCacheControlSource(source), options);
}

/**
 * Read the whole source, then parse it strictly. Grammar errors reject
 * unwrapped, exactly as {@link parseCacheControlStrict} throws them.
 */
export async function parseCacheControlStrictFromStream(
  source: CacheControlSource,
  options: ParseOptions = {},
): Promise<CacheControlHeader> {
  return parseCacheControlStrict(await readCacheControlSource(source), options);
}
