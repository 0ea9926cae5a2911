export {
  parseCacheControl,
  parseCacheControlStrict,
  safeParseCacheControl,
  type SafeParseResult,
} from './cache-control-parser.js';
export { formatCacheControl } from './cache-control-formatter.js';
export {
  parseCacheControlFromStream,
  parseCacheControlStrictFromStream,
  readCacheControlSource,
  type CacheControlSource,
} from './cache-control-stream.js';
export {
  parseDeltaSeconds,
  formatDeltaSeconds,
  type DeltaSecondsResult,
} from './delta-seconds.js';
export {
  CACHE_CONTROL_DIRECTIVES,
  DURATION_DIRECTIVES,
  FLAG_DIRECTIVES,
  createEmptyHeader,
} from './directives.js';
export {
  ParseOptionsSchema,
  resolveParseOptions,
  type DirectiveSkipListener,
  type LenientParseOptions,
  type ParseOptions,
  type ResolvedParseOptions,
  type SkippedDirective,
} from './parse-options.js';
