import type {
  CacheControlDirectiveDefinition,
  CacheControlHeader,
  DurationDirectiveField,
  FlagDirectiveField,
} from '../types/index.js';

/**
 * Every directive this package understands, in canonical output order.
 */
export const CACHE_CONTROL_DIRECTIVES = [
  { name: 'max-age', kind: 'duration', field: 'maxAge' },
  { name: 'max-stale', kind: 'duration', field: 'maxStale' },
  { name: 'min-fresh', kind: 'duration', field: 'minFresh' },
  { name: 'no-cache', kind: 'flag', field: 'noCache' },
  { name: 'no-store', kind: 'flag', field: 'noStore' },
  { name: 'no-transform', kind: 'flag', field: 'noTransform' },
  { name: 'only-if-cached', kind: 'flag', field: 'onlyIfCached' },
  { name: 'must-revalidate', kind: 'flag', field: 'mustRevalidate' },
  { name: 'must-understand', kind: 'flag', field: 'mustUnderstand' },
  { name: 'private', kind: 'flag', field: 'private' },
  { name: 'proxy-revalidate', kind: 'flag', field: 'proxyRevalidate' },
  { name: 'public', kind: 'flag', field: 'public' },
  { name: 's-maxage', kind: 'duration', field: 'sMaxAge' },
] as const satisfies ReadonlyArray<CacheControlDirectiveDefinition>;

const flagDirectives = new Map<string, FlagDirectiveField>();
const durationDirectives = new Map<string, DurationDirectiveField>();
for (const directive of CACHE_CONTROL_DIRECTIVES) {
  if (directive.kind === 'flag') {
    flagDirectives.set(directive.name, directive.field);
  } else {
    durationDirectives.set(directive.name, directive.field);
  }
}

/** Directives written bare, keyed by name. */
export const FLAG_DIRECTIVES: ReadonlyMap<string, FlagDirectiveField> =
  flagDirectives;

/** Directives carrying delta-seconds, keyed by name. */
export const DURATION_DIRECTIVES: ReadonlyMap<string, DurationDirectiveField> =
  durationDirectives;

/**
 * A header with every flag unset and every duration absent.
 */
export function createEmptyHeader(): CacheControlHeader {
  return {
    noCache: false,
    noStore: false,
    noTransform: false,
    onlyIfCached: false,
    mustRevalidate: false,
    mustUnderstand: false,
    private: false,
    proxyRevalidate: false,
    public: false,
  };
}
