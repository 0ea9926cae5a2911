/**
 * Structured form of a `Cache-Control` header value (RFC 9111 §5.2).
 *
 * Durations are delta-seconds. An absent duration is `undefined`, which is
 * distinct from an explicit `0` (e.g. `max-age=0`).
 */
export interface CacheControlHeader {
  /** `max-age=N` */
  maxAge?: number;
  /** `max-stale=N` */
  maxStale?: number;
  /** `min-fresh=N` */
  minFresh?: number;
  noCache: boolean;
  noStore: boolean;
  noTransform: boolean;
  onlyIfCached: boolean;
  mustRevalidate: boolean;
  mustUnderstand: boolean;
  private: boolean;
  proxyRevalidate: boolean;
  public: boolean;
  /** `s-maxage=N` */
  sMaxAge?: number;
}

export type DurationDirectiveField = 'maxAge' | 'maxStale' | 'minFresh' | 'sMaxAge';

export type FlagDirectiveField = Exclude<
  keyof CacheControlHeader,
  DurationDirectiveField
>;

export type CacheControlDirectiveDefinition =
  | {
      readonly name: string;
      readonly kind: 'flag';
      readonly field: FlagDirectiveField;
    }
  | {
      readonly name: string;
      readonly kind: 'duration';
      readonly field: DurationDirectiveField;
    };
