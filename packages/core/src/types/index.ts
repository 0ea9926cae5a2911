export type {
  CacheControlHeader,
  CacheControlDirectiveDefinition,
  DurationDirectiveField,
  FlagDirectiveField,
} from './cache-control.js';
