export {
  CacheControlParseError,
  CacheControlSourceReadError,
  DeltaSecondsError,
  InvalidDirectiveValueError,
  UnknownDirectiveError,
} from './cache-control-error.js';
