import {
  CacheControlParseError,
  InvalidDirectiveValueError,
  UnknownDirectiveError,
  type DeltaSecondsError,
} from '../errors/index.js';
import type { CacheControlHeader } from '../types/index.js';
import { parseDeltaSeconds } from './delta-seconds.js';
import {
  DURATION_DIRECTIVES,
  FLAG_DIRECTIVES,
  createEmptyHeader,
} from './directives.js';
import {
  resolveParseOptions,
  type LenientParseOptions,
  type ParseOptions,
  type ResolvedParseOptions,
} from './parse-options.js';

export type SafeParseResult =
  | { success: true; data: CacheControlHeader }
  | { success: false; error: CacheControlParseError };

// RFC 9110 OWS
const OPTIONAL_WHITESPACE = /[ \t]/g;

function rejectUnknown(directive: string, options: ResolvedParseOptions): void {
  if (!options.ignoreUnknownDirectives) {
    throw new UnknownDirectiveError(directive);
  }
  options.onSkip?.({ reason: 'unknown-directive', directive });
}

function rejectInvalid(
  directive: string,
  value: string,
  error: DeltaSecondsError,
  options: ResolvedParseOptions,
): void {
  if (!options.ignoreInvalidValues) {
    throw new InvalidDirectiveValueError(directive, value, error);
  }
  options.onSkip?.({ reason: 'invalid-value', directive, value, error });
}

function parseDirectives(
  header: string | null | undefined,
  options: ResolvedParseOptions,
): CacheControlHeader {
  const result = createEmptyHeader();
  const normalized = (header ?? '')
    .toLowerCase()
    .replace(OPTIONAL_WHITESPACE, '');
  if (!normalized) return result;

  for (const part of normalized.split(',')) {
    const eqIdx = part.indexOf('=');

    if (eqIdx === -1) {
      const field = FLAG_DIRECTIVES.get(part);
      if (field) {
        result[field] = true;
      } else {
        rejectUnknown(part, options);
      }
      continue;
    }

    // Only the first '=' separates; the value is checked before the name.
    const key = part.slice(0, eqIdx);
    const value = part.slice(eqIdx + 1);
    const parsed = parseDeltaSeconds(value);
    if (!parsed.success) {
      rejectInvalid(key, value, parsed.error, options);
      continue;
    }

    const field = DURATION_DIRECTIVES.get(key);
    if (field) {
      result[field] = parsed.seconds;
    } else {
      rejectUnknown(key, options);
    }
  }

  return result;
}

/**
 * Parse a Cache-Control header value into structured directives.
 *
 * Lenient: unknown directives and malformed values are dropped, so this
 * never throws on grammar. Repeated directives keep the last value.
 */
export function parseCacheControl(
  header: string | null | undefined,
  options: LenientParseOptions = {},
): CacheControlHeader {
  return parseDirectives(
    header,
    resolveParseOptions({
      ...options,
      ignoreUnknownDirectives: true,
      ignoreInvalidValues: true,
    }),
  );
}

/**
 * Parse a Cache-Control header value, throwing on the first unknown
 * directive or invalid value.
 *
 * Either check can be relaxed through `ignoreUnknownDirectives` and
 * `ignoreInvalidValues`; with both set this matches {@link parseCacheControl}.
 *
 * @throws {UnknownDirectiveError}
 * @throws {InvalidDirectiveValueError}
 */
export function parseCacheControlStrict(
  header: string | null | undefined,
  options: ParseOptions = {},
): CacheControlHeader {
  return parseDirectives(header, resolveParseOptions(options));
}

/**
 * Strict parse that reports grammar errors as a result instead of throwing.
 */
export function safeParseCacheControl(
  header: string | null | undefined,
  options: ParseOptions = {},
): SafeParseResult {
  const resolved = resolveParseOptions(options);
  try {
    return { success: true, data: parseDirectives(header, resolved) };
  } catch (error) {
    if (error instanceof CacheControlParseError) {
      return { success: false, error };
    }
    throw error;
  }
}
