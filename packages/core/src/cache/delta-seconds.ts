import { DeltaSecondsError } from '../errors/index.js';

export type DeltaSecondsResult =
  | { success: true; seconds: number }
  | { success: false; error: DeltaSecondsError };

const DIGITS = /^[0-9]+$/;

/**
 * Convert directive value text to delta-seconds (RFC 9111 §1.2.2).
 *
 * Only a bare decimal integer is accepted: no sign, no fraction and no unit
 * suffix, so `"10s"` and `"-1"` both fail. Values beyond
 * `Number.MAX_SAFE_INTEGER` fail as out of range.
 */
export function parseDeltaSeconds(raw: string): DeltaSecondsResult {
  const text = raw.trim();
  if (!DIGITS.test(text)) {
    return {
      success: false,
      error: new DeltaSecondsError(`invalid delta-seconds "${raw}"`, raw),
    };
  }

  const seconds = Number(text);
  if (!Number.isSafeInteger(seconds)) {
    return {
      success: false,
      error: new DeltaSecondsError(`delta-seconds "${raw}" out of range`, raw),
    };
  }

  return { success: true, seconds };
}

/**
 * Render seconds as delta-seconds text, dropping any fractional part.
 */
export function formatDeltaSeconds(seconds: number): string {
  return String(Math.trunc(seconds));
}
