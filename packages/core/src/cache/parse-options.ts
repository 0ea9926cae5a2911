import { z } from 'zod';
import type { DeltaSecondsError } from '../errors/index.js';

export type SkippedDirective =
  | {
      reason: 'unknown-directive';
      /** Lowercased directive name; empty for an empty list member. */
      directive: string;
    }
  | {
      reason: 'invalid-value';
      directive: string;
      value: string;
      error: DeltaSecondsError;
    };

export type DirectiveSkipListener = (event: SkippedDirective) => void;

export const ParseOptionsSchema = z
  .object({
    /** Skip unrecognized directive names instead of throwing. Default: false */
    ignoreUnknownDirectives: z.boolean().default(false),
    /** Skip directives whose value is not delta-seconds instead of throwing. Default: false */
    ignoreInvalidValues: z.boolean().default(false),
    /** Called for every directive dropped by one of the ignore policies. */
    onSkip: z
      .custom<DirectiveSkipListener>((value) => typeof value === 'function', {
        message: 'onSkip must be a function',
      })
      .optional(),
  })
  .strict();

export type ParseOptions = z.input<typeof ParseOptionsSchema>;
export type ResolvedParseOptions = z.output<typeof ParseOptionsSchema>;

/** Options accepted by the lenient entry points, which ignore everything. */
export type LenientParseOptions = Pick<ParseOptions, 'onSkip'>;

export function resolveParseOptions(
  options: ParseOptions = {},
): ResolvedParseOptions {
  return ParseOptionsSchema.parse(options);
}
