import type { CacheControlHeader } from '../types/index.js';
import { formatDeltaSeconds } from './delta-seconds.js';
import { CACHE_CONTROL_DIRECTIVES } from './directives.js';

/**
 * Serialize directives back into a Cache-Control header value.
 *
 * Output order is fixed by {@link CACHE_CONTROL_DIRECTIVES}, names are
 * lowercase and members are joined with `", "`, so the result is canonical
 * rather than a copy of whatever text was parsed. Returns `""` when no
 * directive is set.
 */
export function formatCacheControl(header: CacheControlHeader): string {
  const parts: Array<string> = [];

  for (const directive of CACHE_CONTROL_DIRECTIVES) {
    if (directive.kind === 'flag') {
      if (header[directive.field]) parts.push(directive.name);
      continue;
    }

    const seconds = header[directive.field];
    if (seconds !== undefined) {
      parts.push(`${directive.name}=${formatDeltaSeconds(seconds)}`);
    }
  }

  return parts.join(', ');
}
