/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { ConfigurationError } from '../lib/error.js';
import { RuleTable } from './rule-table.js';
import { Location, MatchResult } from './types.js';

const NO_CAPTURES: readonly string[] = Object.freeze([]);

/**
 * Selects the single location that handles `path`.
 *
 * Precedence, highest first:
 * 1. an exact location equal to the path
 * 2. the longest prefix location when it is a 'prefix-stop'
 * 3. the first regex location, in declaration order, that matches
 * 4. the longest prefix location
 *
 * Prefixes of equal length resolve to the earlier declaration. A table
 * without a matching prefix violates the catch-all invariant and raises a
 * {@link ConfigurationError}.
 */
export function match(table: RuleTable, path: string): MatchResult {
  const exact = table.exact.get(path);
  if (exact !== undefined) {
    return { location: exact, captures: NO_CAPTURES };
  }

  let bestPrefix: Location | undefined;
  for (const location of table.prefixes) {
    if (
      path.startsWith(location.pattern) &&
      (bestPrefix === undefined ||
        location.pattern.length > bestPrefix.pattern.length)
    ) {
      bestPrefix = location;
    }
  }

  if (bestPrefix?.matchType === 'prefix-stop') {
    return { location: bestPrefix, captures: NO_CAPTURES };
  }

  for (const location of table.regexes) {
    const captures = location.regex?.exec(path);
    if (captures != null) {
      return {
        location,
        captures: Array.from(captures, (capture) => capture ?? ''),
      };
    }
  }

  if (bestPrefix === undefined) {
    throw new ConfigurationError(`No location matches path: ${path}`, {
      path,
    });
  }

  return { location: bestPrefix, captures: NO_CAPTURES };
}
