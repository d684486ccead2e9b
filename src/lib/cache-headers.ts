/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { EXPIRES_MAX_DATE, EXPIRES_MAX_SECONDS } from '../constants.js';
import { Expires } from '../routing/types.js';

/**
 * Expires and Cache-Control headers for a location's expiry setting.
 * `'max'` maps to a fixed far-future date.
 */
export function expiresHeaders(
  expires: Expires,
  now: Date = new Date(),
): Record<string, string> {
  if (expires === 'max') {
    return {
      Expires: EXPIRES_MAX_DATE,
      'Cache-Control': `max-age=${EXPIRES_MAX_SECONDS}`,
    };
  }

  return {
    Expires: new Date(now.getTime() + expires * 1000).toUTCString(),
    'Cache-Control': `max-age=${expires}`,
  };
}
