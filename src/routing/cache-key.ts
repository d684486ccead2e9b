/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { CacheKey, GatewayRequest } from './types.js';

export interface CacheKeyOptions {
  indexDocument: string;
}

/**
 * Lower-cases the host and strips a port or a trailing dot, so that
 * 'Example.com:443' and 'example.com' share cached artifacts.
 */
export function normalizeHost(host: string): string {
  const lower = host.trim().toLowerCase();
  const withoutPort = lower.startsWith('[')
    ? lower.replace(/^(\[[^\]]*\])(:\d+)?$/, '$1')
    : lower.replace(/:\d+$/, '');
  return withoutPort.replace(/\.$/, '');
}

/**
 * Derives the cache-root relative artifact path for a request from its
 * host and path. The query string never participates.
 */
export function buildCacheKey(
  request: Pick<GatewayRequest, 'host' | 'path'>,
  { indexDocument }: CacheKeyOptions,
): CacheKey {
  const host = normalizeHost(request.host);
  const path = request.path.startsWith('/') ? request.path : `/${request.path}`;
  return {
    host,
    path: path.endsWith('/')
      ? `${host}${path}${indexDocument}`
      : `${host}${path}`,
  };
}
