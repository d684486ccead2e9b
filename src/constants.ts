/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * HTTP header names set or consumed by the gateway.
 *
 * @remarks
 * - `X-Cache` - `HIT` when a cached artifact was served, `MISS` when the
 *   request was forwarded to the backend
 * - `X-Gateway-Location` - locations visited while dispatching, only sent
 *   when routing headers are exposed
 * - `X-Gateway-Param-*` - CGI-style parameters sent to the backend
 */
export const headerNames = {
  cache: 'X-Cache',
  gatewayLocation: 'X-Gateway-Location',
  gatewayParamPrefix: 'X-Gateway-Param-',
  forwardedFor: 'X-Forwarded-For',
  forwardedHost: 'X-Forwarded-Host',
  forwardedProto: 'X-Forwarded-Proto',
};

// Headers that describe a single connection and must not be forwarded
// (RFC 9110, section 7.6.1)
export const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);

// Far-future expiry for locations with expires: 'max'
export const EXPIRES_MAX_DATE = 'Thu, 31 Dec 2037 23:55:55 GMT';
export const EXPIRES_MAX_SECONDS = 315_360_000;

export const DENY_STATUS = 403;
export const DEFAULT_REDIRECT_STATUS = 301;
export const REDIRECT_STATUSES = [301, 302, 303, 307, 308] as const;
