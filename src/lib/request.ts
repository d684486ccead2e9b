/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { parse as parseCookieHeader } from 'cookie';
import { IncomingHttpHeaders } from 'node:http';
import { Request } from 'express';

import { normalizeHost } from '../routing/cache-key.js';
import { GatewayRequest } from '../routing/types.js';
import { InvalidRequestHostError, InvalidRequestPathError } from './error.js';

/**
 * Percent-decodes a request path, merges repeated slashes and resolves '.'
 * and '..' segments. A trailing slash is kept, since it marks a
 * directory-like path.
 */
export function normalizeRequestPath(rawPath: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(rawPath);
  } catch (error) {
    throw new InvalidRequestPathError('Malformed percent-encoding in path', {
      rawPath,
    });
  }

  if (decoded.includes('\0')) {
    throw new InvalidRequestPathError('NUL byte in path', { rawPath });
  }

  if (!decoded.startsWith('/')) {
    throw new InvalidRequestPathError('Path must start with "/"', {
      rawPath,
    });
  }

  const segments: string[] = [];
  const parts = decoded.split('/');
  for (const part of parts) {
    if (part === '' || part === '.') {
      continue;
    }
    if (part === '..') {
      if (segments.length === 0) {
        throw new InvalidRequestPathError('Path escapes the root', {
          rawPath,
        });
      }
      segments.pop();
      continue;
    }
    segments.push(part);
  }

  const last = parts[parts.length - 1];
  const directoryLike = last === '' || last === '.' || last === '..';
  if (segments.length === 0) {
    return '/';
  }
  return `/${segments.join('/')}${directoryLike ? '/' : ''}`;
}

export function parseCookies(
  header: string | undefined,
): Record<string, string> {
  if (header === undefined || header === '') {
    return {};
  }

  const cookies: Record<string, string> = {};
  for (const [name, value] of Object.entries(parseCookieHeader(header))) {
    if (value !== undefined) {
      cookies[name] = value;
    }
  }
  return cookies;
}

export function flattenHeaders(
  headers: IncomingHttpHeaders,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    result[name.toLowerCase()] = Array.isArray(value)
      ? value.join(', ')
      : value;
  }
  return result;
}

const HOST_LABEL = '[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9_])?';
const DNS_NAME_REGEX = new RegExp(`^${HOST_LABEL}(?:\\.${HOST_LABEL})*$`);
const IPV6_LITERAL_REGEX = /^\[[0-9a-f:.]+\]$/;

/**
 * Accepts a normalized host that is a DNS name, an IPv4 address or a
 * bracketed IPv6 literal. The host becomes part of the cache path, so path
 * separators and empty labels are never allowed.
 */
export function isValidHost(host: string): boolean {
  return (
    host.length <= 253 &&
    (DNS_NAME_REGEX.test(host) || IPV6_LITERAL_REGEX.test(host))
  );
}

export function normalizeRequestHost(rawHost: string): string {
  const host = normalizeHost(rawHost);
  // Requests without a Host header (HTTP/1.0) share the host-less key
  if (host !== '' && !isValidHost(host)) {
    throw new InvalidRequestHostError('Invalid Host header', { rawHost });
  }
  return host;
}

function rawQueryString(originalUrl: string): string {
  const queryIndex = originalUrl.indexOf('?');
  return queryIndex === -1 ? '' : originalUrl.slice(queryIndex + 1);
}

/**
 * Captures the parts of an HTTP request the routing rules look at. The
 * result is frozen; dispatch never changes it.
 */
export function toGatewayRequest(req: Request): GatewayRequest {
  const headers = flattenHeaders(req.headers);
  return Object.freeze({
    host: normalizeRequestHost(req.hostname ?? ''),
    path: normalizeRequestPath(req.path),
    queryString: rawQueryString(req.originalUrl),
    method: req.method.toUpperCase(),
    headers: Object.freeze(headers),
    cookies: Object.freeze(parseCookies(headers.cookie)),
  });
}
