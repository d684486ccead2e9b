/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { LocationDefinition } from '../src/routing/rule-table.js';
import {
  EntryKind,
  ExistenceChecker,
  GatewayRequest,
} from '../src/routing/types.js';

export const CACHE_ROOT = '/typo3temp/tx_ncstaticfilecache';

/**
 * A page cache setup: pages are served from the cache directory unless a
 * bypass guard trips, in which case @nocache tries the plain files and then
 * the application's front controller.
 */
export function pageCacheLocations(): LocationDefinition[] {
  return [
    {
      matchType: 'prefix',
      pattern: '/',
      expires: 3600,
      guards: [
        { kind: 'query-string', fallback: 'nocache' },
        { kind: 'method', allowed: ['GET', 'HEAD'], fallback: 'nocache' },
        {
          kind: 'cookie',
          pattern: '^(?:be_typo_user|fe_typo_user)$',
          fallback: 'nocache',
        },
        {
          kind: 'header',
          name: 'Pragma',
          value: 'no-cache',
          fallback: 'nocache',
        },
      ],
      tryFiles: ['$cache_file', '@nocache'],
    },
    {
      name: 'nocache',
      matchType: 'named',
      tryFiles: ['$uri', '$uri/', '/index.php$is_args$args'],
    },
    {
      matchType: 'exact',
      pattern: '/index.html',
      redirect: { to: 'https://$host/', status: 301 },
    },
    {
      matchType: 'prefix-stop',
      pattern: '/assets/',
      expires: 'max',
      tryFiles: ['$uri', '=404'],
    },
    {
      matchType: 'regex',
      pattern: '/\\.',
      deny: true,
    },
    {
      matchType: 'regex-ci',
      pattern: '\\.(css|js|png)$',
      expires: 'max',
      headers: { 'X-Asset': 'static' },
      tryFiles: ['/static$uri', '=404'],
    },
  ];
}

export function gatewayRequest(
  overrides: Partial<GatewayRequest> = {},
): GatewayRequest {
  return {
    host: 'example.com',
    path: '/news',
    queryString: '',
    method: 'GET',
    headers: {},
    cookies: {},
    ...overrides,
  };
}

/**
 * In-memory existence checker rooted at /srv/www.
 */
export class MemoryExistenceChecker implements ExistenceChecker {
  readonly root = '/srv/www';
  readonly probed: string[] = [];
  private entries = new Map<string, EntryKind>();

  constructor(files: string[] = [], directories: string[] = []) {
    files.forEach((uri) => this.entries.set(`${this.root}${uri}`, 'file'));
    directories.forEach((uri) =>
      this.entries.set(`${this.root}${uri}`, 'directory'),
    );
  }

  resolvePath(uri: string): string | undefined {
    return uri.split('/').includes('..') ? undefined : `${this.root}${uri}`;
  }

  stat(filePath: string): EntryKind | undefined {
    this.probed.push(filePath);
    return this.entries.get(filePath);
  }
}
