/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import path from 'node:path';

import * as env from './lib/env.js';

//
// HTTP server
//

// HTTP server port
export const PORT = env.intVarOrDefault('PORT', 4000);

// Honor X-Forwarded-* headers from a fronting proxy when computing the
// request host and protocol
export const TRUST_PROXY = env.boolVarOrDefault('TRUST_PROXY', false);

// Prefix for the gateway's own health and metrics endpoints. Requests under
// it never reach the rule table.
export const ADMIN_PATH_PREFIX = env
  .varOrDefault('ADMIN_PATH_PREFIX', '/__gateway')
  .replace(/\/+$/, '');

// Add an X-Gateway-Location header listing the locations a request visited
export const EXPOSE_ROUTING_HEADERS = env.boolVarOrDefault(
  'EXPOSE_ROUTING_HEADERS',
  false,
);

//
// Rule table
//

// JSON file holding the ordered location rules
export const RULE_TABLE_PATH = env.varOrDefault(
  'RULE_TABLE_PATH',
  'config/locations.json',
);

//
// Static files and cache
//

// Filesystem directory static files and cached artifacts are served from
export const DOCUMENT_ROOT = path.resolve(
  env.varOrDefault('DOCUMENT_ROOT', 'data/www'),
);

// Cache directory, as a URI relative to DOCUMENT_ROOT. Artifacts are
// written below it by an external process as <host><path>[index document].
export const CACHE_ROOT = env.varOrDefault(
  'CACHE_ROOT',
  '/typo3temp/tx_ncstaticfilecache',
);

// Artifact name used for directory-like paths (ending in '/')
export const INDEX_DOCUMENT = env.varOrDefault('INDEX_DOCUMENT', 'index.html');

//
// Backend
//

// Application backend that dynamic requests are forwarded to
export const BACKEND_URL = env.varOrDefault(
  'BACKEND_URL',
  'http://localhost:8080',
);

try {
  new URL(BACKEND_URL);
} catch (error) {
  throw new Error(`Invalid BACKEND_URL: ${BACKEND_URL}`);
}

// Time allowed for the backend to answer with response headers
export const BACKEND_TIMEOUT_MS = env.intVarOrDefault(
  'BACKEND_TIMEOUT_MS',
  30_000,
);
