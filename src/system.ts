/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { HttpBackendClient } from './backend/http-backend-client.js';
import * as config from './config.js';
import log from './log.js';
import * as metrics from './metrics.js';
import { ExistenceProber } from './routing/existence-prober.js';
import { ResponseDirector } from './routing/response-director.js';
import { RuleTableLoader } from './routing/rule-table-loader.js';
import { FsArtifactStore } from './store/fs-artifact-store.js';

process.on('uncaughtException', (error) => {
  metrics.uncaughtExceptionCounter.inc();
  log.error('Uncaught exception:', error);
});

// A malformed rule table stops startup here
export const ruleTable = new RuleTableLoader({ log }).loadRuleTable(
  config.RULE_TABLE_PATH,
);

export const artifactStore = new FsArtifactStore({
  log,
  documentRoot: config.DOCUMENT_ROOT,
});

export const existenceProber = new ExistenceProber({
  log,
  checker: artifactStore,
  indexDocument: config.INDEX_DOCUMENT,
});

export const responseDirector = new ResponseDirector({
  log,
  table: ruleTable,
  prober: existenceProber,
  documentRoot: config.DOCUMENT_ROOT,
  cacheRoot: config.CACHE_ROOT,
  indexDocument: config.INDEX_DOCUMENT,
});

export const backendClient = new HttpBackendClient({
  log,
  backendUrl: config.BACKEND_URL,
  requestTimeoutMs: config.BACKEND_TIMEOUT_MS,
});
