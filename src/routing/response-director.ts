/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import path from 'node:path';
import winston from 'winston';

import { DENY_STATUS } from '../constants.js';
import { expiresHeaders } from '../lib/cache-headers.js';
import { ConfigurationError, InvalidRequestHostError } from '../lib/error.js';
import * as metrics from '../metrics.js';
import { buildCacheKey } from './cache-key.js';
import { ExistenceProber } from './existence-prober.js';
import { evaluate } from './guard-evaluator.js';
import { match } from './matcher.js';
import { locationLabel, RuleTable } from './rule-table.js';
import { expandTemplate, TemplateContext } from './template.js';
import {
  GatewayDecision,
  GatewayRequest,
  Location,
  ResolvedTarget,
} from './types.js';

/**
 * Turns a request into exactly one decision: deny, redirect, serve a
 * static file or cached artifact, forward to the backend, or answer with a
 * fixed status.
 *
 * Dispatch states: Matched -> DENY | REDIRECT | guards -> (tripped:
 * Matched(fallback)) | probe -> STATIC | BACKEND | STATUS | Matched(@name).
 * Re-entering a location already visited in the same dispatch raises a
 * {@link ConfigurationError}.
 */
export class ResponseDirector {
  private log: winston.Logger;
  private table: RuleTable;
  private prober: ExistenceProber;
  private documentRoot: string;
  private cacheRoot: string;
  private indexDocument: string;
  private now: () => Date;

  constructor({
    log,
    table,
    prober,
    documentRoot,
    cacheRoot,
    indexDocument,
    now = () => new Date(),
  }: {
    log: winston.Logger;
    table: RuleTable;
    prober: ExistenceProber;
    documentRoot: string;
    cacheRoot: string;
    indexDocument: string;
    now?: () => Date;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.table = table;
    this.prober = prober;
    this.documentRoot = documentRoot.replace(/\/+$/, '');
    const trimmedCacheRoot = cacheRoot.replace(/^\/+|\/+$/g, '');
    this.cacheRoot = trimmedCacheRoot !== '' ? `/${trimmedCacheRoot}` : '';
    this.indexDocument = indexDocument;
    this.now = now;
  }

  async direct(request: GatewayRequest): Promise<GatewayDecision> {
    const matched = match(this.table, request.path);
    const cacheKey = buildCacheKey(request, {
      indexDocument: this.indexDocument,
    });

    const cacheFile = path.posix.normalize(
      `${this.cacheRoot}/${cacheKey.path}`,
    );
    if (!cacheFile.startsWith(`${this.cacheRoot}/`)) {
      throw new InvalidRequestHostError('Cache file escapes the cache root', {
        host: request.host,
        cacheFile,
      });
    }

    const decision = await this.dispatch(request, matched.location, {
      request,
      captures: matched.captures,
      cacheFile,
    });

    metrics.decisionsCounter.inc({ action: decision.action });
    this.log.debug('Dispatched request', {
      method: request.method,
      host: request.host,
      path: request.path,
      action: decision.action,
      trail: decision.trail,
    });

    return decision;
  }

  private async dispatch(
    request: GatewayRequest,
    initial: Location,
    initialContext: TemplateContext,
  ): Promise<GatewayDecision> {
    const visited = new Set<number>();
    const trail: string[] = [];
    let location = initial;
    let context = initialContext;

    for (;;) {
      if (visited.has(location.index)) {
        throw new ConfigurationError(
          `Fallback cycle while dispatching ${request.path}: ${[
            ...trail,
            locationLabel(location),
          ].join(' -> ')}`,
          { path: request.path, trail },
        );
      }
      visited.add(location.index);
      trail.push(locationLabel(location));

      if (location.deny) {
        return { action: 'deny', status: DENY_STATUS, trail };
      }

      if (location.redirect !== undefined) {
        return {
          action: 'redirect',
          status: location.redirect.status,
          location: expandTemplate(location.redirect.to, context),
          trail,
        };
      }

      const outcome = evaluate(location, request);
      if (outcome.kind === 'redirect-to') {
        metrics.guardTripsCounter.inc({ guard: outcome.guard });
        this.log.debug('Cache bypass guard tripped', {
          location: locationLabel(location),
          guard: outcome.guard,
          fallback: outcome.fallback,
        });
        location = this.table.byName(outcome.fallback);
        // Named locations have no pattern to capture from
        context = { ...context, captures: [] };
        continue;
      }

      const target = await this.prober.resolve(location.tryFiles, context);
      if (target.kind === 'location') {
        location = this.table.byName(target.name);
        context = { ...context, captures: [] };
        continue;
      }

      return this.decide(request, location, target, trail);
    }
  }

  private isCacheArtifact(uri: string): boolean {
    // Without a cache root no file is a cache artifact
    return this.cacheRoot !== '' && uri.startsWith(`${this.cacheRoot}/`);
  }

  private decide(
    request: GatewayRequest,
    location: Location,
    target: Exclude<ResolvedTarget, { kind: 'location' }>,
    trail: string[],
  ): GatewayDecision {
    switch (target.kind) {
      case 'static':
        return {
          action: 'static',
          uri: target.uri,
          filePath: target.filePath,
          cached: this.isCacheArtifact(target.uri),
          headers: {
            ...(location.expires !== undefined &&
              expiresHeaders(location.expires, this.now())),
            ...location.headers,
          },
          trail,
        };
      case 'backend':
        return {
          action: 'backend',
          uri: target.uri,
          script: target.script,
          queryString: target.queryString,
          params: {
            SCRIPT_NAME: target.script,
            SCRIPT_FILENAME: `${this.documentRoot}${target.script}`,
            DOCUMENT_ROOT: this.documentRoot,
            DOCUMENT_URI: target.script,
            REQUEST_URI: target.uri,
            QUERY_STRING: target.queryString,
            REQUEST_METHOD: request.method,
            SERVER_NAME: request.host,
          },
          trail,
        };
      case 'status':
        return { action: 'status', status: target.status, trail };
    }
  }
}
