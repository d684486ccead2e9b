/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { errorMessage } from '../lib/error.js';
import * as metrics from '../metrics.js';
import { expandTemplate, TemplateContext } from './template.js';
import {
  EntryKind,
  ExistenceChecker,
  ResolvedTarget,
  TryFiles,
} from './types.js';

// A literal '?' or $is_args starts the query part of a template
const QUERY_START_REGEX = /\?|\$is_args(?![A-Za-z0-9_])|\$\{is_args\}/;

/**
 * Splits a template, not its expansion, into path and query parts, so a
 * decoded '?' inside a variable value never starts a query.
 */
export function splitTemplate(template: string): {
  path: string;
  query: string;
} {
  const queryStart = QUERY_START_REGEX.exec(template);
  return queryStart === null
    ? { path: template, query: '' }
    : {
        path: template.slice(0, queryStart.index),
        query: template.slice(queryStart.index + queryStart[0].length),
      };
}

/**
 * Try-files resolution: probes file candidates in order and returns the
 * first one that exists. When none does, the terminal candidate is
 * returned without being probed.
 */
export class ExistenceProber {
  private log: winston.Logger;
  private checker: ExistenceChecker;
  private indexDocument: string;

  constructor({
    log,
    checker,
    indexDocument,
  }: {
    log: winston.Logger;
    checker: ExistenceChecker;
    indexDocument: string;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.checker = checker;
    this.indexDocument = indexDocument;
  }

  async resolve(
    tryFiles: TryFiles,
    context: TemplateContext,
  ): Promise<ResolvedTarget> {
    for (const candidate of tryFiles.candidates) {
      const expanded = expandTemplate(
        splitTemplate(candidate.template).path,
        context,
      );
      // A trailing slash probes a directory through its index document
      const uri = expanded.endsWith('/')
        ? `${expanded}${this.indexDocument}`
        : expanded;

      const filePath = await this.probe(uri);
      if (filePath !== undefined) {
        metrics.probeHitsCounter.inc();
        return { kind: 'static', uri, filePath };
      }
    }

    metrics.probeMissesCounter.inc();

    const terminal = tryFiles.terminal;
    switch (terminal.kind) {
      case 'backend': {
        const template = splitTemplate(terminal.template);
        const { request } = context;
        return {
          kind: 'backend',
          uri:
            request.queryString !== ''
              ? `${request.path}?${request.queryString}`
              : request.path,
          script: expandTemplate(template.path, context),
          queryString: expandTemplate(template.query, context),
        };
      }
      case 'location':
      case 'status':
        return terminal;
    }
  }

  private async probe(uri: string): Promise<string | undefined> {
    const filePath = this.checker.resolvePath(uri);
    if (filePath === undefined) {
      this.log.warn('Candidate escapes the document root', { uri });
      return undefined;
    }

    let kind: EntryKind | undefined;
    try {
      kind = await this.checker.stat(filePath);
    } catch (error) {
      // An unreadable candidate is a miss, not a request failure
      this.log.warn('Existence probe failed', {
        uri,
        filePath,
        message: errorMessage(error),
      });
      return undefined;
    }

    this.log.debug('Probed candidate', { uri, filePath, kind });
    return kind === 'file' ? filePath : undefined;
  }
}
