/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { ConfigurationError } from '../lib/error.js';
import { GatewayRequest } from './types.js';

export interface TemplateContext {
  request: GatewayRequest;
  captures: readonly string[];
  /** Document-root relative URI of the request's cache artifact. */
  cacheFile: string;
}

type VariableResolver = (context: TemplateContext) => string;

const variables = new Map<string, VariableResolver>([
  ['uri', ({ request }) => request.path],
  [
    'request_uri',
    ({ request }) =>
      request.queryString !== ''
        ? `${request.path}?${request.queryString}`
        : request.path,
  ],
  ['args', ({ request }) => request.queryString],
  ['query_string', ({ request }) => request.queryString],
  ['is_args', ({ request }) => (request.queryString !== '' ? '?' : '')],
  ['host', ({ request }) => request.host],
  ['request_method', ({ request }) => request.method],
  ['cache_file', ({ cacheFile }) => cacheFile],
]);

// $name, ${name}, $1..$9 and ${1}..${9}
const VARIABLE_REGEX =
  /\$(?:\{([A-Za-z_][A-Za-z0-9_]*|[1-9])\}|([1-9])|([A-Za-z_][A-Za-z0-9_]*))/g;

function variableNames(template: string): string[] {
  return Array.from(
    template.matchAll(VARIABLE_REGEX),
    (match) => match[1] ?? match[2] ?? match[3],
  );
}

function isCaptureReference(name: string): boolean {
  return /^[1-9]$/.test(name);
}

/**
 * Rejects templates that reference unknown variables.
 */
export function validateTemplate(template: string): void {
  for (const name of variableNames(template)) {
    if (!isCaptureReference(name) && !variables.has(name)) {
      throw new ConfigurationError(
        `Unknown variable "$${name}" in template: ${template}`,
        { template, variable: name },
      );
    }
  }
}

export function expandTemplate(
  template: string,
  context: TemplateContext,
): string {
  return template.replace(
    VARIABLE_REGEX,
    (_match, braced?: string, capture?: string, bare?: string) => {
      const name = braced ?? capture ?? bare ?? '';
      if (isCaptureReference(name)) {
        return context.captures[Number(name)] ?? '';
      }

      const resolve = variables.get(name);
      if (resolve === undefined) {
        throw new ConfigurationError(`Unknown variable "$${name}"`, {
          template,
          variable: name,
        });
      }
      return resolve(context);
    },
  );
}
