/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fs from 'node:fs';
import winston from 'winston';

import { ConfigurationError, errorMessage } from '../lib/error.js';
import {
  GuardDefinition,
  LocationDefinition,
  RuleTable,
} from './rule-table.js';
import { MatchType } from './types.js';

export const RULE_TABLE_VERSION = '1.0';

const MATCH_TYPES: readonly MatchType[] = [
  'exact',
  'prefix',
  'prefix-stop',
  'regex',
  'regex-ci',
  'named',
];

const LOCATION_KEYS = new Set([
  'name',
  'matchType',
  'pattern',
  'deny',
  'redirect',
  'expires',
  'headers',
  'guards',
  'tryFiles',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMatchType(value: unknown): value is MatchType {
  return MATCH_TYPES.some((matchType) => matchType === value);
}

function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === 'string')
  );
}

function requireString(
  record: Record<string, unknown>,
  key: string,
  where: string,
): string {
  const value = record[key];
  if (typeof value !== 'string' || value === '') {
    throw new ConfigurationError(`${where} must have a string ${key}`);
  }
  return value;
}

function optionalString(
  record: Record<string, unknown>,
  key: string,
  where: string,
): string | undefined {
  return record[key] === undefined
    ? undefined
    : requireString(record, key, where);
}

/**
 * Parses and validates a rule file into an immutable {@link RuleTable}.
 * Any defect is a {@link ConfigurationError}; there is no partial table.
 */
export class RuleTableLoader {
  private log: winston.Logger;

  constructor({ log }: { log: winston.Logger }) {
    this.log = log.child({ class: 'RuleTableLoader' });
  }

  loadRuleTable(configPath: string): RuleTable {
    const log = this.log.child({ method: 'loadRuleTable' });

    let config: unknown;
    try {
      config = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      log.error('Failed to read rule table', {
        configPath,
        message: errorMessage(error),
      });
      throw new ConfigurationError(
        `Failed to read rule table ${configPath}: ${errorMessage(error)}`,
        { configPath },
      );
    }

    try {
      const table = this.parseRuleTable(config);
      log.info('Loaded rule table', {
        configPath,
        count: table.locations.length,
      });
      return table;
    } catch (error) {
      log.error('Invalid rule table', {
        configPath,
        message: errorMessage(error),
      });
      throw error;
    }
  }

  parseRuleTable(config: unknown): RuleTable {
    if (!isRecord(config)) {
      throw new ConfigurationError('Rule table must be an object');
    }

    if (config.version !== RULE_TABLE_VERSION) {
      throw new ConfigurationError(
        `Unsupported rule table version: ${String(config.version)}`,
      );
    }

    if (!Array.isArray(config.locations)) {
      throw new ConfigurationError('Rule table must contain a locations array');
    }

    return RuleTable.fromDefinitions(
      config.locations.map((location: unknown, index) =>
        this.parseLocation(location, index),
      ),
    );
  }

  private parseLocation(value: unknown, index: number): LocationDefinition {
    const where = `Location #${index}`;
    if (!isRecord(value)) {
      throw new ConfigurationError(`${where} must be an object`);
    }

    for (const key of Object.keys(value)) {
      if (!LOCATION_KEYS.has(key)) {
        throw new ConfigurationError(`${where} has unknown key "${key}"`);
      }
    }

    const matchType = value.matchType;
    if (!isMatchType(matchType)) {
      throw new ConfigurationError(
        `${where} has invalid matchType: ${String(matchType)}`,
      );
    }

    return {
      name: optionalString(value, 'name', where),
      matchType,
      pattern: optionalString(value, 'pattern', where),
      deny: this.parseDeny(value.deny, where),
      redirect: this.parseRedirect(value.redirect, where),
      expires: this.parseExpires(value.expires, where),
      headers: this.parseHeaders(value.headers, where),
      guards: this.parseGuards(value.guards, where),
      tryFiles: this.parseTryFiles(value.tryFiles, where),
    };
  }

  private parseDeny(deny: unknown, where: string): boolean | undefined {
    if (deny === undefined || typeof deny === 'boolean') {
      return deny;
    }
    throw new ConfigurationError(`${where} deny must be a boolean`);
  }

  private parseExpires(
    expires: unknown,
    where: string,
  ): LocationDefinition['expires'] {
    if (expires === undefined || expires === 'max') {
      return expires;
    }
    if (typeof expires !== 'number') {
      throw new ConfigurationError(
        `${where} expires must be a number of seconds or "max"`,
      );
    }
    return expires;
  }

  private parseHeaders(
    headers: unknown,
    where: string,
  ): Record<string, string> | undefined {
    if (headers === undefined) {
      return undefined;
    }
    if (!isRecord(headers)) {
      throw new ConfigurationError(`${where} headers must be an object`);
    }

    const result: Record<string, string> = {};
    for (const [name, header] of Object.entries(headers)) {
      if (typeof header !== 'string') {
        throw new ConfigurationError(
          `${where} header ${name} must be a string`,
        );
      }
      result[name] = header;
    }
    return result;
  }

  private parseTryFiles(
    tryFiles: unknown,
    where: string,
  ): string[] | undefined {
    if (tryFiles === undefined || isStringArray(tryFiles)) {
      return tryFiles;
    }
    throw new ConfigurationError(`${where} tryFiles must be a string array`);
  }

  private parseGuards(
    guards: unknown,
    where: string,
  ): GuardDefinition[] | undefined {
    if (guards === undefined) {
      return undefined;
    }
    if (!Array.isArray(guards)) {
      throw new ConfigurationError(`${where} guards must be an array`);
    }
    return guards.map((guard: unknown, index) =>
      this.parseGuard(guard, `${where} guard #${index}`),
    );
  }

  private parseRedirect(
    redirect: unknown,
    where: string,
  ): LocationDefinition['redirect'] {
    if (redirect === undefined || typeof redirect === 'string') {
      return redirect;
    }

    if (!isRecord(redirect)) {
      throw new ConfigurationError(
        `${where} redirect must be a string or an object`,
      );
    }

    const to = requireString(redirect, 'to', `${where} redirect`);
    const status = redirect.status;
    if (status === undefined || typeof status === 'number') {
      return { to, status };
    }
    throw new ConfigurationError(`${where} redirect status must be a number`);
  }

  private parseGuard(value: unknown, where: string): GuardDefinition {
    if (!isRecord(value)) {
      throw new ConfigurationError(`${where} must be an object`);
    }

    const fallback = requireString(value, 'fallback', where);

    switch (value.kind) {
      case 'query-string':
        return { kind: 'query-string', fallback };
      case 'cookie':
        return {
          kind: 'cookie',
          pattern: requireString(value, 'pattern', where),
          fallback,
        };
      case 'method':
        if (!isStringArray(value.allowed) || value.allowed.length === 0) {
          throw new ConfigurationError(
            `${where} must list the allowed methods`,
          );
        }
        return { kind: 'method', allowed: value.allowed, fallback };
      case 'header':
        return {
          kind: 'header',
          name: requireString(value, 'name', where),
          value: requireString(value, 'value', where),
          fallback,
        };
      default:
        throw new ConfigurationError(
          `${where} has unknown kind: ${String(value.kind)}`,
        );
    }
  }
}
