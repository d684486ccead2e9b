/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { DEFAULT_REDIRECT_STATUS, REDIRECT_STATUSES } from '../constants.js';
import { ConfigurationError, errorMessage } from '../lib/error.js';
import { validateTemplate } from './template.js';
import {
  Expires,
  Guard,
  Location,
  MatchType,
  RedirectDirective,
  TryFiles,
} from './types.js';

export type GuardDefinition =
  | { kind: 'query-string'; fallback: string }
  | { kind: 'cookie'; pattern: string; fallback: string }
  | { kind: 'method'; allowed: string[]; fallback: string }
  | { kind: 'header'; name: string; value: string; fallback: string };

/**
 * A location as written in the rule file, before patterns are compiled and
 * references are checked.
 */
export interface LocationDefinition {
  name?: string;
  matchType: MatchType;
  pattern?: string;
  deny?: boolean;
  redirect?: string | { to: string; status?: number };
  expires?: Expires;
  headers?: Record<string, string>;
  guards?: GuardDefinition[];
  tryFiles?: string[];
}

const DEFAULT_TRY_FILES = ['$uri', '=404'];

function describeDefinition(
  definition: LocationDefinition,
  index: number,
): string {
  if (definition.name !== undefined) {
    return `@${definition.name}`;
  }
  return `${definition.matchType} ${definition.pattern ?? ''} (#${index})`;
}

function compileRegex(pattern: string, flags: string, where: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid regular expression in ${where}: ${errorMessage(error)}`,
      { pattern },
    );
  }
}

function parseTryFiles(entries: string[], where: string): TryFiles {
  if (entries.length === 0) {
    throw new ConfigurationError(`Empty tryFiles in ${where}`);
  }

  const files = entries.slice(0, -1).map((template) => {
    if (template.startsWith('@') || template.startsWith('=')) {
      throw new ConfigurationError(
        `"${template}" may only be the last tryFiles entry in ${where}`,
      );
    }
    validateTemplate(template);
    return { kind: 'file' as const, template };
  });

  const last = entries[entries.length - 1];
  if (last.startsWith('@')) {
    return {
      candidates: files,
      terminal: { kind: 'location', name: last.slice(1) },
    };
  }

  if (last.startsWith('=')) {
    const status = Number(last.slice(1));
    if (!Number.isInteger(status) || status < 100 || status > 599) {
      throw new ConfigurationError(
        `Invalid status "${last}" in tryFiles of ${where}`,
      );
    }
    return { candidates: files, terminal: { kind: 'status', status } };
  }

  validateTemplate(last);
  return {
    candidates: files,
    terminal: { kind: 'backend', template: last },
  };
}

function parseRedirect(
  redirect: NonNullable<LocationDefinition['redirect']>,
  where: string,
): RedirectDirective {
  const { to, status = DEFAULT_REDIRECT_STATUS } =
    typeof redirect === 'string' ? { to: redirect } : redirect;

  if (!REDIRECT_STATUSES.some((allowed) => allowed === status)) {
    throw new ConfigurationError(
      `Invalid redirect status ${status} in ${where}`,
    );
  }
  validateTemplate(to);
  return { to, status };
}

function compileGuard(definition: GuardDefinition, where: string): Guard {
  switch (definition.kind) {
    case 'query-string':
      return definition;
    case 'cookie':
      return {
        kind: 'cookie',
        pattern: compileRegex(
          definition.pattern,
          '',
          `cookie guard of ${where}`,
        ),
        fallback: definition.fallback,
      };
    case 'method':
      return {
        kind: 'method',
        allowed: new Set(definition.allowed.map((m) => m.toUpperCase())),
        fallback: definition.fallback,
      };
    case 'header':
      return {
        kind: 'header',
        name: definition.name.toLowerCase(),
        value: definition.value,
        fallback: definition.fallback,
      };
  }
}

function compileLocation(
  definition: LocationDefinition,
  index: number,
): Location {
  const where = describeDefinition(definition, index);
  const pattern = definition.pattern ?? '';

  if (definition.matchType === 'named') {
    if (definition.name === undefined) {
      throw new ConfigurationError(`Named location #${index} has no name`);
    }
  } else if (pattern === '') {
    throw new ConfigurationError(`Location ${where} has no pattern`);
  }

  let regex: RegExp | undefined;
  if (definition.matchType === 'regex') {
    regex = compileRegex(pattern, '', where);
  } else if (definition.matchType === 'regex-ci') {
    regex = compileRegex(pattern, 'i', where);
  }

  if (
    definition.expires !== undefined &&
    definition.expires !== 'max' &&
    (!Number.isInteger(definition.expires) || definition.expires < 0)
  ) {
    throw new ConfigurationError(
      `Invalid expires ${definition.expires} in ${where}`,
    );
  }

  return {
    index,
    name: definition.name,
    matchType: definition.matchType,
    pattern,
    regex,
    deny: definition.deny ?? false,
    redirect:
      definition.redirect !== undefined
        ? parseRedirect(definition.redirect, where)
        : undefined,
    expires: definition.expires,
    headers: { ...definition.headers },
    guards: (definition.guards ?? []).map((guard) =>
      compileGuard(guard, where),
    ),
    tryFiles: parseTryFiles(definition.tryFiles ?? DEFAULT_TRY_FILES, where),
  };
}

/**
 * Names a location for log messages and the routing trail.
 */
export function locationLabel(location: Location): string {
  return location.name !== undefined
    ? `@${location.name}`
    : `${location.matchType}:${location.pattern}`;
}

function fallbackNames(location: Location): string[] {
  const names = location.guards.map((guard) => guard.fallback);
  if (location.tryFiles.terminal.kind === 'location') {
    names.push(location.tryFiles.terminal.name);
  }
  return names;
}

/**
 * Immutable, validated set of locations. Built once at startup and shared
 * by every dispatch.
 */
export class RuleTable {
  readonly locations: readonly Location[];
  readonly exact: ReadonlyMap<string, Location>;
  /** 'prefix' and 'prefix-stop' locations in declaration order. */
  readonly prefixes: readonly Location[];
  /** 'regex' and 'regex-ci' locations in declaration order. */
  readonly regexes: readonly Location[];
  private readonly named: ReadonlyMap<string, Location>;

  private constructor(locations: Location[]) {
    const exact = new Map<string, Location>();
    const named = new Map<string, Location>();

    for (const location of locations) {
      if (location.name !== undefined) {
        if (named.has(location.name)) {
          throw new ConfigurationError(
            `Duplicate location name: ${location.name}`,
          );
        }
        named.set(location.name, location);
      }

      // Earlier declarations win for duplicate exact patterns
      if (location.matchType === 'exact' && !exact.has(location.pattern)) {
        exact.set(location.pattern, location);
      }
    }

    this.locations = Object.freeze(locations);
    this.exact = exact;
    this.named = named;
    this.prefixes = Object.freeze(
      locations.filter(
        (l) => l.matchType === 'prefix' || l.matchType === 'prefix-stop',
      ),
    );
    this.regexes = Object.freeze(
      locations.filter(
        (l) => l.matchType === 'regex' || l.matchType === 'regex-ci',
      ),
    );

    this.validateDefaultLocation();
    this.validateFallbacks();
  }

  static fromDefinitions(definitions: LocationDefinition[]): RuleTable {
    return new RuleTable(
      definitions.map((definition, index) =>
        compileLocation(definition, index),
      ),
    );
  }

  /**
   * Looks up a fallback target. A missing name means the table was built
   * without validation, which is a configuration error.
   */
  byName(name: string): Location {
    const location = this.named.get(name);
    if (location === undefined) {
      throw new ConfigurationError(`Unknown location: @${name}`, { name });
    }
    return location;
  }

  private validateDefaultLocation(): void {
    const hasDefault = this.prefixes.some(
      (l) => l.matchType === 'prefix' && l.pattern === '/',
    );
    if (!hasDefault) {
      throw new ConfigurationError(
        'Rule table must contain a prefix location with pattern "/"',
      );
    }
  }

  private validateFallbacks(): void {
    for (const location of this.locations) {
      for (const name of fallbackNames(location)) {
        if (!this.named.has(name)) {
          throw new ConfigurationError(
            `Location ${locationLabel(location)} references unknown fallback @${name}`,
            { location: locationLabel(location), fallback: name },
          );
        }
      }
    }

    // Depth-first search for a fallback chain that revisits a location
    const done = new Set<number>();
    const visit = (location: Location, path: Location[]): void => {
      if (done.has(location.index)) {
        return;
      }
      if (path.includes(location)) {
        const cycle = [...path.slice(path.indexOf(location)), location];
        throw new ConfigurationError(
          `Fallback cycle: ${cycle.map(locationLabel).join(' -> ')}`,
          { cycle: cycle.map(locationLabel) },
        );
      }
      for (const name of fallbackNames(location)) {
        visit(this.byName(name), [...path, location]);
      }
      done.add(location.index);
    };

    for (const location of this.locations) {
      visit(location, []);
    }
  }
}
