/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

//
// Rule table
//

export type MatchType =
  | 'exact'
  | 'prefix'
  | 'prefix-stop'
  | 'regex'
  | 'regex-ci'
  | 'named';

export type PrefixMatchType = Extract<MatchType, 'prefix' | 'prefix-stop'>;
export type RegexMatchType = Extract<MatchType, 'regex' | 'regex-ci'>;

export type GuardKind = Guard['kind'];

export type Guard =
  | { kind: 'query-string'; fallback: string }
  | { kind: 'cookie'; pattern: RegExp; fallback: string }
  | { kind: 'method'; allowed: ReadonlySet<string>; fallback: string }
  | { kind: 'header'; name: string; value: string; fallback: string };

export type TryFilesCandidate =
  | { kind: 'file'; template: string }
  | { kind: 'backend'; template: string }
  | { kind: 'location'; name: string }
  | { kind: 'status'; status: number };

export type TerminalCandidate = Exclude<TryFilesCandidate, { kind: 'file' }>;

export interface TryFiles {
  candidates: readonly Extract<TryFilesCandidate, { kind: 'file' }>[];
  terminal: TerminalCandidate;
}

export type Expires = number | 'max';

export interface RedirectDirective {
  to: string;
  status: number;
}

export interface Location {
  /** Position in the table, used as identity during dispatch. */
  index: number;
  name?: string;
  matchType: MatchType;
  pattern: string;
  regex?: RegExp;
  deny: boolean;
  redirect?: RedirectDirective;
  expires?: Expires;
  headers: Readonly<Record<string, string>>;
  guards: readonly Guard[];
  tryFiles: TryFiles;
}

//
// Request scoped values
//

export type GatewayRequest = Readonly<{
  host: string;
  /** Normalized path, without the query string. */
  path: string;
  /** Raw query string without the leading '?', '' when absent. */
  queryString: string;
  method: string;
  /** Header names are lower case. */
  headers: Readonly<Record<string, string>>;
  cookies: Readonly<Record<string, string>>;
}>;

export interface MatchResult {
  location: Location;
  /** Regex capture groups; index 0 is the whole match. */
  captures: readonly string[];
}

export interface CacheKey {
  host: string;
  /** Cache-root relative artifact path, e.g. 'example.com/news/index.html'. */
  path: string;
}

export type Outcome =
  | { kind: 'continue' }
  | { kind: 'redirect-to'; fallback: string; guard: GuardKind };

export type ResolvedTarget =
  | { kind: 'static'; uri: string; filePath: string }
  | { kind: 'backend'; uri: string; script: string; queryString: string }
  | { kind: 'status'; status: number }
  | { kind: 'location'; name: string };

export type BackendParams = Readonly<{
  SCRIPT_NAME: string;
  SCRIPT_FILENAME: string;
  DOCUMENT_ROOT: string;
  DOCUMENT_URI: string;
  REQUEST_URI: string;
  QUERY_STRING: string;
  REQUEST_METHOD: string;
  SERVER_NAME: string;
}>;

export type GatewayDecision =
  | { action: 'deny'; status: number; trail: string[] }
  | { action: 'redirect'; status: number; location: string; trail: string[] }
  | {
      action: 'static';
      uri: string;
      filePath: string;
      cached: boolean;
      headers: Record<string, string>;
      trail: string[];
    }
  | {
      action: 'backend';
      uri: string;
      script: string;
      queryString: string;
      params: BackendParams;
      trail: string[];
    }
  | { action: 'status'; status: number; trail: string[] };

//
// External collaborators
//

export type EntryKind = 'file' | 'directory';

/**
 * Filesystem existence probe. Only complete, published files may be
 * reported; a missing or unreadable entry is `undefined`.
 */
export interface ExistenceChecker {
  /**
   * Maps a document-root relative URI to a filesystem path, or `undefined`
   * when the URI would escape the document root.
   */
  resolvePath(uri: string): string | undefined;

  stat(
    filePath: string,
  ): EntryKind | undefined | Promise<EntryKind | undefined>;
}
