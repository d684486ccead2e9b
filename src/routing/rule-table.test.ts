/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { pageCacheLocations } from '../../test/fixtures.js';
import { ConfigurationError } from '../lib/error.js';
import { LocationDefinition, locationLabel, RuleTable } from './rule-table.js';

const catchAll: LocationDefinition = { matchType: 'prefix', pattern: '/' };

describe('RuleTable', () => {
  describe('fromDefinitions', () => {
    it('should build a table from valid definitions', () => {
      const table = RuleTable.fromDefinitions(pageCacheLocations());

      assert.equal(table.locations.length, 6);
      assert.equal(table.prefixes.length, 2);
      assert.equal(table.regexes.length, 2);
      assert.equal(table.exact.get('/index.html')?.redirect?.status, 301);
      assert.equal(table.byName('nocache').matchType, 'named');
    });

    it('should parse the terminal tryFiles candidate', () => {
      const table = RuleTable.fromDefinitions(pageCacheLocations());

      assert.deepEqual(table.locations[0].tryFiles, {
        candidates: [{ kind: 'file', template: '$cache_file' }],
        terminal: { kind: 'location', name: 'nocache' },
      });
      assert.deepEqual(table.byName('nocache').tryFiles, {
        candidates: [
          { kind: 'file', template: '$uri' },
          { kind: 'file', template: '$uri/' },
        ],
        terminal: { kind: 'backend', template: '/index.php$is_args$args' },
      });
      assert.deepEqual(table.locations[3].tryFiles.terminal, {
        kind: 'status',
        status: 404,
      });
    });

    it('should default tryFiles to the URI and a 404', () => {
      const table = RuleTable.fromDefinitions([catchAll]);

      assert.deepEqual(table.locations[0].tryFiles, {
        candidates: [{ kind: 'file', template: '$uri' }],
        terminal: { kind: 'status', status: 404 },
      });
      assert.equal(table.locations[0].deny, false);
    });

    it('should default the redirect status to 301', () => {
      const table = RuleTable.fromDefinitions([
        { ...catchAll, redirect: 'https://$host$request_uri' },
      ]);

      assert.deepEqual(table.locations[0].redirect, {
        to: 'https://$host$request_uri',
        status: 301,
      });
    });

    it('should compile case-insensitive regex locations', () => {
      const table = RuleTable.fromDefinitions([
        catchAll,
        { matchType: 'regex-ci', pattern: '\\.css$' },
      ]);

      assert.equal(table.regexes[0].regex?.flags, 'i');
    });

    it('should require a catch-all prefix location', () => {
      assert.throws(
        () =>
          RuleTable.fromDefinitions([
            { matchType: 'prefix-stop', pattern: '/' },
            { matchType: 'exact', pattern: '/a' },
          ]),
        {
          name: 'ConfigurationError',
          message: 'Rule table must contain a prefix location with pattern "/"',
        },
      );
    });

    it('should reject dangling guard fallbacks', () => {
      assert.throws(
        () =>
          RuleTable.fromDefinitions([
            {
              ...catchAll,
              guards: [{ kind: 'query-string', fallback: 'missing' }],
            },
          ]),
        {
          name: 'ConfigurationError',
          message: 'Location prefix:/ references unknown fallback @missing',
        },
      );
    });

    it('should reject dangling tryFiles locations', () => {
      assert.throws(
        () =>
          RuleTable.fromDefinitions([
            { ...catchAll, tryFiles: ['$uri', '@missing'] },
          ]),
        ConfigurationError,
      );
    });

    it('should reject duplicate names', () => {
      assert.throws(
        () =>
          RuleTable.fromDefinitions([
            catchAll,
            { name: 'a', matchType: 'named' },
            { name: 'a', matchType: 'named' },
          ]),
        { name: 'ConfigurationError', message: 'Duplicate location name: a' },
      );
    });

    it('should reject fallback cycles', () => {
      assert.throws(
        () =>
          RuleTable.fromDefinitions([
            { ...catchAll, tryFiles: ['@a'] },
            {
              name: 'a',
              matchType: 'named',
              guards: [{ kind: 'query-string', fallback: 'b' }],
            },
            { name: 'b', matchType: 'named', tryFiles: ['$uri', '@a'] },
          ]),
        {
          name: 'ConfigurationError',
          message: 'Fallback cycle: @a -> @b -> @a',
        },
      );
    });

    it('should reject a location that falls back to itself', () => {
      assert.throws(
        () =>
          RuleTable.fromDefinitions([
            catchAll,
            { name: 'loop', matchType: 'named', tryFiles: ['@loop'] },
          ]),
        ConfigurationError,
      );
    });

    it('should reject invalid patterns and templates', () => {
      const invalid: LocationDefinition[] = [
        { matchType: 'regex', pattern: '([a-z' },
        { matchType: 'exact' },
        { matchType: 'named' },
        { matchType: 'exact', pattern: '/a', tryFiles: [] },
        { matchType: 'exact', pattern: '/a', tryFiles: ['@x', '$uri'] },
        { matchType: 'exact', pattern: '/a', tryFiles: ['=404', '$uri'] },
        { matchType: 'exact', pattern: '/a', tryFiles: ['$uri', '=999'] },
        { matchType: 'exact', pattern: '/a', tryFiles: ['$nope', '=404'] },
        {
          matchType: 'exact',
          pattern: '/a',
          redirect: { to: '/', status: 200 },
        },
        { matchType: 'exact', pattern: '/a', expires: -1 },
        {
          matchType: 'exact',
          pattern: '/a',
          guards: [{ kind: 'cookie', pattern: '(', fallback: 'x' }],
        },
      ];

      for (const definition of invalid) {
        assert.throws(
          () => RuleTable.fromDefinitions([catchAll, definition]),
          ConfigurationError,
          JSON.stringify(definition),
        );
      }
    });
  });

  describe('locationLabel', () => {
    it('should label named and pattern locations', () => {
      const table = RuleTable.fromDefinitions(pageCacheLocations());

      assert.equal(locationLabel(table.locations[0]), 'prefix:/');
      assert.equal(locationLabel(table.locations[1]), '@nocache');
      assert.equal(locationLabel(table.locations[4]), 'regex:/\\.');
    });
  });
});
