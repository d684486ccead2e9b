/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fs from 'node:fs';
import path from 'node:path';
import winston from 'winston';

import { EntryKind, ExistenceChecker } from '../routing/types.js';

const MISSING_ENTRY_CODES = new Set(['ENOENT', 'ENOTDIR']);

function isMissingEntryError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    MISSING_ENTRY_CODES.has(error.code)
  );
}

/**
 * Read-only view of the document root, including the cache directory the
 * external cache writer publishes artifacts into. Artifacts are expected to
 * appear atomically (written elsewhere, then renamed), so a file that
 * exists is complete.
 */
export class FsArtifactStore implements ExistenceChecker {
  private log: winston.Logger;
  private documentRoot: string;

  constructor({
    log,
    documentRoot,
  }: {
    log: winston.Logger;
    documentRoot: string;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.documentRoot = path.resolve(documentRoot);
  }

  resolvePath(uri: string): string | undefined {
    const filePath = path.join(this.documentRoot, uri);
    if (
      filePath !== this.documentRoot &&
      !filePath.startsWith(`${this.documentRoot}${path.sep}`)
    ) {
      return undefined;
    }
    return filePath;
  }

  async stat(filePath: string): Promise<EntryKind | undefined> {
    try {
      const stats = await fs.promises.stat(filePath);
      if (stats.isFile()) {
        return 'file';
      }
      if (stats.isDirectory()) {
        return 'directory';
      }
      this.log.debug('Ignoring special file', { filePath });
      return undefined;
    } catch (error) {
      if (isMissingEntryError(error)) {
        return undefined;
      }
      throw error;
    }
  }
}
