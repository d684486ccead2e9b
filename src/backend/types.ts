/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Readable } from 'node:stream';

import { DetailedError } from '../lib/error.js';
import { BackendParams } from '../routing/types.js';

export interface BackendRequest {
  method: string;
  /** Script path the request is forwarded to, e.g. '/index.php'. */
  script: string;
  queryString: string;
  /** Original request headers, names lower case. */
  headers: Readonly<Record<string, string>>;
  params: BackendParams;
  body?: Readable;
  clientIp?: string;
  protocol: string;
  signal?: AbortSignal;
}

export interface BackendResponse {
  status: number;
  headers: Record<string, string | string[]>;
  body: Readable;
}

export type BackendErrorReason = 'timeout' | 'connection' | 'aborted';

export class BackendError extends DetailedError {
  readonly reason: BackendErrorReason;

  constructor(
    message: string,
    reason: BackendErrorReason,
    options?: Record<string, unknown>,
  ) {
    super(message, options);
    this.reason = reason;
  }
}

export interface BackendClient {
  forward(request: BackendRequest): Promise<BackendResponse>;
}
