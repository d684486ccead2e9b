/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import axios, { AxiosInstance } from 'axios';
import { Readable } from 'node:stream';
import winston from 'winston';

import { headerNames, HOP_BY_HOP_HEADERS } from '../constants.js';
import { errorMessage } from '../lib/error.js';
import * as metrics from '../metrics.js';
import {
  BackendClient,
  BackendError,
  BackendErrorReason,
  BackendRequest,
  BackendResponse,
} from './types.js';

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const TIMEOUT_ERROR_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const REPLACED_HEADERS = new Set(
  [
    headerNames.forwardedFor,
    headerNames.forwardedHost,
    headerNames.forwardedProto,
  ].map((name) => name.toLowerCase()),
);

const GATEWAY_PARAM_PREFIX = headerNames.gatewayParamPrefix.toLowerCase();

function responseHeaders(headers: object): Record<string, string | string[]> {
  const result: Record<string, string | string[]> = {};
  const entries: [string, unknown][] = Object.entries(headers);
  for (const [name, value] of entries) {
    if (HOP_BY_HOP_HEADERS.has(name.toLowerCase())) {
      continue;
    }
    if (typeof value === 'string') {
      result[name] = value;
    } else if (typeof value === 'number') {
      result[name] = value.toString();
    } else if (
      Array.isArray(value) &&
      value.every((item) => typeof item === 'string')
    ) {
      result[name] = value;
    }
  }
  return result;
}

function failureReason(
  error: unknown,
  signal: AbortSignal | undefined,
): BackendErrorReason {
  // axios rejects with the signal's reason when one was given
  if (axios.isCancel(error) || signal?.aborted === true) {
    return 'aborted';
  }
  if (
    axios.isAxiosError(error) &&
    error.code !== undefined &&
    TIMEOUT_ERROR_CODES.has(error.code)
  ) {
    return 'timeout';
  }
  return 'connection';
}

/**
 * Forwards requests to the application backend over HTTP. The CGI-style
 * parameters a FastCGI backend would receive are sent as
 * X-Gateway-Param-* headers.
 */
export class HttpBackendClient implements BackendClient {
  private log: winston.Logger;
  private backendAxios: AxiosInstance;

  constructor({
    log,
    backendUrl,
    requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
  }: {
    log: winston.Logger;
    backendUrl: string;
    requestTimeoutMs?: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.backendAxios = axios.create({
      baseURL: backendUrl,
      timeout: requestTimeoutMs,
    });
  }

  requestHeaders(request: BackendRequest): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(request.headers)) {
      // Gateway parameters are only ever set by the gateway itself
      if (
        !HOP_BY_HOP_HEADERS.has(name) &&
        !REPLACED_HEADERS.has(name) &&
        !name.startsWith(GATEWAY_PARAM_PREFIX)
      ) {
        headers[name] = value;
      }
    }

    const forwardedFor = request.headers['x-forwarded-for'];
    if (request.clientIp !== undefined) {
      headers[headerNames.forwardedFor] =
        forwardedFor !== undefined
          ? `${forwardedFor}, ${request.clientIp}`
          : request.clientIp;
    }
    headers[headerNames.forwardedHost] = request.params.SERVER_NAME;
    headers[headerNames.forwardedProto] = request.protocol;

    for (const [name, value] of Object.entries(request.params)) {
      headers[`${headerNames.gatewayParamPrefix}${name}`] = value;
    }

    return headers;
  }

  async forward(request: BackendRequest): Promise<BackendResponse> {
    // The script is a decoded path; re-encode it so a '?' or '#' in a
    // file name stays in the path
    const scriptPath = request.script
      .split('/')
      .map((segment) => encodeURIComponent(segment))
      .join('/');
    const url =
      request.queryString !== ''
        ? `${scriptPath}?${request.queryString}`
        : scriptPath;
    const hasBody = request.method !== 'GET' && request.method !== 'HEAD';

    this.log.debug('Forwarding request to backend', {
      method: request.method,
      url,
      requestUri: request.params.REQUEST_URI,
    });

    const end = metrics.backendRequestDurationSeconds.startTimer();
    try {
      const response = await this.backendAxios.request<Readable>({
        method: request.method,
        url,
        headers: this.requestHeaders(request),
        data: hasBody ? request.body : undefined,
        responseType: 'stream',
        signal: request.signal,
        maxRedirects: 0,
        decompress: false,
        // The backend's status is relayed to the client as is
        validateStatus: () => true,
      });

      metrics.backendRequestsCounter.inc({
        status_class: `${Math.floor(response.status / 100)}xx`,
      });

      return {
        status: response.status,
        headers: responseHeaders(response.headers),
        body: response.data,
      };
    } catch (error) {
      const reason = failureReason(error, request.signal);
      metrics.backendErrorsCounter.inc({ reason });
      throw new BackendError(
        `Backend request failed: ${errorMessage(error)}`,
        reason,
        { url, method: request.method },
      );
    } finally {
      end();
    }
  }
}
