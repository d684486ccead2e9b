/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  ErrorRequestHandler,
  Handler,
  NextFunction,
  Request,
  Response,
} from 'express';
import { default as asyncHandler } from 'express-async-handler';
import { pipeline } from 'node:stream/promises';
import winston from 'winston';

import {
  BackendClient,
  BackendError,
  BackendResponse,
} from '../backend/types.js';
import { headerNames } from '../constants.js';
import {
  ConfigurationError,
  errorMessage,
  InvalidRequestError,
} from '../lib/error.js';
import { toGatewayRequest } from '../lib/request.js';
import * as metrics from '../metrics.js';
import { ResponseDirector } from '../routing/response-director.js';
import { GatewayDecision, GatewayRequest } from '../routing/types.js';

type Decision<A extends GatewayDecision['action']> = Extract<
  GatewayDecision,
  { action: A }
>;

function sendFile(
  res: Response,
  filePath: string,
  options: { cacheControl: boolean },
): Promise<void> {
  return new Promise((resolve, reject) => {
    res.sendFile(
      filePath,
      { ...options, dotfiles: 'allow', lastModified: true },
      (error) => (error ? reject(error) : resolve()),
    );
  });
}

function hasErrorCode(error: unknown, codes: string[]): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    codes.includes(error.code)
  );
}

export function createGatewayHandler({
  log,
  director,
  backendClient,
  exposeRoutingHeaders = false,
}: {
  log: winston.Logger;
  director: ResponseDirector;
  backendClient: BackendClient;
  exposeRoutingHeaders?: boolean;
}): Handler {
  const handlerLog = log.child({ handler: 'gateway' });

  const serveStatic = async (res: Response, decision: Decision<'static'>) => {
    res.set(decision.headers);
    if (decision.cached) {
      res.set(headerNames.cache, 'HIT');
    }

    try {
      await sendFile(res, decision.filePath, {
        // Leave Cache-Control to the location's expiry setting when it has one
        cacheControl: !('Cache-Control' in decision.headers),
      });
    } catch (error) {
      if (res.headersSent) {
        handlerLog.debug('Static response interrupted', {
          filePath: decision.filePath,
          message: errorMessage(error),
        });
        return;
      }

      // The artifact can be invalidated between the probe and the read
      if (hasErrorCode(error, ['ENOENT', 'ENOTDIR'])) {
        handlerLog.warn('Static file disappeared after probe', {
          filePath: decision.filePath,
        });
        res.removeHeader(headerNames.cache);
        res.status(404).send('Not Found');
        return;
      }
      throw error;
    }
  };

  const forwardToBackend = async (
    req: Request,
    res: Response,
    request: GatewayRequest,
    decision: Decision<'backend'>,
  ) => {
    let response: BackendResponse;
    try {
      response = await backendClient.forward({
        method: request.method,
        script: decision.script,
        queryString: decision.queryString,
        headers: request.headers,
        params: decision.params,
        body: req,
        clientIp: req.ip,
        protocol: req.protocol,
        signal: req.signal,
      });
    } catch (error) {
      if (!(error instanceof BackendError)) {
        throw error;
      }

      if (error.reason === 'aborted') {
        handlerLog.debug('Client went away during backend request', {
          requestUri: decision.uri,
        });
        return;
      }

      handlerLog.error('Backend request failed', {
        requestUri: decision.uri,
        script: decision.script,
        reason: error.reason,
        message: error.message,
      });
      if (error.reason === 'timeout') {
        res.status(504).send('Gateway Timeout');
      } else {
        res.status(502).send('Bad Gateway');
      }
      return;
    }

    res.status(response.status);
    for (const [name, value] of Object.entries(response.headers)) {
      res.setHeader(name, value);
    }
    res.setHeader(headerNames.cache, 'MISS');

    try {
      await pipeline(response.body, res);
    } catch (error) {
      if (!res.destroyed) {
        throw error;
      }
      handlerLog.debug('Client went away during backend response', {
        requestUri: decision.uri,
        message: errorMessage(error),
      });
    }
  };

  return asyncHandler(async (req: Request, res: Response) => {
    let request: GatewayRequest;
    let decision: GatewayDecision;
    try {
      request = toGatewayRequest(req);
      decision = await director.direct(request);
    } catch (error) {
      if (error instanceof InvalidRequestError) {
        handlerLog.debug('Rejecting malformed request', {
          path: req.path,
          host: req.hostname,
          message: error.message,
        });
        res.status(400).send('Bad Request');
        return;
      }
      if (error instanceof ConfigurationError) {
        metrics.configurationErrorsCounter.inc();
        handlerLog.error('Rule table error while dispatching', {
          path: req.path,
          message: error.message,
          stack: error.stack,
        });
        res.status(500).send('Internal Server Error');
        return;
      }
      throw error;
    }

    if (exposeRoutingHeaders) {
      res.set(headerNames.gatewayLocation, decision.trail.join(', '));
    }

    switch (decision.action) {
      case 'deny':
        res.status(decision.status).send('Forbidden');
        return;
      case 'redirect':
        res.redirect(decision.status, decision.location);
        return;
      case 'status':
        res.sendStatus(decision.status);
        return;
      case 'static':
        await serveStatic(res, decision);
        return;
      case 'backend':
        await forwardToBackend(req, res, request, decision);
        return;
    }
  });
}

/**
 * Last-resort handler for errors the gateway handler does not map to a
 * response itself.
 */
export function createGatewayErrorHandler({
  log,
}: {
  log: winston.Logger;
}): ErrorRequestHandler {
  const handlerLog = log.child({ handler: 'gatewayError' });

  return (error: unknown, req: Request, res: Response, next: NextFunction) => {
    metrics.errorsCounter.inc();
    handlerLog.error('Unhandled error while serving request', {
      method: req.method,
      path: req.path,
      message: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });

    if (res.headersSent) {
      next(error);
      return;
    }
    res.status(500).send('Internal Server Error');
  };
}
