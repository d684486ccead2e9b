/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Handler, Request, Response } from 'express';
import winston from 'winston';

export class ClientDisconnectedError extends Error {
  constructor() {
    super('Client disconnected before the response completed');
    this.name = this.constructor.name;
  }
}

/**
 * Gives each request a `signal` that fires when the client goes away
 * mid-response. Backend forwards pass it on, so an abandoned request stops
 * tying up the backend.
 */
export function createAbortSignalMiddleware({
  log,
}: {
  log: winston.Logger;
}): Handler {
  const middlewareLog = log.child({ middleware: 'abortSignal' });

  return (req: Request, res: Response, next) => {
    const controller = new AbortController();

    res.once('close', () => {
      if (res.writableEnded) {
        return;
      }
      middlewareLog.debug('Client disconnected', {
        method: req.method,
        path: req.path,
      });
      controller.abort(new ClientDisconnectedError());
    });

    req.signal = controller.signal;
    next();
  };
}
