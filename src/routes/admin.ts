/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Request, Response, Router } from 'express';
import { default as asyncHandler } from 'express-async-handler';
import * as promClient from 'prom-client';

import { RuleTable } from '../routing/rule-table.js';

export interface AdminRouterConfig {
  prefix: string;
  table: RuleTable;
  registry?: promClient.Registry;
}

/**
 * Gateway health and metrics endpoints. Mounted ahead of the gateway
 * handler, so requests under the prefix never reach the rule table.
 */
export function createAdminRouter({
  prefix,
  table,
  registry = promClient.register,
}: AdminRouterConfig): Router {
  const adminRouter = Router();

  adminRouter.get(`${prefix}/healthcheck`, (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      date: new Date(),
      locations: table.locations.length,
    });
  });

  adminRouter.get(
    `${prefix}/metrics`,
    asyncHandler(async (_req: Request, res: Response) => {
      res.set('Content-Type', registry.contentType);
      res.send(await registry.metrics());
    }),
  );

  return adminRouter;
}
