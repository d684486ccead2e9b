/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as promClient from 'prom-client';

//
// Global error metrics
//

export const errorsCounter = new promClient.Counter({
  name: 'errors_total',
  help: 'Total error count',
});

export const uncaughtExceptionCounter = new promClient.Counter({
  name: 'uncaught_exceptions_total',
  help: 'Count of uncaught exceptions',
});

//
// Dispatch metrics
//

export const decisionsCounter = new promClient.Counter({
  name: 'gateway_decisions_total',
  help: 'Count of dispatch decisions by action',
  labelNames: ['action'],
});

export const guardTripsCounter = new promClient.Counter({
  name: 'gateway_guard_trips_total',
  help: 'Count of cache bypass guards that redirected dispatch',
  labelNames: ['guard'],
});

export const configurationErrorsCounter = new promClient.Counter({
  name: 'gateway_configuration_errors_total',
  help: 'Count of rule table errors detected while dispatching',
});

//
// Probe metrics
//

export const probeHitsCounter = new promClient.Counter({
  name: 'gateway_probe_hits_total',
  help: 'Count of try-files resolutions satisfied by an existing file',
});

export const probeMissesCounter = new promClient.Counter({
  name: 'gateway_probe_misses_total',
  help: 'Count of try-files resolutions that fell through to the terminal candidate',
});

//
// Backend metrics
//

export const backendRequestsCounter = new promClient.Counter({
  name: 'gateway_backend_requests_total',
  help: 'Count of requests forwarded to the backend',
  labelNames: ['status_class'],
});

export const backendErrorsCounter = new promClient.Counter({
  name: 'gateway_backend_errors_total',
  help: 'Count of failed backend forwards',
  labelNames: ['reason'],
});

export const backendRequestDurationSeconds = new promClient.Histogram({
  name: 'gateway_backend_request_duration_seconds',
  help: 'Time until the backend answered with response headers',
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
});
