/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { GatewayRequest, Guard, Location, Outcome } from './types.js';

export function guardTrips(guard: Guard, request: GatewayRequest): boolean {
  switch (guard.kind) {
    case 'query-string':
      return request.queryString !== '';
    case 'cookie':
      return Object.keys(request.cookies).some((name) =>
        guard.pattern.test(name),
      );
    case 'method':
      return !guard.allowed.has(request.method.toUpperCase());
    case 'header': {
      const value = request.headers[guard.name];
      return (
        value !== undefined && value.toLowerCase() === guard.value.toLowerCase()
      );
    }
  }
}

/**
 * Runs a location's cache bypass guards in declaration order. The first
 * guard that trips decides the outcome; later guards are not evaluated.
 */
export function evaluate(location: Location, request: GatewayRequest): Outcome {
  for (const guard of location.guards) {
    if (guardTrips(guard, request)) {
      return {
        kind: 'redirect-to',
        fallback: guard.fallback,
        guard: guard.kind,
      };
    }
  }
  return { kind: 'continue' };
}
