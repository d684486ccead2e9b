/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export class DetailedError extends Error {
  constructor(message: string, options?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Object.assign(this, options);
    const stack = options?.stack;
    this.stack = typeof stack === 'string' ? stack : new Error().stack;
  }

  toJSON() {
    const { name, message, ...rest } = this;
    return {
      name,
      message,
      stack: this.stack,
      ...rest,
    };
  }
}

/**
 * Raised when the rule table is malformed: a missing default location, a
 * dangling fallback reference, a fallback cycle, an invalid pattern or
 * template. The gateway refuses to start (or to answer) when it sees one.
 */
export class ConfigurationError extends DetailedError {}

/**
 * Raised for requests the gateway refuses to route; answered with 400.
 */
export class InvalidRequestError extends DetailedError {}

/**
 * Raised for request paths that cannot be normalized (malformed percent
 * escapes, NUL bytes, `..` segments above the root).
 */
export class InvalidRequestPathError extends InvalidRequestError {}

/**
 * Raised for Host values that are neither a DNS name nor an IP literal.
 */
export class InvalidRequestHostError extends InvalidRequestError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
