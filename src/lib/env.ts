/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export function varOrDefault(envVarName: string, defaultValue: string): string {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : defaultValue;
}

export function varOrUndefined(envVarName: string): string | undefined {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

export function intVarOrDefault(
  envVarName: string,
  defaultValue: number,
): number {
  const value = varOrUndefined(envVarName);
  if (value === undefined) {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${envVarName} must be an integer, got: ${value}`);
  }
  return parsed;
}

export function boolVarOrDefault(
  envVarName: string,
  defaultValue: boolean,
): boolean {
  const value = varOrUndefined(envVarName);
  return value !== undefined ? value.toLowerCase() === 'true' : defaultValue;
}
