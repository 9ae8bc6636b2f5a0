/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { createHash } from 'crypto';

/**
 * Serialize plain data to JSON with object keys sorted at every level.
 *
 * Two parameter bags with the same content always serialize identically,
 * whatever order their keys were written in. `undefined` object members are
 * dropped, as JSON.stringify does.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((v) => canonicalJson(v)).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
}

/**
 * Compute a task identity: `family:name@<12 hex chars of sha256(params)>`.
 *
 * Pure function of the task family, name and parameters.
 *
 * @example
 * ```ts
 * taskIdentity('fastqp', 'fastqp_S1', { sample: 'S1' });
 * // 'fastqp:fastqp_S1@3c5d…'
 * ```
 */
export function taskIdentity(family: string, name: string, params: object): string {
  const digest = createHash('sha256').update(canonicalJson(params)).digest('hex');
  return `${family}:${name}@${digest.slice(0, 12)}`;
}
