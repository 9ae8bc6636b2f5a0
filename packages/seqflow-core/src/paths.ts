/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Location helpers.
 *
 * Everything here is pure: output locations are derived from task parameters
 * only, so the same configuration always yields the same URIs.
 */

import * as path from 'path';

/**
 * A parsed storage location.
 *
 * - `local`: a filesystem path (plain or `file://`)
 * - `remote`: `<scheme>://<bucket>/<key>`
 */
export type Location =
  | { type: 'local'; path: string }
  | { type: 'remote'; scheme: string; bucket: string; key: string };

const REMOTE_PATTERN = /^([a-z][a-z0-9+.-]*):\/\/([^/]+)\/?(.*)$/i;

/**
 * Parse a URI into a {@link Location}.
 *
 * @example
 * ```ts
 * parseUri('s3://bucket/reads/S1.fastq.gz');
 * // { type: 'remote', scheme: 's3', bucket: 'bucket', key: 'reads/S1.fastq.gz' }
 * parseUri('/data/S1.fastq.gz');
 * // { type: 'local', path: '/data/S1.fastq.gz' }
 * ```
 */
export function parseUri(uri: string): Location {
  if (uri.startsWith('file://')) {
    return { type: 'local', path: uri.slice('file://'.length) };
  }
  const match = REMOTE_PATTERN.exec(uri);
  if (match) {
    const [, scheme, bucket, key] = match;
    return { type: 'remote', scheme: scheme.toLowerCase(), bucket, key };
  }
  return { type: 'local', path: uri };
}

/**
 * Join a folder URI and path segments with exactly one `/` between them.
 *
 * Works for local paths and remote URIs alike; the scheme's `//` is kept.
 */
export function joinUri(base: string, ...segments: string[]): string {
  const location = parseUri(base);
  if (location.type === 'local') {
    return path.posix.join(location.path, ...segments);
  }
  const key = path.posix.join(location.key, ...segments).replace(/^\/+/, '');
  return `${location.scheme}://${location.bucket}/${key}`;
}

/**
 * Normalize a folder URI so that it ends with exactly one `/`.
 *
 * Called once when settings are built.
 */
export function normalizeFolder(folder: string): string {
  const trimmed = folder.trim();
  if (trimmed === '') return trimmed;
  return trimmed.replace(/\/+$/, '') + '/';
}

/** Last path segment of a URI (`s3://b/x/y.gz` → `y.gz`) */
export function uriBasename(uri: string): string {
  const location = parseUri(uri);
  const target = location.type === 'local' ? location.path : location.key;
  const base = path.posix.basename(target);
  if (base !== '') return base;
  return location.type === 'remote' ? location.bucket : 'root';
}

/** Replace characters not allowed in batch job names */
export function sanitizeJobName(name: string): string {
  return name.replace(/[^a-zA-Z0-9\-_]/g, '_');
}
