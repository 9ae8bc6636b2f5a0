/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import * as path from 'path';
import { UnsupportedSchemeError } from '../errors.js';
import { parseUri } from '../paths.js';
import type { ObjectStore } from '../storage/interfaces.js';
import { LocalTarget, RemoteTarget, type Target } from './Target.js';

export interface TargetResolverOptions {
  /** URI scheme -> store serving it */
  stores?: Record<string, ObjectStore>;
  /** Directory relative local paths resolve against (default: cwd) */
  baseDir?: string;
}

/**
 * Maps URIs to Targets.
 *
 * Local paths (and `file://` URIs) become LocalTargets resolved against
 * `baseDir`. Remote URIs become RemoteTargets on the store registered for
 * their scheme.
 *
 * @example
 * ```ts
 * const resolver = new TargetResolver({ stores: { s3: new LocalObjectStore('/data/buckets') } });
 * const target = resolver.resolve('s3://results/S1.fasta.gz');
 * ```
 */
export class TargetResolver {
  private readonly stores: Map<string, ObjectStore>;
  private readonly baseDir: string;

  constructor(options: TargetResolverOptions = {}) {
    this.stores = new Map(
      Object.entries(options.stores ?? {}).map(([scheme, store]) => [scheme.toLowerCase(), store])
    );
    this.baseDir = options.baseDir ?? process.cwd();
  }

  /**
   * Register the store serving a URI scheme.
   */
  register(scheme: string, store: ObjectStore): void {
    this.stores.set(scheme.toLowerCase(), store);
  }

  /** Schemes with a registered store, sorted */
  schemes(): string[] {
    return [...this.stores.keys()].sort();
  }

  /**
   * Resolve a URI to a Target.
   *
   * @throws {UnsupportedSchemeError} If no store serves the URI's scheme
   */
  resolve(uri: string): Target {
    const location = parseUri(uri);
    if (location.type === 'local') {
      return new LocalTarget(uri, path.resolve(this.baseDir, location.path));
    }
    const store = this.stores.get(location.scheme);
    if (!store) {
      throw new UnsupportedSchemeError(location.scheme, uri);
    }
    return new RemoteTarget(uri, location.bucket, location.key, store);
  }
}
