/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Test helpers for seqflow-core
 * Provides temporary directories and small task definitions for graph tests
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InMemoryObjectStore } from './storage/in-memory/InMemoryObjectStore.js';
import { writeTargetText, readTargetText } from './targets/Target.js';
import { TargetResolver } from './targets/TargetResolver.js';
import {
  aggregateTask,
  containerTask,
  externalTask,
  localTask,
} from './tasks/types.js';
import { inputPath, literal, outputPath } from './tasks/command.js';

/**
 * Creates a temporary directory for testing
 * @returns Path to temporary directory
 */
export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'seqflow-test-'));
}

/**
 * Removes a temporary directory and all its contents
 * @param dir Path to directory to remove
 */
export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * A resolver with an in-memory store behind `s3://`
 */
export function createTestResolver(baseDir?: string): {
  resolver: TargetResolver;
  store: InMemoryObjectStore;
} {
  const store = new InMemoryObjectStore();
  const resolver = new TargetResolver({ stores: { s3: store }, baseDir });
  return { resolver, store };
}

// =============================================================================
// Task definitions used across tests
// =============================================================================

/** Pre-existing file at `uri` */
export const sourceFile = externalTask({
  family: 'sourceFile',
  outputs: (p: { uri: string }) => ({ file: p.uri }),
});

/** Upper-cases its input into `<folder>/<sample>.upper.txt` */
export const upperCase = localTask({
  family: 'upperCase',
  inputs: { text: 'one' },
  outputs: (p: { sample: string; folder: string }) => ({
    out: `${p.folder}/${p.sample}.upper.txt`,
  }),
  async run(ctx) {
    const text = await readTargetText(ctx.inputs.text);
    await writeTargetText(ctx.outputs.out, text.toUpperCase());
  },
});

/** Joins its inputs, one per line, into `<folder>/joined.txt` */
export const joinAll = aggregateTask({
  family: 'joinAll',
  inputs: { parts: 'many' },
  outputs: (p: { folder: string }) => ({ joined: `${p.folder}/joined.txt` }),
  async run(ctx) {
    const texts: string[] = [];
    for (const part of ctx.inputs.parts) {
      texts.push(await readTargetText(part));
    }
    await writeTargetText(ctx.outputs.joined, texts.join('\n'));
  },
});

/** Container task running `tool <in> <out>` */
export const toolStep = containerTask({
  family: 'toolStep',
  inputs: { reads: 'one' },
  outputs: (p: { sample: string; folder: string; engine: 'docker' | 'batch' }) => ({
    result: `${p.folder}/${p.sample}.result.txt`,
  }),
  image: () => 'example.org/tool:1.0',
  command: () => [literal('tool'), inputPath('reads'), outputPath('result')],
  container: (p) => ({ vcpus: 1, memoryMb: 1024, engine: p.engine }),
});
