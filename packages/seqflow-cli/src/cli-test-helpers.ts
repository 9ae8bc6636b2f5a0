/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Test helpers for CLI command testing
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import type { CommonOptions } from './config.js';

/**
 * Create a temporary directory for CLI testing
 */
export function createTestDir(): string {
  return mkdtempSync(join(tmpdir(), 'seqflow-cli-test-'));
}

/**
 * Remove a temporary test directory
 */
export function removeTestDir(testDir: string): void {
  rmSync(testDir, { recursive: true, force: true });
}

/**
 * Write a test file, creating its parent directories
 */
export function writeTestFile(testDir: string, filename: string, content: string): string {
  const filePath = join(testDir, filename);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
  return filePath;
}

/**
 * Shared options as commander would give them, with store and scratch in `testDir`
 */
export function commonOptions(testDir: string): CommonOptions {
  return {
    outputFolder: 's3://b/out',
    engine: 'docker',
    batchQueue: 'optimal',
    workers: '2',
    maxRemoteJobs: '10',
    scratchDir: join(testDir, 'scratch'),
    storeRoot: join(testDir, 'store'),
    pollInterval: '0',
    retries: '0',
  };
}
