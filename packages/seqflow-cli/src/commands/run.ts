/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Running a pipeline: build its graph, then execute it with progress output.
 */

import {
  GraphBuilder,
  errorMessage,
  type ContainerEngine,
  type RunResult,
  type TaskCompletion,
} from '@seqflow/core';
import type { RuntimeConfig } from '../config.js';
import { createRuntime } from '../runtime.js';
import { exitError } from '../utils.js';

/** Exit code of a run stopped by an interrupt */
export const EXIT_INTERRUPTED = 130;

/** How a command reports and what it runs on */
export interface CommandIO {
  log: (line: string) => void;
  signal?: AbortSignal;
  /** Container engine (default: docker) */
  engine?: ContainerEngine;
}

/** Adds a pipeline's tasks and returns the names of its targets */
export type PipelineBuild = (builder: GraphBuilder) => string[] | Promise<string[]>;

/**
 * Build and run a pipeline.
 *
 * @returns Exit code: 0 when every target is complete, 1 when not, 130 when interrupted
 * @throws {ConfigurationError} If the graph or the options are invalid
 */
export async function runPipeline(
  name: string,
  config: RuntimeConfig,
  build: PipelineBuild,
  io: CommandIO
): Promise<number> {
  const { log } = io;
  const { resolver, scheduler } = createRuntime(config, io.engine);
  const builder = new GraphBuilder(resolver);
  const targets = await build(builder);
  const graph = builder.build();

  for (const warning of graph.warnings) {
    log(`Warning: ${warning}`);
  }
  if (targets.length === 0) {
    log('Nothing to run');
    return 0;
  }

  const tasks = [...graph.ancestorsOf(...targets), ...targets.map((t) => graph.task(t))];
  const inRun = new Set(tasks.map((t) => t.name));

  if (config.dryRun) {
    log(`Dry run of ${name}: ${inRun.size} tasks`);
    for (const node of graph.order) {
      if (!inRun.has(node.name)) continue;
      const status = (await node.isComplete()) ? 'complete' : 'pending';
      log(`  ${node.name}: ${status}`);
    }
    return 0;
  }

  log(`Running ${name}`);
  log(`Output folder: ${config.outputFolder}`);
  log(`Engine: ${config.placement.engine}`);
  log(`Workers: ${config.workers}`);
  log('');

  const result = await scheduler.run(graph, {
    targets,
    concurrency: config.workers,
    maxRemoteJobs: config.maxRemoteJobs,
    pollIntervalMs: config.pollIntervalMs,
    retries: config.retries,
    scratchRoot: config.scratchDir,
    signal: io.signal,
    onTaskStart: (task) => log(`  [START] ${task}`),
    onTaskComplete: (completion) => log(`  ${formatCompletion(completion)}`),
  });

  printSummary(result, log);

  if (result.status === 'cancelled') return EXIT_INTERRUPTED;
  return result.success ? 0 : 1;
}

/**
 * Progress line for a finished task.
 */
export function formatCompletion(completion: TaskCompletion): string {
  switch (completion.status) {
    case 'complete':
      return completion.skipped
        ? `[SKIP] ${completion.name} (already complete)`
        : `[DONE] ${completion.name}`;
    case 'failed':
      return `[FAIL] ${completion.name}`;
    case 'unreachable':
      return `[UNREACHABLE] ${completion.name} (after ${completion.cause ?? 'a failure'})`;
  }
}

function printSummary(result: RunResult, log: (line: string) => void): void {
  log('');
  log('Summary:');
  log(`  Executed:    ${result.executed}`);
  log(`  Skipped:     ${result.skipped}`);
  log(`  Failed:      ${result.failed.length}`);
  log(`  Unreachable: ${result.unreachable.length}`);
  log(`  Duration:    ${result.duration}ms`);

  if (result.status === 'cancelled') {
    const pending = result.tasks.filter((t) => t.status === 'pending').length;
    log('');
    log(`Interrupted with ${pending} tasks unfinished`);
    return;
  }

  if (result.failed.length > 0) {
    log('');
    log('Failed tasks:');
    for (const task of result.tasks) {
      if (task.status !== 'failed') continue;
      const exit = task.exitCode !== undefined && task.exitCode !== null ? ` (exit code ${task.exitCode})` : '';
      log(`  ${task.name}: ${task.error ?? 'failed'}${exit}`);
      for (const line of (task.output ?? '').split('\n').filter((l) => l !== '').slice(-10)) {
        log(`    | ${line}`);
      }
    }
  }
}

/**
 * Commander action around a pipeline command: console output, interrupt
 * handling and the process exit code.
 */
export async function runCommandAction(command: (io: CommandIO) => Promise<number>): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = () => {
    console.log('');
    console.log('Interrupt received, stopping...');
    controller.abort(new Error('Interrupted'));
  };
  process.once('SIGINT', onInterrupt);
  try {
    process.exitCode = await command({ log: (line) => console.log(line), signal: controller.signal });
  } catch (err) {
    exitError(errorMessage(err));
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
