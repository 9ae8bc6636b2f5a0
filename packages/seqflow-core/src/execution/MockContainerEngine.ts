/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import type {
  ContainerEngine,
  ContainerRun,
  ContainerRunOptions,
  ContainerRunResult,
} from './interfaces.js';

/**
 * Record of a single container run.
 */
export interface MockContainerCall {
  run: ContainerRun;
  options?: ContainerRunOptions;
}

/** Simulates a container; may read and write the sandbox */
export type MockContainerHandler = (
  run: ContainerRun,
  options?: ContainerRunOptions
) => ContainerRunResult | Promise<ContainerRunResult>;

/**
 * ContainerEngine mock for testing execution without Docker.
 *
 * Runs a handler per image (or a default) and records all calls for assertions.
 */
export class MockContainerEngine implements ContainerEngine {
  private handlers = new Map<string, MockContainerHandler>();
  private calls: MockContainerCall[] = [];
  private defaultHandler: MockContainerHandler = () => ({ exitCode: 0, output: '' });

  /**
   * Set the handler for an image.
   */
  setHandler(image: string, handler: MockContainerHandler): void {
    this.handlers.set(image, handler);
  }

  /**
   * Set the handler for images without a specific handler.
   */
  setDefaultHandler(handler: MockContainerHandler): void {
    this.defaultHandler = handler;
  }

  getCalls(): readonly MockContainerCall[] {
    return this.calls;
  }

  clearCalls(): void {
    this.calls = [];
  }

  async run(run: ContainerRun, options?: ContainerRunOptions): Promise<ContainerRunResult> {
    this.calls.push({ run, options });
    const handler = this.handlers.get(run.image) ?? this.defaultHandler;
    return handler(run, options);
  }
}
