/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Structured command templates for container tasks.
 *
 * A command is an ordered list of parts, expanded into an argument vector
 * once every input and output slot has a concrete local path. Arguments are
 * never joined into a shell string.
 */

import * as path from 'path';
import { UnresolvedPlaceholderError } from '../errors.js';
import type { InputSlots } from './types.js';

/**
 * Part of a repeated pattern in an `input_paths` expansion.
 *
 * - `literal`: A fixed string (e.g., "--input")
 * - `path`: The path of the current element
 */
export type PatternPart =
  | { type: 'literal'; value: string }
  | { type: 'path' };

/**
 * Command part for constructing container commands.
 *
 * - `literal`: A fixed string passed through unchanged
 * - `input_path`: Path of a single-target input slot
 * - `input_paths`: Pattern repeated for each element of a collection slot
 * - `output_path`: Path where an output should be written
 * - `output_dir`: Directory holding an output's path, for tools that take a
 *   folder and name their files themselves
 * - `scratch_path`: The sandbox directory of the invocation
 *
 * @example
 * ```ts
 * // prokka --outdir <scratch> --cpus 4 <fasta>
 * const command: CommandPart[] = [
 *   literal('prokka'),
 *   literal('--outdir'), scratchPath(),
 *   literal('--cpus'), literal('4'),
 *   inputPath('fasta'),
 * ];
 * ```
 */
export type CommandPart =
  | { type: 'literal'; value: string }
  | { type: 'input_path'; slot: string }
  | { type: 'input_paths'; slot: string; pattern: PatternPart[] }
  | { type: 'output_path'; slot: string }
  | { type: 'output_dir'; slot: string }
  | { type: 'scratch_path' };

export function literal(value: string | number): CommandPart {
  return { type: 'literal', value: String(value) };
}

export function inputPath(slot: string): CommandPart {
  return { type: 'input_path', slot };
}

/**
 * Repeat `pattern` once per element of a collection slot.
 *
 * With no pattern, each element's path is emitted as its own argument.
 */
export function inputPaths(slot: string, ...pattern: PatternPart[]): CommandPart {
  return { type: 'input_paths', slot, pattern: pattern.length > 0 ? pattern : [elementPath()] };
}

export function outputPath(slot: string): CommandPart {
  return { type: 'output_path', slot };
}

export function outputDir(slot: string): CommandPart {
  return { type: 'output_dir', slot };
}

export function scratchPath(): CommandPart {
  return { type: 'scratch_path' };
}

export function patternLiteral(value: string): PatternPart {
  return { type: 'literal', value };
}

export function elementPath(): PatternPart {
  return { type: 'path' };
}

/**
 * Concrete paths substituted into a command.
 */
export interface CommandBindings {
  inputs: Record<string, string | readonly string[]>;
  outputs: Record<string, string>;
  scratch: string;
}

/**
 * Check a template against a task's declared slots.
 *
 * Run by the graph builder so a bad placeholder fails before anything runs.
 *
 * @throws {UnresolvedPlaceholderError} If a part names an undeclared slot, or
 *   uses a single-path part on a collection slot (or the reverse)
 */
export function validateCommand(
  task: string,
  command: readonly CommandPart[],
  inputs: InputSlots,
  outputs: readonly string[]
): void {
  for (const part of command) {
    switch (part.type) {
      case 'input_path':
        if (inputs[part.slot] !== 'one') {
          throw new UnresolvedPlaceholderError(task, `input_path(${part.slot})`);
        }
        break;
      case 'input_paths':
        if (inputs[part.slot] !== 'many') {
          throw new UnresolvedPlaceholderError(task, `input_paths(${part.slot})`);
        }
        break;
      case 'output_path':
      case 'output_dir':
        if (!outputs.includes(part.slot)) {
          throw new UnresolvedPlaceholderError(task, `${part.type}(${part.slot})`);
        }
        break;
      case 'literal':
      case 'scratch_path':
        break;
    }
  }
}

/**
 * Expand a template into an argument vector.
 *
 * @throws {UnresolvedPlaceholderError} If a slot has no binding of the right shape
 */
export function renderCommand(
  task: string,
  command: readonly CommandPart[],
  bindings: CommandBindings
): string[] {
  const args: string[] = [];

  for (const part of command) {
    switch (part.type) {
      case 'literal':
        args.push(part.value);
        break;
      case 'input_path': {
        const bound = bindings.inputs[part.slot];
        if (typeof bound !== 'string') {
          throw new UnresolvedPlaceholderError(task, `input_path(${part.slot})`);
        }
        args.push(bound);
        break;
      }
      case 'input_paths': {
        const bound = bindings.inputs[part.slot];
        if (bound === undefined || typeof bound === 'string') {
          throw new UnresolvedPlaceholderError(task, `input_paths(${part.slot})`);
        }
        for (const element of bound) {
          for (const p of part.pattern) {
            args.push(p.type === 'literal' ? p.value : element);
          }
        }
        break;
      }
      case 'output_path': {
        const bound = bindings.outputs[part.slot];
        if (bound === undefined) {
          throw new UnresolvedPlaceholderError(task, `output_path(${part.slot})`);
        }
        args.push(bound);
        break;
      }
      case 'output_dir': {
        const bound = bindings.outputs[part.slot];
        if (bound === undefined) {
          throw new UnresolvedPlaceholderError(task, `output_dir(${part.slot})`);
        }
        args.push(path.dirname(bound));
        break;
      }
      case 'scratch_path':
        args.push(bindings.scratch);
        break;
    }
  }

  return args;
}
