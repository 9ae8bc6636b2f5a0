/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for graph construction and validation
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { GraphBuilder, EMPTY_DATASET_WARNING } from './GraphBuilder.js';
import type { DatasetRow } from '../dataset/table.js';
import {
  DependencyCycleError,
  DuplicateDatasetValueError,
  DuplicateTaskError,
  EmptyDatasetValueError,
  SlotBindingError,
  TaskNotFoundError,
  UnboundInputError,
  UnresolvedPlaceholderError,
} from '../errors.js';
import { containerTask, localTask } from '../tasks/types.js';
import { inputPath, literal, outputPath } from '../tasks/command.js';
import { createTestResolver, joinAll, sourceFile, upperCase } from '../test-helpers.js';
import type { TargetResolver } from '../targets/TargetResolver.js';
import type { Target } from '../targets/Target.js';

const FOLDER = 's3://b/out';

function rows(...samples: string[]): DatasetRow[] {
  return samples.map((sample) => ({
    sample,
    source: `s3://b/in/${sample}.txt`,
    values: { sample, source: `s3://b/in/${sample}.txt` },
  }));
}

function uris(bound: Target | readonly Target[] | undefined): string[] {
  if (bound === undefined) return [];
  return 'uri' in bound ? [bound.uri] : bound.map((t) => t.uri);
}

/** N independent chains load -> upper, joined by one fan-in task */
function chainsWithFanIn(builder: GraphBuilder, samples: DatasetRow[]) {
  const branches = builder.fanOut(samples, (row) => {
    const load = builder.add(sourceFile, `load_${row.sample}`, { uri: row.source });
    const upper = builder.add(upperCase, `upper_${row.sample}`, {
      sample: row.sample,
      folder: FOLDER,
    });
    builder.bind(upper, 'text', load.out('file'));
    return upper;
  });
  const join = builder.add(joinAll, 'join', { folder: FOLDER });
  builder.bind(
    join,
    'parts',
    [...branches.values()].map((upper) => upper.out('out'))
  );
  return { branches, join };
}

describe('GraphBuilder', () => {
  let resolver: TargetResolver;
  let builder: GraphBuilder;

  beforeEach(() => {
    resolver = createTestResolver().resolver;
    builder = new GraphBuilder(resolver);
  });

  describe('add', () => {
    it('derives output targets from parameters alone', () => {
      const node = builder.add(upperCase, 'upper_S1', { sample: 'S1', folder: FOLDER });
      assert.deepStrictEqual(node.outputUris, { out: 's3://b/out/S1.upper.txt' });
      assert.strictEqual(node.output('out').uri, 's3://b/out/S1.upper.txt');
      assert.strictEqual(node.kind, 'local');
      assert.ok(node.id.startsWith('upperCase:upper_S1@'));
    });

    it('returns an equivalent node when the same task is added twice', () => {
      const first = builder.add(sourceFile, 'ref', { uri: 's3://b/ref.db' });
      const second = builder.add(sourceFile, 'ref', { uri: 's3://b/ref.db' });
      assert.strictEqual(first.id, second.id);
      assert.strictEqual(builder.size, 1);
    });

    it('rejects a name reused with different parameters', () => {
      builder.add(sourceFile, 'ref', { uri: 's3://b/ref.db' });
      assert.throws(
        () => builder.add(sourceFile, 'ref', { uri: 's3://b/other.db' }),
        DuplicateTaskError
      );
    });

    it('rejects local tasks with collection slots', () => {
      const bad = localTask({
        family: 'bad',
        inputs: { all: 'many' },
        outputs: () => ({ out: 's3://b/bad' }),
        async run() {},
      });
      assert.throws(() => builder.add(bad, 'bad', {}), SlotBindingError);
    });
  });

  describe('bind', () => {
    it('rejects producers from another builder', () => {
      const other = new GraphBuilder(resolver);
      const foreign = other.add(sourceFile, 'load_S1', { uri: 's3://b/x' });
      const upper = builder.add(upperCase, 'upper_S1', { sample: 'S1', folder: FOLDER });
      assert.throws(() => builder.bind(upper, 'text', foreign.out('file')), SlotBindingError);
    });

    it('ignores an identical second binding and rejects a different one', () => {
      const a = builder.add(sourceFile, 'a', { uri: 's3://b/a' });
      const b = builder.add(sourceFile, 'b', { uri: 's3://b/b' });
      const upper = builder.add(upperCase, 'upper', { sample: 'S1', folder: FOLDER });
      builder.bind(upper, 'text', a.out('file'));
      builder.bind(upper, 'text', a.out('file'));
      assert.throws(
        () => builder.bind(upper, 'text', b.out('file')),
        /already bound to different outputs/
      );
    });
  });

  describe('build', () => {
    it('builds N independent chains and one fan-in', () => {
      const { join } = chainsWithFanIn(builder, rows('S1', 'S2', 'S3'));
      const graph = builder.build();

      assert.strictEqual(graph.size, 7);
      assert.deepStrictEqual(
        graph.order.map((n) => n.name),
        ['load_S1', 'load_S2', 'load_S3', 'upper_S1', 'upper_S2', 'upper_S3', 'join']
      );
      assert.deepStrictEqual(
        graph.terminals.map((n) => n.name),
        ['join']
      );
      assert.deepStrictEqual(graph.warnings, []);

      assert.deepStrictEqual(
        uris(graph.inputsOf(join.name).parts),
        ['s3://b/out/S1.upper.txt', 's3://b/out/S2.upper.txt', 's3://b/out/S3.upper.txt']
      );
    });

    it('answers dependency queries', () => {
      chainsWithFanIn(builder, rows('S1', 'S2'));
      const graph = builder.build();

      assert.deepStrictEqual(
        graph.dependenciesOf('join').map((n) => n.name),
        ['upper_S1', 'upper_S2']
      );
      assert.deepStrictEqual(
        graph.dependentsOf('load_S1').map((n) => n.name),
        ['upper_S1']
      );
      assert.deepStrictEqual(
        graph.transitiveDependents('load_S2').map((n) => n.name),
        ['upper_S2', 'join']
      );
      assert.deepStrictEqual(
        graph.ancestorsOf('upper_S1').map((n) => n.name),
        ['load_S1']
      );
      assert.throws(() => graph.task('nope'), TaskNotFoundError);
    });

    it('resolves single inputs to one target', () => {
      chainsWithFanIn(builder, rows('S1'));
      const graph = builder.build();
      assert.deepStrictEqual(uris(graph.inputsOf('upper_S1').text), ['s3://b/in/S1.txt']);
    });

    it('shares tasks added by several branches', () => {
      builder.fanOut(rows('S1', 'S2'), (row) => {
        const ref = builder.add(sourceFile, 'reference', { uri: 's3://b/ref.txt' });
        const upper = builder.add(upperCase, `upper_${row.sample}`, {
          sample: row.sample,
          folder: FOLDER,
        });
        builder.bind(upper, 'text', ref.out('file'));
        return upper;
      });
      const graph = builder.build();
      assert.deepStrictEqual(
        graph.tasks().map((n) => n.name),
        ['reference', 'upper_S1', 'upper_S2']
      );
    });

    it('warns on an empty fan-out and keeps tasks added outside it', () => {
      chainsWithFanIn(builder, []);
      const graph = builder.build();
      assert.deepStrictEqual(
        graph.tasks().map((n) => n.name),
        ['join']
      );
      assert.deepStrictEqual(graph.warnings, [EMPTY_DATASET_WARNING]);
    });

    it('warns once for a builder with no tasks', () => {
      builder.fanOut([], () => null);
      const graph = builder.build();
      assert.strictEqual(graph.size, 0);
      assert.deepStrictEqual(graph.warnings, [EMPTY_DATASET_WARNING]);
    });

    it('rejects a repeated source before adding any task', () => {
      const repeated = rows('S1', 'S2').map((row) => ({ ...row, source: 's3://b/in/shared.txt' }));
      assert.throws(
        () => chainsWithFanIn(builder, repeated),
        (err: unknown) =>
          err instanceof DuplicateDatasetValueError &&
          err.column === 'source' &&
          err.value === 's3://b/in/shared.txt'
      );
      assert.strictEqual(builder.size, 0);
    });

    it('rejects identical rows instead of merging them', () => {
      let branches = 0;
      assert.throws(
        () =>
          builder.fanOut(rows('S1', 'S1'), () => {
            branches++;
          }),
        (err: unknown) =>
          err instanceof DuplicateDatasetValueError && err.column === 'source'
      );
      assert.strictEqual(branches, 0);
    });

    it('rejects a repeated sample with different sources before adding any task', () => {
      const [first] = rows('S1');
      const second: DatasetRow = { ...first, source: 's3://b/in/other.txt' };
      assert.throws(
        () => chainsWithFanIn(builder, [first, second]),
        (err: unknown) =>
          err instanceof DuplicateDatasetValueError &&
          err.column === 'sample' &&
          err.value === 'S1'
      );
      assert.strictEqual(builder.size, 0);
    });

    it('rejects an empty sample', () => {
      const [row] = rows('S1');
      assert.throws(
        () => builder.fanOut([{ ...row, sample: '' }], () => null),
        (err: unknown) =>
          err instanceof EmptyDatasetValueError && err.column === 'sample' && err.row === 1
      );
      assert.strictEqual(builder.size, 0);
    });

    it('rejects unbound inputs', () => {
      builder.add(upperCase, 'upper_S1', { sample: 'S1', folder: FOLDER });
      assert.throws(
        () => builder.build(),
        (err: unknown) =>
          err instanceof UnboundInputError && err.task === 'upper_S1' && err.slot === 'text'
      );
    });

    it('rejects cycles, naming the tasks on them', () => {
      const a = builder.add(upperCase, 'a', { sample: 'a', folder: FOLDER });
      const b = builder.add(upperCase, 'b', { sample: 'b', folder: FOLDER });
      builder.bind(a, 'text', b.out('out'));
      builder.bind(b, 'text', a.out('out'));
      assert.throws(() => builder.build(), {
        name: 'DependencyCycleError',
        message: 'Dependency cycle between tasks: b -> a -> b',
      });
      assert.throws(() => builder.build(), DependencyCycleError);
    });

    it('rejects container commands naming undeclared slots', () => {
      const tool = containerTask({
        family: 'tool',
        inputs: { reads: 'one' },
        outputs: () => ({ result: 's3://b/result' }),
        image: () => 'example.org/tool:1',
        command: () => [literal('tool'), inputPath('reads'), outputPath('report')],
        container: () => ({ vcpus: 1, memoryMb: 512, engine: 'docker' as const }),
      });
      const load = builder.add(sourceFile, 'load', { uri: 's3://b/in' });
      const node = builder.add(tool, 'tool', {});
      builder.bind(node, 'reads', load.out('file'));
      assert.throws(
        () => builder.build(),
        (err: unknown) =>
          err instanceof UnresolvedPlaceholderError && err.placeholder === 'output_path(report)'
      );
    });
  });
});
