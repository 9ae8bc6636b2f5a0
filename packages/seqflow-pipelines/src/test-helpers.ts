/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Test helpers for seqflow-pipelines
 */

import {
  GraphBuilder,
  InMemoryObjectStore,
  TargetResolver,
  parseDatasetTable,
  type DatasetRow,
} from '@seqflow/core';

/**
 * A graph builder whose `s3://` URIs live in memory
 */
export function createTestBuilder(): {
  builder: GraphBuilder;
  resolver: TargetResolver;
  store: InMemoryObjectStore;
} {
  const store = new InMemoryObjectStore();
  const resolver = new TargetResolver({ stores: { s3: store } });
  return { builder: new GraphBuilder(resolver), resolver, store };
}

/**
 * Dataset rows from `[sample, source]` pairs
 */
export function datasetRows(...pairs: [string, string][]): DatasetRow[] {
  const text = ['sample,source', ...pairs.map(([s, uri]) => `${s},${uri}`)].join('\n');
  return parseDatasetTable(text, { sampleColumn: 'sample', sourceColumn: 'source' }).rows;
}
