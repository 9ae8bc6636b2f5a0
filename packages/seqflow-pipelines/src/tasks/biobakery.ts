/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import {
  containerTask,
  inputPath,
  joinUri,
  literal,
  outputPath,
  scratchPath,
  type ContainerSettings,
} from '@seqflow/core';
import { containerSettings, type Placement, type Resources } from '../settings.js';

export const HUMANN2_IMAGE = 'quay.io/fhcrc-microbiome/humann2:v0.11.1--7';

/** Where the reference database directory appears inside the container */
export const HUMANN2_REF_DB_MOUNT = '/refdbs';

export interface Humann2Params {
  sample: string;
  outputFolder: string;
  /** Host directory holding the HUMAnN2 databases; mounted read-only */
  refDb: string;
  resources: Resources;
  placement: Placement;
}

/** Functional profile of a sample's reads, `<outputFolder>/<sample>.json.gz` */
export const humann2 = containerTask({
  family: 'humann2',
  inputs: { reads: 'one' },
  outputs: (p: Humann2Params) => ({
    json: joinUri(p.outputFolder, `${p.sample}.json.gz`),
  }),
  image: () => HUMANN2_IMAGE,
  command: (p) => [
    literal('run.py'),
    literal('--input'),
    inputPath('reads'),
    literal('--sample-name'),
    literal(p.sample),
    literal('--output-path'),
    outputPath('json'),
    literal('--ref-db'),
    literal(HUMANN2_REF_DB_MOUNT),
    literal('--threads'),
    literal(p.resources.threads),
    literal('--temp-folder'),
    scratchPath(),
  ],
  container: (p): ContainerSettings => {
    const settings = containerSettings(p.resources, p.placement, `humann2_${p.sample}`);
    return {
      ...settings,
      mounts: [
        ...(settings.mounts ?? []),
        { hostPath: p.refDb, containerPath: HUMANN2_REF_DB_MOUNT, mode: 'ro' },
      ],
    };
  },
});
