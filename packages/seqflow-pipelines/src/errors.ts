/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Pipeline configuration errors. Like every ConfigurationError they are
 * raised while the graph is built, before anything runs.
 */

import { ConfigurationError } from '@seqflow/core';

export class InvalidProjectNameError extends ConfigurationError {
  constructor(public readonly projectName: string) {
    super(`Project name must contain only letters, digits and underscores, got '${projectName}'`);
  }
}

export class InvalidAccessionError extends ConfigurationError {
  constructor(
    public readonly sample: string,
    public readonly accession: string
  ) {
    super(`Sample '${sample}' has SRA accession '${accession}'; accessions must start with SRR`);
  }
}
