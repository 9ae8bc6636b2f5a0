/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Reference genome tasks: fetch transcripts and pathway annotations of PATRIC
 * genomes, pick out their 16S records, and count the functions of each genome
 * against its 16S transcripts.
 */

import {
  aggregateTask,
  containerTask,
  joinUri,
  literal,
  localTask,
  outputPath,
  parseDelimited,
  readTargetText,
  writeTargetText,
} from '@seqflow/core';
import { containerSettings, type Placement, type Resources } from '../settings.js';

export const TRANSFER_IMAGE = 'quay.io/fhcrc-microbiome/python:python-v0.1';

/** Header of the per-genome function tables */
export const FUNCTION_TABLE_HEADER = 'transcript\tproduct\tcount';

export interface FastaRecord {
  /** First word of the header */
  id: string;
  /** Header line without the leading `>` */
  header: string;
  sequence: string;
}

/**
 * Records of a FASTA file. Sequence lines are joined; text before the first
 * header is ignored.
 */
export function parseFasta(text: string): FastaRecord[] {
  const records: FastaRecord[] = [];
  let current: { header: string; lines: string[] } | null = null;
  const flush = () => {
    if (current === null) return;
    records.push({
      id: current.header.split(' ', 1)[0],
      header: current.header,
      sequence: current.lines.join(''),
    });
  };

  for (const raw of text.split('\n')) {
    const line = raw.trimEnd();
    if (line.startsWith('>')) {
      flush();
      current = { header: line.slice(1), lines: [] };
    } else if (current !== null) {
      current.lines.push(line.replace(/\s/g, ''));
    }
  }
  flush();
  return records;
}

/** True for 16S / SSU ribosomal RNA records */
export function is16S(record: FastaRecord): boolean {
  return record.header.includes(' 16S ') || record.header.includes(' SSU ');
}

/**
 * Occurrences of each non-empty `product` of a tab-separated annotation
 * table, in order of first appearance.
 *
 * @param source - Names the table in errors
 */
export function countProducts(text: string, source: string): Map<string, number> {
  const [header = [], ...records] = parseDelimited(text, '\t');
  const column = header.map((name) => name.trim()).indexOf('product');
  if (column < 0) {
    throw new Error(`Annotation table ${source} has no 'product' column`);
  }
  const counts = new Map<string, number>();
  for (const record of records) {
    const product = (record[column] ?? '').trim();
    if (product === '') continue;
    counts.set(product, (counts.get(product) ?? 0) + 1);
  }
  return counts;
}

export interface TransferUrlParams {
  /** Source URL, e.g. on an FTP server */
  url: string;
  /** Where the file is stored */
  destination: string;
  resources: Resources;
  placement: Placement;
  jobNamePrefix: string;
}

/** Copy a file from a URL into storage */
export const transferUrl = containerTask({
  family: 'transferUrl',
  inputs: {},
  outputs: (p: TransferUrlParams) => ({ file: p.destination }),
  image: () => TRANSFER_IMAGE,
  command: (p) => [literal('wget'), literal('-O'), outputPath('file'), literal(p.url)],
  container: (p) => containerSettings(p.resources, p.placement, p.jobNamePrefix),
});

export interface ReferenceFolderParams {
  outputFolder: string;
}

/**
 * The 16S records of every transcript file in one FASTA,
 * `<outputFolder>/transcripts.fasta`.
 */
export const extract16S = aggregateTask({
  family: 'extract16S',
  inputs: { transcripts: 'many' },
  outputs: (p: ReferenceFolderParams) => ({
    fasta: joinUri(p.outputFolder, 'transcripts.fasta'),
  }),
  async run(ctx) {
    const seen = new Set<string>();
    const lines: string[] = [];
    for (const target of ctx.inputs.transcripts) {
      for (const record of parseFasta(await readTargetText(target)).filter(is16S)) {
        if (seen.has(record.id)) {
          throw new Error(`Transcript '${record.id}' appears more than once`);
        }
        seen.add(record.id);
        lines.push(`>${record.id}`, record.sequence);
      }
    }
    await writeTargetText(ctx.outputs.fasta, lines.map((line) => `${line}\n`).join(''));
  },
});

export interface GenomeFunctionsParams {
  genome: string;
  /** Folder of the genome's files */
  outputFolder: string;
}

/**
 * Function copy numbers of one genome, listed against each of its 16S
 * transcripts, `<outputFolder>/16S_functions.tsv`.
 *
 * A transcript of a genome without annotated products is listed with an
 * empty product and a count of 0.
 */
export const link16SFunctions = localTask({
  family: 'link16SFunctions',
  inputs: { transcripts: 'one', annotations: 'one' },
  outputs: (p: GenomeFunctionsParams) => ({
    table: joinUri(p.outputFolder, '16S_functions.tsv'),
  }),
  async run(ctx) {
    const transcripts = parseFasta(await readTargetText(ctx.inputs.transcripts)).filter(is16S);
    const counts = countProducts(
      await readTargetText(ctx.inputs.annotations),
      ctx.inputs.annotations.uri
    );

    const lines = [FUNCTION_TABLE_HEADER];
    const seen = new Set<string>();
    for (const { id } of transcripts) {
      if (seen.has(id)) {
        throw new Error(`Transcript '${id}' appears more than once in genome ${ctx.params.genome}`);
      }
      seen.add(id);
      if (counts.size === 0) {
        lines.push(`${id}\t\t0`);
      }
      for (const [product, count] of counts) {
        lines.push(`${id}\t${product}\t${count}`);
      }
    }
    await writeTargetText(ctx.outputs.table, lines.join('\n') + '\n');
  },
});

/**
 * One table of every genome's function copy numbers, a row per 16S
 * transcript and a column per product (sorted), `<outputFolder>/annotations.tsv`.
 */
export const mergeFunctionTables = aggregateTask({
  family: 'mergeFunctionTables',
  inputs: { tables: 'many' },
  outputs: (p: ReferenceFolderParams) => ({
    table: joinUri(p.outputFolder, 'annotations.tsv'),
  }),
  async run(ctx) {
    const rows = new Map<string, Map<string, number>>();
    const products = new Set<string>();

    for (const target of ctx.inputs.tables) {
      const [header = [], ...records] = parseDelimited(await readTargetText(target), '\t');
      if (header.join('\t') !== FUNCTION_TABLE_HEADER) {
        throw new Error(`Function table ${target.uri} has an unexpected header`);
      }
      const inTable = new Set<string>();
      for (const [transcript = '', product = '', count = '0'] of records) {
        if (!inTable.has(transcript) && rows.has(transcript)) {
          throw new Error(`Transcript '${transcript}' belongs to more than one genome`);
        }
        inTable.add(transcript);
        const counts = rows.get(transcript) ?? new Map<string, number>();
        rows.set(transcript, counts);
        if (product === '') continue;
        products.add(product);
        counts.set(product, Number(count));
      }
    }

    const columns = [...products].sort();
    const lines = [['transcript', ...columns].join('\t')];
    for (const [transcript, counts] of rows) {
      lines.push([transcript, ...columns.map((c) => String(counts.get(c) ?? 0))].join('\t'));
    }
    await writeTargetText(ctx.outputs.table, lines.join('\n') + '\n');
  },
});
