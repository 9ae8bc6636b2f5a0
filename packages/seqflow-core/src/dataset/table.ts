/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Dataset description tables.
 *
 * A dataset is a delimited text table with a header row. Two columns are
 * required: one naming each sample, one giving the location of its input.
 * Both must be present, non-empty and unique before any task is created.
 *
 * Fields may be double-quoted; inside quotes the separator and line breaks
 * are literal and `""` is an escaped quote. Blank lines are ignored.
 */

import * as fs from 'fs/promises';
import {
  DatasetColumnMissingError,
  DuplicateDatasetValueError,
  EmptyDatasetValueError,
} from '../errors.js';

/**
 * One sample of a dataset.
 */
export interface DatasetRow {
  /** Sample identifier */
  sample: string;
  /** Input location (URI or SRA accession) */
  source: string;
  /** Every column of the row, by header name */
  values: Readonly<Record<string, string>>;
}

export interface DatasetTable {
  /** Header names in file order */
  columns: string[];
  /** Rows in file order */
  rows: DatasetRow[];
}

export interface DatasetTableOptions {
  /** Column holding sample identifiers */
  sampleColumn: string;
  /** Column holding input locations */
  sourceColumn: string;
  /** Field separator (default: ",") */
  separator?: string;
  /** Name used in error messages (default: "dataset table") */
  sourceName?: string;
}

/**
 * Split delimited text into records of fields.
 */
export function parseDelimited(text: string, separator = ','): string[][] {
  if (separator.length !== 1) {
    throw new Error(`Separator must be a single character, got '${separator}'`);
  }
  const input = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;
  let fieldStarted = false;

  const endField = () => {
    record.push(field);
    field = '';
    fieldStarted = false;
  };
  const endRecord = () => {
    endField();
    // a line holding nothing is blank, not a record with one empty field
    if (!(record.length === 1 && record[0] === '')) {
      records.push(record);
    }
    record = [];
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (quoted) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += ch;
      }
    } else if (ch === '"' && !fieldStarted) {
      quoted = true;
      fieldStarted = true;
    } else if (ch === separator) {
      endField();
    } else if (ch === '\n') {
      endRecord();
    } else if (ch === '\r') {
      if (input[i + 1] !== '\n') endRecord();
    } else {
      field += ch;
      fieldStarted = true;
    }
  }
  if (fieldStarted || field !== '' || record.length > 0) {
    endRecord();
  }
  return records;
}

/**
 * Parse and validate a dataset table.
 *
 * @throws {DatasetColumnMissingError} If a required column is absent
 * @throws {EmptyDatasetValueError} If a required column has an empty cell
 * @throws {DuplicateDatasetValueError} If a required column repeats a value
 */
export function parseDatasetTable(text: string, options: DatasetTableOptions): DatasetTable {
  const sourceName = options.sourceName ?? 'dataset table';
  const [header = [], ...records] = parseDelimited(text, options.separator ?? ',');
  const columns = header.map((name) => name.trim());

  for (const column of [options.sourceColumn, options.sampleColumn]) {
    if (!columns.includes(column)) {
      throw new DatasetColumnMissingError(column, sourceName);
    }
  }

  const rows = records.map((record): DatasetRow => {
    const values: Record<string, string> = {};
    columns.forEach((column, i) => {
      values[column] = (record[i] ?? '').trim();
    });
    return {
      sample: values[options.sampleColumn],
      source: values[options.sourceColumn],
      values,
    };
  });

  validateDatasetRows(rows, { sample: options.sampleColumn, source: options.sourceColumn });

  return { columns, rows };
}

/**
 * Check that every row has a non-empty, unique sample and source.
 *
 * `columns` names the two fields in error messages.
 *
 * @throws {EmptyDatasetValueError} If a sample or source is empty
 * @throws {DuplicateDatasetValueError} If a sample or source repeats
 */
export function validateDatasetRows(
  rows: readonly DatasetRow[],
  columns: { sample: string; source: string } = { sample: 'sample', source: 'source' }
): void {
  for (const field of ['source', 'sample'] as const) {
    const seen = new Set<string>();
    rows.forEach((row, i) => {
      const value = row[field];
      if (value === '') {
        throw new EmptyDatasetValueError(columns[field], i + 1);
      }
      if (seen.has(value)) {
        throw new DuplicateDatasetValueError(columns[field], value);
      }
      seen.add(value);
    });
  }
}

/**
 * Read and validate a dataset table from a file.
 */
export async function readDatasetTable(
  filePath: string,
  options: DatasetTableOptions
): Promise<DatasetTable> {
  const text = await fs.readFile(filePath, 'utf-8');
  return parseDatasetTable(text, { ...options, sourceName: options.sourceName ?? filePath });
}
