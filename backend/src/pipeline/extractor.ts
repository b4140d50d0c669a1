import { promises as fsp } from 'node:fs';
import Papa, { type ParseResult } from 'papaparse';
import { ParseError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { DatasetDefinition, RawRow } from './dataset.js';

function parseCsv(input: string): ParseResult<string[]> {
  return Papa.parse<string[]>(input.replace(/^\uFEFF/, ''), {
    delimiter: ',',
    skipEmptyLines: true,
    transform: (value) => value.trim(),
  });
}

/**
 * Reads a CSV file with a header row into raw rows keyed by header. Any
 * problem aborts the extraction; no row is skipped.
 */
export async function extractRows(filePath: string, dataset: DatasetDefinition, logger?: Logger): Promise<RawRow[]> {
  let contents: string;
  try {
    contents = await fsp.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ParseError(`cannot read ${filePath}`, { cause: error });
  }

  const { data: records, errors } = parseCsv(contents);
  if (errors.length) {
    const [first] = errors;
    throw new ParseError(`malformed CSV in ${filePath}: ${first.message} (row ${first.row ?? '?'})`, {
      details: { errors },
    });
  }

  const [header, ...body] = records;
  if (!header) {
    throw new ParseError(`${filePath} has no header row`);
  }

  const duplicates = header.filter((field, index) => header.indexOf(field) !== index);
  if (duplicates.length) {
    throw new ParseError(`header repeats ${duplicates.join(', ')}`);
  }

  const missing = dataset.columns.map((column) => column.field).filter((field) => !header.includes(field));
  if (missing.length) {
    throw new ParseError(`header mismatch: missing ${missing.join(', ')}`, { details: { header } });
  }

  const known = new Set(dataset.columns.map((column) => column.field));
  const extra = header.filter((field) => !known.has(field));
  if (extra.length) {
    logger?.warn({ extra }, 'ignoring columns not in the dataset definition');
  }

  return body.map((record, index) => {
    if (record.length !== header.length) {
      throw new ParseError(`record ${index + 1} has ${record.length} fields, expected ${header.length}`);
    }
    const row: RawRow = {};
    header.forEach((field, position) => {
      const value = record[position];
      row[field] = value === '' ? null : value;
    });
    return row;
  });
}
