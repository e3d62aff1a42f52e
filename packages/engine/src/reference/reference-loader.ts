/**
 * Reference file loaders
 *
 * Mapping tables arrive as CSV (source_code, canonical_code or target_code,
 * optional table_version) or as a JSON array of entries.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { ReferenceEntry } from '@causeway/core';
import { ReferenceLoadError, formatZodError } from '@causeway/core';

export interface ReferenceFileOptions {
  /** Version given to rows that carry none */
  defaultVersion?: string;
  /** CSV delimiter (default: ',') */
  delimiter?: string;
}

const SOURCE_COLUMNS = ['source_code'];
const CANONICAL_COLUMNS = ['canonical_code', 'target_code'];
const VERSION_COLUMNS = ['table_version'];

const csvRowsSchema = z.array(z.array(z.string()));

const jsonEntriesSchema = z.array(
  z.object({
    sourceCode: z.string().trim().min(1),
    canonicalCode: z.string().trim().min(1),
    tableVersion: z.string().trim().min(1).optional(),
  })
);

function findColumn(headers: string[], candidates: string[]): number {
  return headers.findIndex((h) => candidates.includes(h.toLowerCase()));
}

function requireVersion(
  rowVersion: string | undefined,
  options: ReferenceFileOptions | undefined,
  position: number
): string {
  const version = rowVersion && rowVersion.length > 0 ? rowVersion : options?.defaultVersion;
  if (!version) {
    throw new ReferenceLoadError({
      message: `Reference row ${position} has no table version`,
      suggestion: 'Add a table_version column or pass defaultVersion.',
      context: { position },
    });
  }
  return version;
}

/**
 * Parse a CSV mapping table into reference entries
 */
export function parseReferenceCsv(
  content: string | Buffer,
  options?: ReferenceFileOptions
): ReferenceEntry[] {
  let raw: unknown;
  try {
    raw = parse(content, {
      delimiter: options?.delimiter ?? ',',
      skip_empty_lines: true,
      trim: true,
      bom: true,
      // Codes such as "001" must stay strings
      cast: false,
    });
  } catch (err) {
    throw new ReferenceLoadError({
      message: `Failed to parse reference CSV: ${err instanceof Error ? err.message : String(err)}`,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const rows = csvRowsSchema.parse(raw);
  const [headerRow, ...dataRows] = rows;
  if (!headerRow) return [];

  const sourceIdx = findColumn(headerRow, SOURCE_COLUMNS);
  const canonicalIdx = findColumn(headerRow, CANONICAL_COLUMNS);
  const versionIdx = findColumn(headerRow, VERSION_COLUMNS);

  if (sourceIdx === -1 || canonicalIdx === -1) {
    throw new ReferenceLoadError({
      message: `Reference CSV is missing required columns (found: ${headerRow.join(', ')})`,
      suggestion: 'Expected source_code and canonical_code (or target_code) columns.',
    });
  }

  return dataRows.map((row, i) => {
    const position = i + 1;
    const sourceCode = row[sourceIdx] ?? '';
    const canonicalCode = row[canonicalIdx] ?? '';
    if (!sourceCode || !canonicalCode) {
      throw new ReferenceLoadError({
        message: `Reference row ${position} has an empty code`,
        context: { position },
      });
    }
    const tableVersion = requireVersion(
      versionIdx === -1 ? undefined : row[versionIdx],
      options,
      position
    );
    return { sourceCode, canonicalCode, tableVersion };
  });
}

/**
 * Parse a JSON array of `{ sourceCode, canonicalCode, tableVersion? }`
 */
export function parseReferenceJson(
  content: string,
  options?: ReferenceFileOptions
): ReferenceEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ReferenceLoadError({
      message: 'Reference JSON is not valid JSON',
      cause: err instanceof Error ? err : undefined,
    });
  }

  const parsed = jsonEntriesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ReferenceLoadError({
      message: formatZodError('Invalid reference entries', parsed.error),
    });
  }

  return parsed.data.map((entry, i) => ({
    sourceCode: entry.sourceCode,
    canonicalCode: entry.canonicalCode,
    tableVersion: requireVersion(entry.tableVersion, options, i + 1),
  }));
}

/**
 * Read a `.csv` or `.json` reference file from disk
 */
export async function loadReferenceFile(
  filePath: string,
  options?: ReferenceFileOptions
): Promise<ReferenceEntry[]> {
  const ext = extname(filePath).toLowerCase();
  if (ext !== '.csv' && ext !== '.json') {
    throw new ReferenceLoadError({
      message: `Unsupported reference file type: ${ext || '(none)'}`,
      suggestion: 'Use a .csv or .json mapping file.',
    });
  }

  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ReferenceLoadError({
      message: `Cannot read reference file: ${filePath}`,
      cause: err instanceof Error ? err : undefined,
      suggestion: 'Check the path and file permissions.',
    });
  }

  return ext === '.csv'
    ? parseReferenceCsv(content, options)
    : parseReferenceJson(content.replace(/^\uFEFF/, ''), options);
}
