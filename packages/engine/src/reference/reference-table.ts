/**
 * Reference Table
 *
 * Versioned exact-match table from source codes to canonical codes. The table
 * is pinned to one version when it is loaded and is read-only afterwards.
 */

import type { CatalogEntry, ReferenceEntry } from '@causeway/core';
import { ReferenceLoadError } from '@causeway/core';
import type { ReferenceLookup } from '../interfaces/index.js';

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim().length === 0;
}

export class ReferenceTable implements ReferenceLookup {
  private constructor(
    readonly version: string,
    private readonly codes: ReadonlyMap<string, string>,
    /** Every version present in the loaded entries, sorted */
    readonly availableVersions: readonly string[]
  ) {}

  /**
   * Build a table pinned to `version`.
   *
   * Fails when an entry is malformed, a source code repeats within one
   * version, or no entry carries the requested version.
   */
  static load(entries: Iterable<ReferenceEntry>, version: string): ReferenceTable {
    if (isBlank(version)) {
      throw new ReferenceLoadError({
        message: 'Reference table version must be a non-empty string',
        suggestion: 'Set strategies.direct.tableVersion in the run configuration.',
      });
    }

    const byVersion = new Map<string, Map<string, string>>();
    let index = 0;

    for (const entry of entries) {
      if (isBlank(entry.sourceCode) || isBlank(entry.canonicalCode) || isBlank(entry.tableVersion)) {
        throw new ReferenceLoadError({
          message: `Malformed reference entry at position ${index}`,
          suggestion: 'Every entry needs a non-empty sourceCode, canonicalCode and tableVersion.',
          context: { index },
        });
      }

      let codes = byVersion.get(entry.tableVersion);
      if (!codes) {
        codes = new Map();
        byVersion.set(entry.tableVersion, codes);
      }

      if (codes.has(entry.sourceCode)) {
        throw new ReferenceLoadError({
          message: `Duplicate source code '${entry.sourceCode}' in table version ${entry.tableVersion}`,
          suggestion: 'Each source code may map to exactly one canonical code per version.',
          context: { index, sourceCode: entry.sourceCode, tableVersion: entry.tableVersion },
        });
      }
      codes.set(entry.sourceCode, entry.canonicalCode);
      index++;
    }

    const available = Array.from(byVersion.keys()).sort();
    const pinned = byVersion.get(version);
    if (!pinned) {
      throw new ReferenceLoadError({
        message: `Reference table version '${version}' not found`,
        suggestion:
          available.length > 0
            ? `Available versions: ${available.join(', ')}`
            : 'The reference table is empty.',
        context: { version, available },
      });
    }

    return new ReferenceTable(version, pinned, available);
  }

  get size(): number {
    return this.codes.size;
  }

  lookup(sourceCode: string, version?: string): string | undefined {
    if (version !== undefined && version !== this.version) {
      throw new ReferenceLoadError({
        message: `Reference table is pinned to version '${this.version}', got '${version}'`,
        suggestion: 'A run resolves against a single table version.',
        context: { pinned: this.version, requested: version },
      });
    }
    return this.codes.get(sourceCode);
  }

  toCatalog(): CatalogEntry[] {
    const distinct = new Set(this.codes.values());
    return Array.from(distinct)
      .sort()
      .map((canonicalCode) => ({ canonicalCode }));
  }
}
