/**
 * Reference Lookup Interface
 *
 * Exact lookup of a source code against a pinned reference table version.
 */

import type { CatalogEntry } from '@causeway/core';

export interface ReferenceLookup {
  /** Version pinned for the whole run */
  readonly version: string;

  /**
   * Canonical code mapped to `sourceCode`, or undefined on a miss.
   *
   * @param version - Must equal the pinned version when given
   */
  lookup(sourceCode: string, version?: string): string | undefined;

  /** Distinct canonical codes, for matchers built without a separate catalog */
  toCatalog(): CatalogEntry[];
}
