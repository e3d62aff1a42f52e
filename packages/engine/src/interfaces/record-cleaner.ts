/**
 * Record Cleaner Interface
 *
 * External cleaning stage run before resolution. Returning null drops the row.
 */

import type { Fields } from '@causeway/core';

export interface RecordCleaner {
  clean(fields: Readonly<Fields>, index: number): Promise<Fields | null> | Fields | null;
}
