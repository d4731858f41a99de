/**
 * Sample data loader
 * Reads { test_cases: [...] } from a JSON file and inserts the valid, not-yet-stored records
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { validateTestCase } from './schemas/test-case.js';
import type { TestCaseStore } from './storage/test-case-store.js';
import type { TestCase } from './types/index.js';
import { logger } from './utils/logger.js';

export interface SeedSummary {
  inserted: number;
  skipped: number;
  invalid: number;
}

function entriesOf(data: unknown): unknown[] {
  if (typeof data === 'object' && data !== null && 'test_cases' in data && Array.isArray(data.test_cases)) {
    return data.test_cases;
  }
  return [];
}

/**
 * Load the sample file into the store. A missing file is reported, not thrown.
 */
export async function seedFromFile(store: TestCaseStore, samplePath: string): Promise<SeedSummary> {
  if (!existsSync(samplePath)) {
    logger.warn('seed.file_missing', { path: samplePath });
    return { inserted: 0, skipped: 0, invalid: 0 };
  }

  const data: unknown = JSON.parse(await readFile(samplePath, 'utf-8'));
  const records: TestCase[] = [];
  let invalid = 0;

  entriesOf(data).forEach((entry, index) => {
    const result = validateTestCase(entry);
    if (result.ok) {
      records.push(result.value);
    } else {
      invalid++;
      logger.warn('seed.invalid_entry', { index, errors: result.errors });
    }
  });

  if (records.length === 0) {
    logger.warn('seed.empty', { path: samplePath });
    return { inserted: 0, skipped: 0, invalid };
  }

  const { inserted, skipped } = store.insertMissing(records);
  const summary = { inserted, skipped, invalid };
  logger.info('seed.complete', { path: samplePath, ...summary });
  return summary;
}
