/**
 * Test Case Store
 * Persistence gateway for test cases, keyed by vuln_id
 */

import type { DatabaseManager } from './sqlite.js';
import { DuplicateKeyError, StorageError, type StorageOperation } from '../errors.js';
import {
  TEXT_FIELDS,
  type BatchUpdateResult,
  type DeleteResult,
  type FindFilter,
  type InsertResult,
  type Platform,
  type SeedResult,
  type StoredTestCase,
  type TestCase,
  type TestCasePatch,
  type UpdateResult,
} from '../types/index.js';

// ============================================
// Types
// ============================================

type Column = string | number | null;

interface TestCaseRow {
  id: number;
  vuln_id: string;
  vuln_name: string;
  platform: Platform;
  analysis_type: string | null;
  owasp_ref: string | null;
  compliance: string | null;
  vuln_abstract: string | null;
  description: string | null;
  recommendation: string | null;
  example: string | null;
  cvss_score: number | null;
  automated: number | null;
}

export interface TestCasePatchInput {
  vuln_id: string;
  fields: TestCasePatch;
}

type PatchOutcome = 'updated' | 'not_found' | 'skipped';

const SELECT_COLUMNS = `
  id, vuln_id, vuln_name, platform, analysis_type, owasp_ref, compliance,
  vuln_abstract, description, recommendation, example, cvss_score, automated
`;

const INSERT_COLUMNS = `
  vuln_id, vuln_name, platform, analysis_type, owasp_ref, compliance,
  vuln_abstract, description, recommendation, example, cvss_score, automated,
  created_at, updated_at
`;

const INSERT_VALUES = `
  @vuln_id, @vuln_name, @platform, @analysis_type, @owasp_ref, @compliance,
  @vuln_abstract, @description, @recommendation, @example, @cvss_score, @automated,
  @now, @now
`;

const DUPLICATE_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

// ============================================
// Row Mapping
// ============================================

function toAutomatedColumn(value: boolean | null | undefined): number | null {
  if (value === undefined || value === null) return null;
  return value ? 1 : 0;
}

function toInsertParams(record: TestCase, now: number): Record<string, Column> {
  const params: Record<string, Column> = {
    vuln_id: record.vuln_id,
    vuln_name: record.vuln_name,
    platform: record.platform,
    cvss_score: record.cvss_score ?? null,
    automated: toAutomatedColumn(record.Automated),
    now,
  };
  for (const field of TEXT_FIELDS) {
    params[field] = record[field] ?? null;
  }
  return params;
}

/**
 * Column assignments for the fields present in a patch
 */
function toPatchColumns(patch: TestCasePatch): Record<string, Column> {
  const columns: Record<string, Column> = {};

  if (patch.vuln_name !== undefined) columns.vuln_name = patch.vuln_name;
  if (patch.platform !== undefined) columns.platform = patch.platform;
  for (const field of TEXT_FIELDS) {
    const value = patch[field];
    if (value !== undefined) columns[field] = value;
  }
  if (patch.cvss_score !== undefined) columns.cvss_score = patch.cvss_score;
  if (patch.Automated !== undefined) columns.automated = toAutomatedColumn(patch.Automated);

  return columns;
}

function fromRow(row: TestCaseRow): StoredTestCase {
  const testCase: StoredTestCase = {
    id: row.id,
    vuln_id: row.vuln_id,
    vuln_name: row.vuln_name,
    platform: row.platform,
  };

  for (const field of TEXT_FIELDS) {
    const value = row[field];
    if (value !== null) testCase[field] = value;
  }
  if (row.cvss_score !== null) testCase.cvss_score = row.cvss_score;
  if (row.automated !== null) testCase.Automated = row.automated === 1;

  return testCase;
}

function isDuplicateKey(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    DUPLICATE_CODES.has(error.code)
  );
}

// ============================================
// Test Case Store
// ============================================

export class TestCaseStore {
  constructor(private db: DatabaseManager) {}

  /**
   * Insert all records in one transaction. Any duplicate vuln_id rolls back the batch.
   */
  insert(records: readonly TestCase[]): InsertResult {
    const now = Date.now();

    try {
      const stmt = this.db.getDb().prepare(`INSERT INTO test_cases (${INSERT_COLUMNS}) VALUES (${INSERT_VALUES})`);
      this.db.transaction(() => {
        for (const record of records) {
          try {
            stmt.run(toInsertParams(record, now));
          } catch (error) {
            if (isDuplicateKey(error)) {
              throw new DuplicateKeyError(record.vuln_id, { cause: error });
            }
            throw error;
          }
        }
      });
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        throw error;
      }
      throw new StorageError('write', { cause: error });
    }

    return { inserted: records.length };
  }

  /**
   * Insert records whose vuln_id is not stored yet; existing keys are skipped
   */
  insertMissing(records: readonly TestCase[]): SeedResult {
    const now = Date.now();

    return this.run('write', () => {
      const stmt = this.db.getDb().prepare(
        `INSERT INTO test_cases (${INSERT_COLUMNS}) VALUES (${INSERT_VALUES})
         ON CONFLICT(vuln_id) DO NOTHING`
      );
      let inserted = 0;
      this.db.transaction(() => {
        for (const record of records) {
          inserted += stmt.run(toInsertParams(record, now)).changes;
        }
      });
      return { inserted, skipped: records.length - inserted };
    });
  }

  /**
   * All test cases in insertion order, optionally restricted to one platform
   */
  find(filter: FindFilter = {}): StoredTestCase[] {
    return this.run('read', () => {
      const db = this.db.getDb();
      const rows = filter.platform === undefined
        ? db.prepare<[], TestCaseRow>(`SELECT ${SELECT_COLUMNS} FROM test_cases ORDER BY id`).all()
        : db.prepare<[Platform], TestCaseRow>(
            `SELECT ${SELECT_COLUMNS} FROM test_cases WHERE platform = ? ORDER BY id`
          ).all(filter.platform);
      return rows.map(fromRow);
    });
  }

  /**
   * Get a single test case by vuln_id
   */
  get(vulnId: string): StoredTestCase | null {
    return this.run('read', () => {
      const row = this.db.getDb().prepare<[string], TestCaseRow>(
        `SELECT ${SELECT_COLUMNS} FROM test_cases WHERE vuln_id = ?`
      ).get(vulnId);
      return row ? fromRow(row) : null;
    });
  }

  /**
   * Set only the supplied fields. A missing key or an empty patch reports updated: 0.
   */
  update(vulnId: string, patch: TestCasePatch): UpdateResult {
    return this.run<UpdateResult>('update', () =>
      this.applyPatch(vulnId, patch) === 'updated' ? { updated: 1 } : { updated: 0 }
    );
  }

  /**
   * Apply each patch independently; unmatched keys are collected in request order.
   * Empty patches are skipped and appear in neither list.
   */
  batchUpdate(patches: readonly TestCasePatchInput[]): BatchUpdateResult {
    return this.run('update', () => {
      const result: BatchUpdateResult = { updated: 0, not_found: [] };
      this.db.transaction(() => {
        for (const { vuln_id: vulnId, fields } of patches) {
          const outcome = this.applyPatch(vulnId, fields);
          if (outcome === 'updated') {
            result.updated++;
          } else if (outcome === 'not_found') {
            result.not_found.push(vulnId);
          }
        }
      });
      return result;
    });
  }

  /**
   * Delete by key set; keys that do not exist are not counted
   */
  delete(vulnIds: readonly string[]): DeleteResult {
    if (vulnIds.length === 0) {
      return { deleted_count: 0 };
    }

    return this.run('delete', () => {
      const info = this.db.getDb().prepare<[string]>(
        'DELETE FROM test_cases WHERE vuln_id IN (SELECT value FROM json_each(?))'
      ).run(JSON.stringify(vulnIds));
      return { deleted_count: info.changes };
    });
  }

  count(): number {
    return this.run('read', () => {
      const row = this.db.getDb().prepare<[], { count: number }>(
        'SELECT COUNT(*) as count FROM test_cases'
      ).get();
      return row?.count ?? 0;
    });
  }

  private applyPatch(vulnId: string, patch: TestCasePatch): PatchOutcome {
    const db = this.db.getDb();
    const columns = toPatchColumns(patch);
    const names = Object.keys(columns);

    if (names.length === 0) {
      return 'skipped';
    }

    const assignments = names.map((name) => `${name} = @${name}`).join(', ');
    const info = db.prepare(
      `UPDATE test_cases SET ${assignments}, updated_at = @updated_at WHERE vuln_id = @key`
    ).run({ ...columns, updated_at: Date.now(), key: vulnId });
    return info.changes > 0 ? 'updated' : 'not_found';
  }

  private run<T>(operation: StorageOperation, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StorageError(operation, { cause: error });
    }
  }
}
