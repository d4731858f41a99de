/**
 * Tests for the SQLite database manager and the test case store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DatabaseManager } from '../src/storage/sqlite.js';
import { TestCaseStore } from '../src/storage/test-case-store.js';
import { DuplicateKeyError, StorageError } from '../src/errors.js';
import type { TestCase } from '../src/types/index.js';
import * as path from 'path';
import * as os from 'os';
import * as fs from 'fs';

function testCase(vulnId: string, overrides: Partial<TestCase> = {}): TestCase {
  return { vuln_id: vulnId, vuln_name: `Case ${vulnId}`, platform: 'web', ...overrides };
}

describe('DatabaseManager', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vulncase-db-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates the directory and applies migrations once', () => {
    const dbPath = path.join(tmpDir, 'nested', 'test.db');

    const first = new DatabaseManager({ path: dbPath });
    first.initialize();
    first.initialize();
    expect(fs.existsSync(dbPath)).toBe(true);
    expect(first.getMigrations().map((m) => m.version)).toEqual([1, 2]);
    first.close();

    const second = new DatabaseManager({ path: dbPath });
    second.initialize();
    expect(second.getMigrations().map((m) => m.version)).toEqual([1, 2]);
    second.close();
  });

  it('declares a unique index on vuln_id', () => {
    const db = new DatabaseManager({ path: ':memory:' });
    db.initialize();

    const index = db.getDb().prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'index' AND name = 'uniq_vuln_id'"
    ).get();
    expect(index?.name).toBe('uniq_vuln_id');

    const insert = db.getDb().prepare(
      "INSERT INTO test_cases (vuln_id, vuln_name, platform, created_at, updated_at) VALUES ('D1', 'x', 'web', 0, 0)"
    );
    insert.run();
    expect(() => insert.run()).toThrow(/UNIQUE constraint failed/);

    db.close();
  });

  it('throws from getDb before initialize and after close', () => {
    const db = new DatabaseManager({ path: ':memory:' });
    expect(() => db.getDb()).toThrow('Database not initialized');
    expect(db.isInitialized()).toBe(false);

    db.initialize();
    expect(() => db.ping()).not.toThrow();
    db.close();

    expect(() => db.ping()).toThrow('Database not initialized');
  });
});

describe('TestCaseStore', () => {
  let db: DatabaseManager;
  let store: TestCaseStore;

  beforeEach(() => {
    db = new DatabaseManager({ path: ':memory:' });
    db.initialize();
    store = new TestCaseStore(db);
  });

  afterEach(() => {
    db.close();
  });

  describe('insert', () => {
    it('inserts a batch and reads it back in order', () => {
      expect(store.insert([testCase('A'), testCase('B', { platform: 'LLM' })])).toEqual({ inserted: 2 });

      expect(store.find()).toEqual([
        { id: 1, vuln_id: 'A', vuln_name: 'Case A', platform: 'web' },
        { id: 2, vuln_id: 'B', vuln_name: 'Case B', platform: 'LLM' },
      ]);
    });

    it('round-trips every field', () => {
      const full: TestCase = {
        vuln_id: 'F1',
        vuln_name: 'Full',
        platform: 'mobile',
        analysis_type: 'Static',
        owasp_ref: 'M9',
        compliance: 'MASVS',
        vuln_abstract: 'abstract',
        description: 'description',
        recommendation: 'recommendation',
        example: 'example',
        cvss_score: 5.5,
        Automated: false,
      };
      store.insert([full]);

      expect(store.get('F1')).toEqual({ id: 1, ...full });
    });

    it('rejects an existing vuln_id and keeps nothing of the batch', () => {
      store.insert([testCase('A')]);

      let thrown: unknown;
      try {
        store.insert([testCase('C'), testCase('A')]);
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(DuplicateKeyError);
      expect(thrown instanceof DuplicateKeyError && thrown.vulnId).toBe('A');
      expect(store.count()).toBe(1);
      expect(store.get('C')).toBeNull();
    });

    it('rejects a vuln_id repeated inside the batch', () => {
      expect(() => store.insert([testCase('X'), testCase('X')])).toThrow(DuplicateKeyError);
      expect(store.count()).toBe(0);
    });
  });

  describe('insertMissing', () => {
    it('skips keys that already exist', () => {
      store.insert([testCase('A', { vuln_name: 'Original' })]);

      expect(store.insertMissing([testCase('A', { vuln_name: 'Replacement' }), testCase('B')])).toEqual({
        inserted: 1,
        skipped: 1,
      });
      expect(store.get('A')?.vuln_name).toBe('Original');
      expect(store.count()).toBe(2);
    });
  });

  describe('find', () => {
    it('filters by platform', () => {
      store.insert([testCase('A'), testCase('B', { platform: 'API' }), testCase('C')]);

      expect(store.find({ platform: 'web' }).map((t) => t.vuln_id)).toEqual(['A', 'C']);
      expect(store.find({ platform: 'API' }).map((t) => t.vuln_id)).toEqual(['B']);
      expect(store.find({ platform: 'LLM' })).toEqual([]);
    });
  });

  describe('update', () => {
    beforeEach(() => {
      store.insert([testCase('A', { description: 'keep me', cvss_score: 3 })]);
    });

    it('merges only the supplied fields', () => {
      expect(store.update('A', { cvss_score: 7.5, Automated: true })).toEqual({ updated: 1 });

      expect(store.get('A')).toEqual({
        id: 1,
        vuln_id: 'A',
        vuln_name: 'Case A',
        platform: 'web',
        description: 'keep me',
        cvss_score: 7.5,
        Automated: true,
      });
    });

    it('clears a nullable field set to null', () => {
      store.update('A', { cvss_score: null });

      expect(store.get('A')?.cvss_score).toBeUndefined();
    });

    it('reports updated: 0 for an unknown key', () => {
      expect(store.update('ZZZ', { cvss_score: 1 })).toEqual({ updated: 0 });
    });

    it('skips an empty patch', () => {
      expect(store.update('A', {})).toEqual({ updated: 0 });
      expect(store.update('ZZZ', {})).toEqual({ updated: 0 });
      expect(store.get('A')?.description).toBe('keep me');
    });
  });

  describe('batchUpdate', () => {
    it('collects unmatched keys without aborting', () => {
      store.insert([testCase('A'), testCase('B')]);

      const result = store.batchUpdate([
        { vuln_id: 'A', fields: { owasp_ref: 'A01' } },
        { vuln_id: 'ZZZ', fields: { owasp_ref: 'A02' } },
        { vuln_id: 'B', fields: { platform: 'LLM' } },
      ]);

      expect(result).toEqual({ updated: 2, not_found: ['ZZZ'] });
      expect(store.get('A')?.owasp_ref).toBe('A01');
      expect(store.get('B')?.platform).toBe('LLM');
    });

    it('counts empty patches in neither list', () => {
      store.insert([testCase('A')]);

      expect(store.batchUpdate([
        { vuln_id: 'A', fields: {} },
        { vuln_id: 'ZZZ', fields: {} },
      ])).toEqual({ updated: 0, not_found: [] });
    });
  });

  describe('delete', () => {
    it('counts only keys that existed', () => {
      store.insert([testCase('A'), testCase('B')]);

      expect(store.delete(['A', 'nope'])).toEqual({ deleted_count: 1 });
      expect(store.find().map((t) => t.vuln_id)).toEqual(['B']);
    });

    it('is idempotent for missing keys', () => {
      expect(store.delete(['nope'])).toEqual({ deleted_count: 0 });
      expect(store.delete([])).toEqual({ deleted_count: 0 });
    });
  });

  describe('storage failures', () => {
    it('wraps driver errors in StorageError', () => {
      db.close();

      expect(() => store.find()).toThrow(StorageError);
      expect(() => store.insert([testCase('A')])).toThrow(StorageError);

      let thrown: unknown;
      try {
        store.delete(['A']);
      } catch (error) {
        thrown = error;
      }
      expect(thrown instanceof StorageError && thrown.operation).toBe('delete');
    });
  });
});
