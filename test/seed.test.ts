/**
 * Tests for loading sample data
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import * as os from 'os';
import * as fs from 'fs';
import { DatabaseManager } from '../src/storage/sqlite.js';
import { TestCaseStore } from '../src/storage/test-case-store.js';
import { seedFromFile } from '../src/seed.js';

describe('seedFromFile', () => {
  let tmpDir: string;
  let db: DatabaseManager;
  let store: TestCaseStore;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vulncase-seed-test-'));
    db = new DatabaseManager({ path: ':memory:' });
    db.initialize();
    store = new TestCaseStore(db);
  });

  afterEach(() => {
    db.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('inserts valid entries and skips invalid ones', async () => {
    const file = path.join(tmpDir, 'cases.json');
    fs.writeFileSync(file, JSON.stringify({
      test_cases: [
        { vuln_id: 'S1', vuln_name: 'One', platform: 'llm', Automated: 'yes' },
        { vuln_id: 'S2', vuln_name: 'Two', platform: 'unknown' },
        { vuln_id: 'S3', vuln_name: 'Three', platform: 'web' },
      ],
    }));

    expect(await seedFromFile(store, file)).toEqual({ inserted: 2, skipped: 0, invalid: 1 });
    expect(store.get('S1')?.platform).toBe('LLM');
    expect(store.get('S1')?.Automated).toBe(true);

    expect(await seedFromFile(store, file)).toEqual({ inserted: 0, skipped: 2, invalid: 1 });
    expect(store.count()).toBe(2);
  });

  it('reports a missing file without throwing', async () => {
    expect(await seedFromFile(store, path.join(tmpDir, 'absent.json'))).toEqual({
      inserted: 0,
      skipped: 0,
      invalid: 0,
    });
  });

  it('ignores files without a test_cases array', async () => {
    const file = path.join(tmpDir, 'cases.json');
    fs.writeFileSync(file, JSON.stringify([{ vuln_id: 'S1', vuln_name: 'One', platform: 'web' }]));

    expect(await seedFromFile(store, file)).toEqual({ inserted: 0, skipped: 0, invalid: 0 });
  });

  it('loads the bundled sample file', async () => {
    const summary = await seedFromFile(store, path.resolve('sample/test_cases.json'));

    expect(summary).toEqual({ inserted: 4, skipped: 0, invalid: 0 });
    expect(store.find({ platform: 'mobile' }).map((t) => t.vuln_id)).toEqual(['TCS_MOB_001']);
  });
});
