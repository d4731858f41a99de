/**
 * Storage Module Exports
 */

export {
  DatabaseManager,
  type DatabaseConfig,
  type MigrationInfo,
} from './sqlite.js';

export {
  TestCaseStore,
  type TestCasePatchInput,
} from './test-case-store.js';
