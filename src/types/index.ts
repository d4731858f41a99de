/**
 * Core types for the vulnerability test case API
 */

// ============================================
// Test Cases
// ============================================

export const PLATFORMS = ['LLM', 'web', 'mobile', 'API'] as const;

export type Platform = (typeof PLATFORMS)[number];

/** Optional free-text attributes, in declaration order */
export const TEXT_FIELDS = [
  'analysis_type',
  'owasp_ref',
  'compliance',
  'vuln_abstract',
  'description',
  'recommendation',
  'example',
] as const;

export type TextField = (typeof TEXT_FIELDS)[number];

export interface TestCase {
  /** Caller-assigned identifier, unique across the collection */
  vuln_id: string;
  vuln_name: string;
  platform: Platform;
  analysis_type?: string;
  owasp_ref?: string;
  compliance?: string;
  vuln_abstract?: string;
  description?: string;
  recommendation?: string;
  example?: string;
  /** 0.0 - 10.0 inclusive */
  cvss_score?: number | null;
  Automated?: boolean | null;
}

export type TestCaseField = keyof TestCase;

/** Fields a partial update may carry besides the key */
export type TestCasePatch = Partial<Omit<TestCase, 'vuln_id'>>;

/** A TestCase as read back from the store */
export interface StoredTestCase extends TestCase {
  /** Store-assigned identifier, distinct from vuln_id */
  id: number;
}

// ============================================
// Validation
// ============================================

export interface FieldError {
  field: string;
  message: string;
  /** Position of the offending element in a batch */
  index?: number;
}

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: FieldError[] };

// ============================================
// Gateway Results
// ============================================

export interface InsertResult {
  inserted: number;
}

export interface SeedResult {
  inserted: number;
  skipped: number;
}

export interface UpdateResult {
  updated: 0 | 1;
}

export interface BatchUpdateResult {
  updated: number;
  not_found: string[];
}

export interface DeleteResult {
  deleted_count: number;
}

export interface FindFilter {
  platform?: Platform;
}
