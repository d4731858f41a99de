/**
 * Test Case Validator
 * Per-field rules composed into record, patch and batch validators.
 *
 * Each rule is a small zod schema plus the message reported when it fails.
 * Errors accumulate in field declaration order instead of stopping at the first.
 */

import { z } from 'zod';
import {
  PLATFORMS,
  TEXT_FIELDS,
  type FieldError,
  type Platform,
  type TestCase,
  type TestCasePatch,
  type ValidationResult,
} from '../types/index.js';

// ============================================
// Messages
// ============================================

export const MESSAGES = {
  required: 'Missing data for required field.',
  nullValue: 'Field may not be null.',
  emptyValue: 'Field may not be empty.',
  notString: 'Not a valid string.',
  notNumber: 'Not a valid number.',
  cvssRange: 'cvss_score must be between 0.0 and 10.0',
  platform: `Must be one of: ${PLATFORMS.join(', ')}.`,
  automated: 'Must be a boolean or one of: yes, no.',
  unknownField: 'Unknown field.',
  notObject: 'Invalid input type.',
} as const;

// ============================================
// Field Rules
// ============================================

interface FieldRule<T> {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** null is accepted (and later omitted) instead of rejected */
  nullable: boolean;
  message: (issue: z.ZodIssue | undefined) => string;
}

const PLATFORM_LOOKUP = new Map<string, Platform>(
  PLATFORMS.map((platform) => [platform.toLowerCase(), platform])
);

function typeOr(typeMessage: string): (issue: z.ZodIssue | undefined) => string {
  return (issue) =>
    !issue || issue.code === z.ZodIssueCode.invalid_type || issue.code === z.ZodIssueCode.invalid_union
      ? typeMessage
      : issue.message;
}

const keyRule: FieldRule<string> = {
  schema: z.string().refine((value) => value.trim().length > 0, MESSAGES.emptyValue),
  nullable: false,
  message: typeOr(MESSAGES.notString),
};

const platformRule: FieldRule<Platform> = {
  schema: z
    .string()
    .transform((value) => PLATFORM_LOOKUP.get(value.trim().toLowerCase()))
    .pipe(z.enum(PLATFORMS)),
  nullable: false,
  message: () => MESSAGES.platform,
};

const textRule: FieldRule<string> = {
  schema: z.string(),
  nullable: false,
  message: () => MESSAGES.notString,
};

// Decimal notation only; Number() alone would also take '', '0x5' and '0b1'
const DECIMAL = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

const cvssRule: FieldRule<number | null> = {
  schema: z
    .union([
      z.number(),
      z.string().regex(DECIMAL, MESSAGES.notNumber).transform(Number),
    ])
    .pipe(z.number().min(0, MESSAGES.cvssRange).max(10, MESSAGES.cvssRange))
    .nullable(),
  nullable: true,
  message: typeOr(MESSAGES.notNumber),
};

const automatedRule: FieldRule<boolean | null> = {
  schema: z
    .union([
      z.boolean(),
      z
        .string()
        .transform((value) => value.trim().toLowerCase())
        .pipe(z.enum(['yes', 'no']))
        .transform((value) => value === 'yes'),
    ])
    .nullable(),
  nullable: true,
  message: () => MESSAGES.automated,
};

const KNOWN_FIELDS: ReadonlySet<string> = new Set([
  'vuln_id',
  'vuln_name',
  'platform',
  ...TEXT_FIELDS,
  'cvss_score',
  'Automated',
]);

// ============================================
// Composition
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class FieldCollector {
  readonly errors: FieldError[] = [];

  constructor(private raw: Record<string, unknown>) {}

  /**
   * Validate one field when present; report it missing when required.
   * `assign` receives the normalized value.
   */
  check<T>(field: string, rule: FieldRule<T>, required: boolean, assign: (value: T) => void): void {
    const value = this.raw[field];

    if (value === undefined) {
      if (required) {
        this.errors.push({ field, message: MESSAGES.required });
      }
      return;
    }

    if (value === null && !rule.nullable) {
      this.errors.push({ field, message: MESSAGES.nullValue });
      return;
    }

    const parsed = rule.schema.safeParse(value);
    if (parsed.success) {
      assign(parsed.data);
    } else {
      this.errors.push({ field, message: rule.message(parsed.error.issues[0]) });
    }
  }

  rejectUnknown(): void {
    for (const field of Object.keys(this.raw)) {
      if (!KNOWN_FIELDS.has(field)) {
        this.errors.push({ field, message: MESSAGES.unknownField });
      }
    }
  }
}

type OptionalFields = Omit<TestCasePatch, 'vuln_name' | 'platform'>;

interface Collected {
  vuln_id?: string;
  vuln_name?: string;
  platform?: Platform;
  optional: OptionalFields;
  errors: FieldError[];
}

/**
 * Run every field rule over `raw` in declaration order.
 * vuln_id is always required; vuln_name and platform only when `requireAll`.
 */
function collect(raw: Record<string, unknown>, requireAll: boolean): Collected {
  const collector = new FieldCollector(raw);
  const out: Collected = { optional: {}, errors: collector.errors };

  collector.check('vuln_id', keyRule, true, (value) => {
    out.vuln_id = value;
  });
  collector.check('vuln_name', keyRule, requireAll, (value) => {
    out.vuln_name = value;
  });
  collector.check('platform', platformRule, requireAll, (value) => {
    out.platform = value;
  });
  for (const field of TEXT_FIELDS) {
    collector.check(field, textRule, false, (value) => {
      out.optional[field] = value;
    });
  }
  collector.check('cvss_score', cvssRule, false, (value) => {
    out.optional.cvss_score = value;
  });
  collector.check('Automated', automatedRule, false, (value) => {
    out.optional.Automated = value;
  });
  collector.rejectUnknown();

  return out;
}

// ============================================
// Public Validators
// ============================================

/**
 * Validate and normalize a full record
 */
export function validateTestCase(raw: unknown): ValidationResult<TestCase> {
  if (!isRecord(raw)) {
    return { ok: false, errors: [{ field: '_schema', message: MESSAGES.notObject }] };
  }

  const { vuln_id, vuln_name, platform, optional, errors } = collect(raw, true);
  if (errors.length > 0 || vuln_id === undefined || vuln_name === undefined || platform === undefined) {
    return { ok: false, errors };
  }
  return { ok: true, value: { ...optional, vuln_id, vuln_name, platform } };
}

export interface ValidatedPatch {
  vuln_id: string;
  fields: TestCasePatch;
}

/**
 * Validate a partial update: vuln_id plus only the fields supplied
 */
export function validatePatch(raw: unknown): ValidationResult<ValidatedPatch> {
  if (!isRecord(raw)) {
    return { ok: false, errors: [{ field: '_schema', message: MESSAGES.notObject }] };
  }

  const { vuln_id, vuln_name, platform, optional, errors } = collect(raw, false);
  if (errors.length > 0 || vuln_id === undefined) {
    return { ok: false, errors };
  }

  const fields: TestCasePatch = { ...optional };
  if (vuln_name !== undefined) fields.vuln_name = vuln_name;
  if (platform !== undefined) fields.platform = platform;
  return { ok: true, value: { vuln_id, fields } };
}

/**
 * Validate every element; any failure fails the batch with index-tagged errors
 */
export function validateBatch<T>(
  items: readonly unknown[],
  validateOne: (raw: unknown) => ValidationResult<T>
): ValidationResult<T[]> {
  const values: T[] = [];
  const errors: FieldError[] = [];

  items.forEach((item, index) => {
    const result = validateOne(item);
    if (result.ok) {
      values.push(result.value);
    } else {
      errors.push(...result.errors.map((error) => ({ ...error, index })));
    }
  });

  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: values };
}

/**
 * Canonical platform for a case-insensitive input, or null when not recognised
 */
export function normalizePlatform(value: unknown): Platform | null {
  const parsed = platformRule.schema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
