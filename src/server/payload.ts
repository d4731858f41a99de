/**
 * Request body shapes accepted by the test case routes
 */

import { BadRequestError, ValidationError } from '../errors.js';
import { MESSAGES } from '../schemas/test-case.js';
import type { FieldError } from '../types/index.js';

/** A body carrying one item, or several in a batch */
export type Items =
  | { batch: false; item: unknown }
  | { batch: true; items: unknown[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function batchOf(body: unknown): unknown[] | null {
  if (Array.isArray(body)) return body;
  if (isRecord(body) && Array.isArray(body.test_cases)) return body.test_cases;
  return null;
}

function requireBody(body: unknown): void {
  if (body === undefined || body === null) {
    throw new BadRequestError('Invalid or missing JSON');
  }
}

/**
 * POST: a record, { test_cases: [...] }, or a non-empty bare array
 */
export function insertItems(body: unknown): Items {
  requireBody(body);

  const items = batchOf(body);
  if (items) {
    if (items.length === 0) {
      throw new BadRequestError('No test cases to insert');
    }
    return { batch: true, items };
  }
  if (isRecord(body)) return { batch: false, item: body };
  throw new BadRequestError('Payload must be an object or array');
}

/**
 * PUT: a patch with vuln_id, { test_cases: [...] }, or a bare array
 */
export function updateItems(body: unknown): Items {
  requireBody(body);

  const items = batchOf(body);
  if (items) return { batch: true, items };
  if (isRecord(body) && 'vuln_id' in body) return { batch: false, item: body };
  throw new BadRequestError('Payload must be object/array or contain vuln_id');
}

/**
 * DELETE: { vuln_id }, { vuln_ids: [...] }, { test_cases: [{ vuln_id }] },
 * or a bare array of ids and objects carrying vuln_id
 */
export function deleteKeys(body: unknown): string[] {
  requireBody(body);

  let candidates: unknown[];
  let field: string;

  if (isRecord(body) && Array.isArray(body.vuln_ids)) {
    candidates = body.vuln_ids;
    field = 'vuln_ids';
  } else if (Array.isArray(body)) {
    candidates = body.map((entry) => (isRecord(entry) ? entry.vuln_id : entry));
    field = 'vuln_id';
  } else if (isRecord(body) && Array.isArray(body.test_cases)) {
    candidates = body.test_cases.filter(isRecord).map((entry) => entry.vuln_id);
    field = 'vuln_id';
  } else if (isRecord(body) && 'vuln_id' in body) {
    candidates = [body.vuln_id];
    field = 'vuln_id';
  } else {
    throw new BadRequestError('Provide vuln_ids list or test_cases array or vuln_id');
  }

  const keys: string[] = [];
  const errors: FieldError[] = [];
  candidates.forEach((candidate, index) => {
    if (candidate === undefined) return;
    if (typeof candidate === 'string') {
      keys.push(candidate);
    } else {
      errors.push({ field, message: MESSAGES.notString, index });
    }
  });

  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
  if (keys.length === 0) {
    throw new BadRequestError('No vuln_ids found to delete');
  }
  return keys;
}
