/**
 * Schema Validator
 *
 * Checks a parsed document against a zod schema and reports the first
 * failing node. Never mutates the document: zod hands back a fresh copy.
 */

import type { z, ZodIssue } from 'zod';
import { SchemaValidationError } from './errors.js';
import { ok, err, type Result } from './result.js';

export function validate<S extends z.ZodTypeAny>(
  document: unknown,
  schema: S
): Result<z.output<S>, SchemaValidationError> {
  const parsed = schema.safeParse(document);
  if (parsed.success) {
    return ok(parsed.data);
  }

  const [first] = parsed.error.issues;
  if (!first) {
    return err(new SchemaValidationError('Document does not match schema', []));
  }
  return err(issueToError(first));
}

/**
 * Every issue rather than the first; used by `check` to list all problems
 * of a user model at once.
 */
export function validateAll<S extends z.ZodTypeAny>(
  document: unknown,
  schema: S
): Result<z.output<S>, SchemaValidationError[]> {
  const parsed = schema.safeParse(document);
  if (parsed.success) {
    return ok(parsed.data);
  }
  return err(parsed.error.issues.map(issueToError));
}

function issueToError(issue: ZodIssue): SchemaValidationError {
  return new SchemaValidationError(issue.message, issue.path, subFailures(issue));
}

function subFailures(issue: ZodIssue): string[] {
  if (issue.code === 'invalid_union') {
    return issue.unionErrors.flatMap((e) => e.issues.map((sub) => sub.message));
  }
  return [];
}
