/**
 * API Utilities
 * Shared helpers for API endpoints
 */

import type { Context } from 'hono';
import type { ZodIssue } from 'zod';

export interface ValidationIssue {
  loc: Array<string | number>;
  msg: string;
  type: string;
}

/**
 * Map zod issues onto the `{loc, msg, type}` shape returned with 422s
 */
export function toValidationIssues(issues: ZodIssue[]): ValidationIssue[] {
  return issues.map(issue => ({
    loc: ['body', ...issue.path],
    msg: issue.message,
    type: issue.code
  }));
}

export function validationError(c: Context, detail: ValidationIssue[]) {
  return c.json({ detail }, 422);
}

/**
 * Read the request body as JSON; `ok: false` when it is not parseable
 */
export async function readJsonBody(c: Context): Promise<{ ok: true; value: unknown } | { ok: false }> {
  try {
    const value = await c.req.json<unknown>();
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}
