/**
 * Shared Validation Utilities
 *
 * Turns zod issues into the short messages clients see for bad envelopes,
 * bad params and bad tool arguments.
 */

import type { ZodError, ZodIssue } from 'zod';

// ─── Issue Formatting ───────────────────────────────────────────────────────

function issuePath(issue: ZodIssue): string {
  return issue.path.map(String).join('.');
}

function isMissing(issue: ZodIssue): boolean {
  return issue.code === 'invalid_type' && issue.received === 'undefined';
}

/** `field: message; other: message`, for envelopes and config. */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issuePath(issue);
      return where.length > 0 ? `${where}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Describe tool-argument issues by argument name, e.g.
 * `missing required argument "path"` or
 * `invalid argument "paths": Expected array, received string`.
 */
export function describeArgumentIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issuePath(issue);
      if (where.length === 0) return `invalid arguments: ${issue.message}`;
      if (isMissing(issue)) return `missing required argument "${where}"`;
      return `invalid argument "${where}": ${issue.message}`;
    })
    .join('; ');
}

// ─── Type Guards ────────────────────────────────────────────────────────────

/** Plain JSON object (not null, not an array). */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
