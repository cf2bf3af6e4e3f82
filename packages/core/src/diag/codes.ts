/**
 * Informational diagnostics. None of these abort a run; they travel next to
 * the result so callers can surface or count them.
 */

export const DIAGNOSTIC_CODES = {
  /** One matched pair changed both parent and leaf name; Move and Rename were both emitted. */
  AMBIGUOUS_MATCH: 'AMBIGUOUS_MATCH',
  /** No catalog operator was viable; the version is an unchanged copy. */
  NO_VIABLE_OPERATOR: 'NO_VIABLE_OPERATOR',
  /** A required name does not resolve against the object's properties. */
  DANGLING_REQUIRED: 'DANGLING_REQUIRED',
} as const;

export type DiagnosticCode =
  (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

export interface Diagnostic<Details = unknown> {
  code: DiagnosticCode;
  severity: 'info' | 'warn';
  path: string;
  details?: Details;
}

export interface AmbiguousMatchDetails {
  from: string;
  to: string;
  score: number;
}
