import type { Diagnostic, EvolveApiResult } from '@evoschema/core';

/**
 * Write one `[evoschema] <label>: <json>` line to stderr.
 */
export function printDebug(label: string, value: unknown): void {
  process.stderr.write(`[evoschema] ${label}: ${JSON.stringify(value)}\n`);
}

/**
 * Surface non-fatal diagnostics on stderr, one line per entry.
 * Nothing is written for an empty list.
 */
export function printDiagnostics(diagnostics: readonly Diagnostic[]): void {
  for (const diagnostic of diagnostics) {
    const details = diagnostic.details === undefined ? '' : ` ${JSON.stringify(diagnostic.details)}`;
    process.stderr.write(
      `[evoschema] ${diagnostic.severity} ${diagnostic.code} at ${diagnostic.path}${details}\n`
    );
  }
}

/**
 * Print a per-run summary behind --debug.
 */
export function printEvolveDebug(result: EvolveApiResult): void {
  const applied = result.versions.filter((version) => version.operator !== undefined).length;
  printDebug('evolve.summary', {
    versions: result.versions.length,
    applied,
    noOps: result.versions.length - applied,
    usedOperators: result.usedOperators,
  });
}
