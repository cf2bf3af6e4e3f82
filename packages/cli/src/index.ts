#!/usr/bin/env node

// CLI entry point
// - `evolve`: read one schema file and print N evolved versions as JSON,
//   NDJSON (one version per line) or the plain change log.
// - `diff`: print the operation log relating two schema files.
// - `operators`: list the mutation catalog.
// Diagnostics and --debug output go to stderr with an `[evoschema]` prefix;
// stdout only carries results.

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  Diff,
  ErrorCode,
  ErrorPresenter,
  Evolve,
  OPERATOR_CATALOG,
  SchemaTree,
  getExitCode,
  isEvoError,
  parseSchemaText,
  resolveOptions,
  serializeOperations,
} from '@evoschema/core';
import { renderCLIView } from './render.js';
import {
  buildEvoOptions,
  resolveOutputFormat,
  resolveSeed,
  resolveVersions,
  type CliOptions,
} from './flags.js';
import { printDebug, printDiagnostics, printEvolveDebug } from './debug.js';

function readSchemaFile(file: string | undefined, setting: string): SchemaTree {
  if (!file) {
    throw new ConfigError({ message: `Missing ${setting} <file>`, context: { setting } });
  }
  const abs = path.resolve(process.cwd(), file);
  if (!fs.existsSync(abs)) {
    throw new ConfigError({
      message: `Schema file not found: ${abs}`,
      context: { setting, value: abs },
    });
  }
  const parsed = parseSchemaText(fs.readFileSync(abs, 'utf8'));
  if (parsed.isErr()) {
    parsed.error.suggestions = [`Check ${abs}`];
    throw parsed.error;
  }
  return new SchemaTree(parsed.value.node, parsed.value.dialect);
}

function runEvolve(options: CliOptions & { schema?: string }): void {
  const tree = readSchemaFile(options.schema, '--schema');
  const versions = resolveVersions(options);
  const seed = resolveSeed(options);
  const outFormat = resolveOutputFormat(options.out);
  const evoOptions = buildEvoOptions(options);

  if (options.debug) {
    printDebug('effective config', { versions, seed, ...resolveOptions(evoOptions) });
  }

  const result = Evolve(tree, { versions, seed, options: evoOptions });

  if (outFormat === 'changelog') {
    if (result.changeLog) process.stdout.write(result.changeLog + '\n');
  } else if (outFormat === 'ndjson') {
    const lines = result.versions.map((version) => JSON.stringify(version));
    if (lines.length > 0) process.stdout.write(lines.join('\n') + '\n');
  } else {
    process.stdout.write(
      JSON.stringify({ versions: result.versions, usedOperators: result.usedOperators }, null, 2) +
        '\n'
    );
  }

  printDiagnostics(result.diagnostics);
  if (options.debug) printEvolveDebug(result);
}

function runDiff(fromFile: string, toFile: string, options: CliOptions): void {
  const from = readSchemaFile(fromFile, '<from>');
  const to = readSchemaFile(toFile, '<to>');
  const outFormat = resolveOutputFormat(options.out);
  const evoOptions = buildEvoOptions(options);

  if (options.debug) {
    printDebug('effective config', resolveOptions(evoOptions));
  }

  const { operations, diagnostics } = Diff(from, to, evoOptions);

  if (outFormat === 'ndjson') {
    const lines = operations.map((op) => JSON.stringify(op));
    if (lines.length > 0) process.stdout.write(lines.join('\n') + '\n');
  } else if (outFormat === 'json') {
    process.stdout.write(serializeOperations(operations) + '\n');
  } else {
    throw new ConfigError({
      message: 'The changelog format is only available for evolve',
      context: { setting: '--out', value: outFormat },
    });
  }

  printDiagnostics(diagnostics);
}

function listOperators(): void {
  const width = Math.max(...OPERATOR_CATALOG.map((op) => op.name.length));
  const lines = OPERATOR_CATALOG.map(
    (op) =>
      `${op.name.padEnd(width)}  ${op.category.padEnd(10)}  ${String(op.weight).padStart(2)}  ${op.summary}`
  );
  process.stdout.write(lines.join('\n') + '\n');
}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  if (isEvoError(err)) {
    console.error(renderCLIView(presenter.formatForCLI(err)));
    process.exit(err.getExitCode());
  }

  console.error(renderCLIView(presenter.formatUnexpected(err)));
  process.exit(getExitCode(ErrorCode.INTERNAL_ERROR));
}

/**
 * Build a fresh command tree. Commander keeps parsed option values on the
 * command instances, so every parse gets its own.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('evoschema')
    .description('Generate schema evolution runs and diff schema snapshots')
    .version('0.1.0');

  program
    .command('evolve')
    .description('Apply seeded mutations to a schema, one per version')
    .option('-s, --schema <file>', 'JSON Schema or $jsonSchema file path')
    .option('-n, --versions <number>', 'Number of versions to produce', '8')
    .option('--seed <number>', 'Deterministic seed', '424242')
    .option('--operators <names>', 'Comma-separated operator names to draw from')
    .option('--coverage <strategy>', 'Operator coverage: weighted|exhaustive')
    .option('--max-properties <number>', 'Root size at which add-style operators stop')
    .option('--min-properties <number>', 'Root size at which removeField stops')
    .option('--out <format>', 'Output format: json|ndjson|changelog', 'json')
    .option('--debug', 'Print effective configuration and a run summary to stderr')
    .action((options: CliOptions & { schema?: string }) => {
      try {
        runEvolve(options);
      } catch (err: unknown) {
        handleCliError(err);
      }
    });

  program
    .command('diff')
    .description('Print the operation log relating two schema snapshots')
    .argument('<from>', 'Older schema file')
    .argument('<to>', 'Newer schema file')
    .option('--threshold <number>', 'Minimum similarity for a rename/move (0..1)')
    .option('--root-name <name>', 'Name of the root path segment')
    .option('--out <format>', 'Output format: json|ndjson', 'json')
    .option('--debug', 'Print effective configuration to stderr')
    .action((fromFile: string, toFile: string, options: CliOptions) => {
      try {
        runDiff(fromFile, toFile, options);
      } catch (err: unknown) {
        handleCliError(err);
      }
    });

  program
    .command('operators')
    .description('List the mutation operator catalog')
    .action(() => {
      listOperators();
    });

  return program;
}

const program = createProgram();

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
