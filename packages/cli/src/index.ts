#!/usr/bin/env node

// CLI entry point
// - `shardcheck validate <file>` loads a graph document, validates it and
//   prints the issue list (text) or a JSON report; exit 40 when issues exist.
// - `shardcheck format <file>` prints the canonical form of a document.

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  DocumentError,
  ErrorCode,
  ErrorPresenter,
  InputError,
  InternalError,
  canonicalJSON,
  formatIssues,
  getExitCode,
  isShardCheckError,
  parseGraphDocument,
  resolveOptions,
  serializeGraph,
  validateGraph,
  type ShardCheckError,
  type ShardGraph,
  type ValidationReport,
} from '@shardcheck/core';
import { renderCLIView } from './render.js';
import {
  parseValidationOptions,
  resolveOutputFormat,
  type CliOptions,
  type OutputFormat,
} from './flags.js';
import { printValidationDebug } from './debug.js';

const program = new Command();

program
  .name('shardcheck')
  .description('Validate sharded tensor-program graphs')
  .version('0.1.0');

program
  .command('validate')
  .description('Check shard coverage, projections and reference cycles')
  .argument('<file>', 'Graph document (JSON)')
  .option('--format <format>', 'Output format: text|json', 'text')
  .option('--no-cycles', 'Skip the reference cycle search')
  .option('--max-cycles <number>', 'Stop after reporting this many cycles')
  .option('--no-projections', 'Skip index projection checks')
  .option('--no-stats', 'Leave node counts and timing out of the report')
  .option('--debug', 'Print effective options and stats to stderr')
  .action(function (file: string, options: CliOptions) {
    let exitCode = 0;
    try {
      const format = resolveOutputFormat(options.format);
      const validationOptions = parseValidationOptions(options);
      const resolved = resolveOptions(validationOptions);

      const graph = loadGraph(file);
      const report = validateGraph(graph, validationOptions);

      if (options.debug === true) {
        printValidationDebug(resolved, report.stats);
      }

      writeReport(report, format);
      if (report.issues.length > 0) {
        exitCode = getExitCode(ErrorCode.GRAPH_VALIDATION_FAILED);
      }
    } catch (err: unknown) {
      handleCliError(err);
    }
    if (exitCode !== 0) process.exit(exitCode);
  });

program
  .command('format')
  .description('Print the canonical form of a graph document')
  .argument('<file>', 'Graph document (JSON)')
  .action(function (file: string) {
    try {
      const graph = loadGraph(file);
      process.stdout.write(canonicalJSON(serializeGraph(graph), '  ') + '\n');
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

function readDocument(file: string): unknown {
  const abs = path.resolve(process.cwd(), file);
  let raw: string;
  try {
    raw = fs.readFileSync(abs, 'utf8');
  } catch (error: unknown) {
    throw new InputError(
      `Graph file not readable: ${abs}`,
      { file: abs },
      error instanceof Error ? error : undefined
    );
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DocumentError({
      message: `Graph file is not valid JSON: ${reason}`,
      errorCode: ErrorCode.DOCUMENT_PARSE_FAILED,
      context: { file: abs },
      cause: error instanceof Error ? error : undefined,
    });
  }
}

function loadGraph(file: string): ShardGraph {
  // Err.unwrap rethrows the DocumentError
  return parseGraphDocument(readDocument(file)).unwrap();
}

function writeReport(report: ValidationReport, format: OutputFormat): void {
  if (format === 'json') {
    const body = {
      valid: report.issues.length === 0,
      issues: report.issues,
      ...(report.stats ? { stats: report.stats } : {}),
    };
    process.stdout.write(JSON.stringify(body, null, 2) + '\n');
    return;
  }
  process.stdout.write(formatIssues(report.issues).trimEnd() + '\n');
}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: ShardCheckError;
  if (isShardCheckError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError(
      message || 'Unexpected error',
      err instanceof Error ? err : undefined
    );
  }

  const view = presenter.formatForCLI(error);
  process.stderr.write(`${renderCLIView(view)}\n`);

  process.exit(error.getExitCode());
}

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
