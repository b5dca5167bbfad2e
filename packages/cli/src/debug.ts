import type { ResolvedOptions, ValidationStats } from '@shardcheck/core';

/**
 * Print the effective options and the validation stats to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printValidationDebug(
  options: ResolvedOptions,
  stats: ValidationStats | undefined
): void {
  process.stderr.write(`[shardcheck] options: ${JSON.stringify(options)}\n`);

  if (!stats) {
    process.stderr.write('[shardcheck] stats: <disabled>\n');
    return;
  }

  const { durationMs, ...counts } = stats;
  process.stderr.write(
    `[shardcheck] stats: ${JSON.stringify(counts)} in ${durationMs.toFixed(1)}ms\n`
  );
}
