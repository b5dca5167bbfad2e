import { ConfigurationError, type ValidationOptions } from '@shardcheck/core';

export type OutputFormat = 'text' | 'json';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  format?: string;
  // Commander sets cycles=false / projections=false for the --no-* forms
  cycles?: boolean;
  maxCycles?: string | number;
  projections?: boolean;
  stats?: boolean;
  debug?: boolean;
  // Allow additional CLI options that we don't process
  [key: string]: unknown;
}

/**
 * Parse CLI options into ValidationOptions
 */
export function parseValidationOptions(options: CliOptions): ValidationOptions {
  const validationOptions: ValidationOptions = {};

  if (options.cycles !== undefined || options.maxCycles !== undefined) {
    validationOptions.cycles = {};
    if (typeof options.cycles === 'boolean') {
      validationOptions.cycles.enabled = options.cycles;
    }
    if (options.maxCycles !== undefined) {
      validationOptions.cycles.maxCycles = resolveMaxCycles(options.maxCycles);
    }
  }

  if (typeof options.projections === 'boolean') {
    validationOptions.projections = { enabled: options.projections };
  }

  if (typeof options.stats === 'boolean') {
    validationOptions.collectStats = options.stats;
  }

  return validationOptions;
}

/**
 * Resolve --max-cycles into a positive integer.
 */
export function resolveMaxCycles(value: string | number): number {
  const num = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isSafeInteger(num) || num <= 0) {
    throw new ConfigurationError(
      `Invalid --max-cycles value "${String(value)}". Expected a positive integer.`,
      { value }
    );
  }
  return num;
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'text';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'text' || raw === 'json') {
    return raw;
  }
  throw new ConfigurationError(
    `Invalid --format value "${String(value)}". Supported formats are "text" and "json".`,
    { value }
  );
}
