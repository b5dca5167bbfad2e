/**
 * Configuration options for a validation pass
 *
 * All options are optional with conservative defaults.
 */

import { ConfigurationError } from './errors.js';

/**
 * Reference cycle search
 */
export interface CycleOptions {
  /** Run the cycle search once structural checks pass (default: true) */
  enabled?: boolean;
  /** Stop after reporting this many elementary cycles (default: 1000) */
  maxCycles?: number;
}

/**
 * Index projection agreement
 */
export interface ProjectionOptions {
  /** Check selections against declared index projections (default: true) */
  enabled?: boolean;
}

export interface ValidationOptions {
  cycles?: CycleOptions;
  projections?: ProjectionOptions;
  /** Record node counts and timing in the report (default: true) */
  collectStats?: boolean;
}

export interface ResolvedOptions {
  cycles: Required<CycleOptions>;
  projections: Required<ProjectionOptions>;
  collectStats: boolean;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  cycles: {
    enabled: true,
    maxCycles: 1000,
  },
  projections: {
    enabled: true,
  },
  collectStats: true,
};

/**
 * Resolve user options with defaults and validate combinations
 *
 * @throws {ConfigurationError} When an option is out of range
 */
export function resolveOptions(
  userOptions: ValidationOptions = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    ...DEFAULT_OPTIONS,
    ...userOptions,

    // Deep merge nested objects
    cycles: { ...DEFAULT_OPTIONS.cycles, ...userOptions.cycles },
    projections: { ...DEFAULT_OPTIONS.projections, ...userOptions.projections },
    collectStats: userOptions.collectStats ?? DEFAULT_OPTIONS.collectStats,
  };

  validateOptions(resolved);
  return resolved;
}

function validateOptions(options: ResolvedOptions): void {
  const { maxCycles } = options.cycles;
  if (!Number.isSafeInteger(maxCycles) || maxCycles <= 0) {
    throw new ConfigurationError('cycles.maxCycles must be a positive integer', {
      value: maxCycles,
    });
  }
  if (typeof options.cycles.enabled !== 'boolean') {
    throw new ConfigurationError('cycles.enabled must be a boolean');
  }
  if (typeof options.projections.enabled !== 'boolean') {
    throw new ConfigurationError('projections.enabled must be a boolean');
  }
}
