/**
 * Engine configuration shared by the canonicalizer, the rewriters and the
 * strategy orchestrator.
 */

export interface EngineOptions {
  /** Maximum rounds of every fixed-point loop (default: 10) */
  maxIterations?: number;

  /** Largest integer power of a sum that is expanded by self-multiplication (default: 10) */
  maxExpansionPower?: number;

  /** Maximum passes of exponential cancellation in a fraction (default: 5) */
  maxCancellationRounds?: number;

  /** Print verbose output */
  verbose?: boolean;
}

export type ResolvedOptions = Required<EngineOptions>;

export const DEFAULT_OPTIONS: ResolvedOptions = {
  maxIterations: 10,
  maxExpansionPower: 10,
  maxCancellationRounds: 5,
  verbose: false
};

export function resolveOptions(options: EngineOptions = {}): ResolvedOptions {
  const {
    maxIterations = DEFAULT_OPTIONS.maxIterations,
    maxExpansionPower = DEFAULT_OPTIONS.maxExpansionPower,
    maxCancellationRounds = DEFAULT_OPTIONS.maxCancellationRounds,
    verbose = DEFAULT_OPTIONS.verbose
  } = options;

  return { maxIterations, maxExpansionPower, maxCancellationRounds, verbose };
}
