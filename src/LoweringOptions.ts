import type { HostExecutionEngine } from './Lowering/DryRun.js';

export interface LoweringOptions {
  /** Fail when a static shape and its dry-run shape encode differently */
  strictCheck: boolean;

  /** Run the graph once on the host when a needed shape is not statically known */
  dryRunForUnknownShape: boolean;

  /** Feed zero tensors to the dry run instead of the bound input values */
  initializeByZero: boolean;

  /** 0 silent, 1 normal, 2 verbose */
  verbosity: number;

  /** Host engine used by the dry run; without one, unknown shapes are an error */
  engine?: HostExecutionEngine;
}

/**
 * Defaults:
 *  - strictCheck: true
 *  - dryRunForUnknownShape: true
 *  - initializeByZero: true
 *  - verbosity: 0
 */
export const defaultLoweringOptions: LoweringOptions = {
  strictCheck: true,
  dryRunForUnknownShape: true,
  initializeByZero: true,
  verbosity: 0,
};
