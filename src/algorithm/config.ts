/**
 * Site Layout Kernel - Option resolution
 *
 * Per-call options are merged over DEFAULT_KERNEL_OPTIONS once, at the entry
 * point; everything below receives a fully resolved KernelOptions.
 */

import { z } from 'zod';
import { KernelOptions } from './types';
import { DEFAULT_KERNEL_OPTIONS, MAX_TOLERANCE, MIN_TOLERANCE } from './constants';
import { Logger } from './utils/logger';

const log = Logger.scoped('config');

const KernelOptionsSchema = z.object({
  tolerance: z.number().finite().positive().optional().catch(undefined),
  seed: z.number().int().optional().catch(undefined),
  maxScatterAttempts: z.number().int().positive().optional().catch(undefined)
});

/**
 * Clamps a tolerance into the supported [1e-10, 1e-3] window
 */
export function clampTolerance(tolerance: number): number {
  return Math.min(MAX_TOLERANCE, Math.max(MIN_TOLERANCE, tolerance));
}

/**
 * Merges caller overrides over the defaults.
 * Invalid values are dropped; out-of-window tolerances are clamped.
 */
export function resolveKernelOptions(overrides: Partial<KernelOptions> = {}): KernelOptions {
  const parsed = KernelOptionsSchema.parse(overrides);
  const resolved: KernelOptions = { ...DEFAULT_KERNEL_OPTIONS };

  if (parsed.tolerance !== undefined) {
    const clamped = clampTolerance(parsed.tolerance);
    if (clamped !== parsed.tolerance) {
      log.warn(`tolerance ${parsed.tolerance} outside [${MIN_TOLERANCE}, ${MAX_TOLERANCE}], using ${clamped}`);
    }
    resolved.tolerance = clamped;
  }
  if (parsed.seed !== undefined) {
    resolved.seed = parsed.seed;
  }
  if (parsed.maxScatterAttempts !== undefined) {
    resolved.maxScatterAttempts = parsed.maxScatterAttempts;
  }

  return resolved;
}
