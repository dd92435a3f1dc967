/**
 * Kernel error types and result helpers
 */

import { KernelFailure, KernelResult } from './types';

export type InputShapeErrorCode =
  | 'TOO_FEW_VALUES'
  | 'NOT_TRIPLE_ALIGNED'
  | 'NON_FINITE_VALUE'
  | 'NOT_AN_ARRAY';

/**
 * The flat vertex array cannot describe a polygon.
 * Raised before any geometry runs.
 */
export class InputShapeError extends Error {
  readonly code: InputShapeErrorCode;

  constructor(code: InputShapeErrorCode, message: string) {
    super(message);
    this.name = 'InputShapeError';
    this.code = code;
  }
}

/**
 * An unexpected numeric fault inside the kernel
 */
export class GeometryKernelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeometryKernelError';
  }
}

/**
 * Classifies a thrown value into a failure record
 */
export function toKernelFailure(error: unknown): KernelFailure {
  if (error instanceof InputShapeError) {
    return { kind: 'input-shape', code: error.code, message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'internal', code: 'INTERNAL_ERROR', message };
}

/**
 * Runs `fn` and converts whatever it throws into a classified result.
 * Input-shape errors become `rejected`, anything else `failed`.
 */
export function runGuarded<T>(fn: () => T): KernelResult<T> {
  try {
    return { status: 'ok', value: fn() };
  } catch (error) {
    const failure = toKernelFailure(error);
    return failure.kind === 'input-shape'
      ? { status: 'rejected', error: failure }
      : { status: 'failed', error: failure };
  }
}
