import { clampTolerance, resolveKernelOptions } from './config';
import { runGuarded, toKernelFailure, InputShapeError, GeometryKernelError } from './errors';
import { disableLogging } from './utils/logger';

describe('Kernel options', () => {
  beforeAll(() => disableLogging());

  it('should fall back to the defaults', () => {
    expect(resolveKernelOptions()).toEqual({ tolerance: 1e-6 });
  });

  it('should keep valid overrides', () => {
    expect(resolveKernelOptions({ tolerance: 1e-4, seed: 7, maxScatterAttempts: 50 })).toEqual({
      tolerance: 1e-4,
      seed: 7,
      maxScatterAttempts: 50
    });
  });

  it('should clamp tolerances outside the supported window', () => {
    expect(clampTolerance(1)).toBe(1e-3);
    expect(clampTolerance(1e-12)).toBe(1e-10);
    expect(resolveKernelOptions({ tolerance: 0.5 }).tolerance).toBe(1e-3);
  });

  it('should drop invalid values', () => {
    expect(resolveKernelOptions({ tolerance: -1, seed: 1.5, maxScatterAttempts: 0 })).toEqual({ tolerance: 1e-6 });
    expect(resolveKernelOptions({ tolerance: Number.NaN }).tolerance).toBe(1e-6);
  });
});

describe('Kernel errors', () => {
  it('should classify input-shape errors', () => {
    expect(toKernelFailure(new InputShapeError('TOO_FEW_VALUES', 'short'))).toEqual({
      kind: 'input-shape',
      code: 'TOO_FEW_VALUES',
      message: 'short'
    });
  });

  it('should classify everything else as internal', () => {
    expect(toKernelFailure(new GeometryKernelError('bad'))).toEqual({
      kind: 'internal',
      code: 'INTERNAL_ERROR',
      message: 'bad'
    });
    expect(toKernelFailure('plain').message).toBe('plain');
  });

  it('should wrap values and thrown errors in results', () => {
    expect(runGuarded(() => 3)).toEqual({ status: 'ok', value: 3 });
    expect(runGuarded(() => { throw new InputShapeError('NOT_AN_ARRAY', 'x'); }).status).toBe('rejected');
    expect(runGuarded(() => { throw new RangeError('y'); }).status).toBe('failed');
  });
});
