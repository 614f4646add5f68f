import { describe, it, expect } from 'vitest';
import {
  ERR,
  InvalidConfigurationError,
  InvalidDimensionsError,
  InvalidStateError,
  OutOfBoundsError,
  PathfinderError,
  ReconstructionError,
  isRecoverable
} from './errors';

describe('errors', () => {
  it('carries a code, a name and a message', () => {
    const err = new OutOfBoundsError({ row: 5, col: -1 }, 4, 4);
    expect(err).toBeInstanceOf(PathfinderError);
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe(ERR.OUT_OF_BOUNDS);
    expect(err.name).toBe('OutOfBoundsError');
    expect(err.message).toBe('Cell (5, -1) is outside the 4x4 grid');
    expect(err.cell).toEqual({ row: 5, col: -1 });
  });

  it('describes bad dimensions', () => {
    const err = new InvalidDimensionsError(0, 3, 'too small');
    expect(err.code).toBe(2001);
    expect(err.message).toBe('Invalid grid dimensions 0x3: too small');
  });

  it('treats every user-facing error as recoverable', () => {
    expect(isRecoverable(new InvalidDimensionsError(0, 0, 'x'))).toBe(true);
    expect(isRecoverable(new InvalidStateError({ row: 0, col: 0 }, 'x'))).toBe(true);
    expect(isRecoverable(new InvalidConfigurationError({ row: 0, col: 0 }, 'x'))).toBe(true);
    expect(isRecoverable(new OutOfBoundsError({ row: 0, col: 0 }, 1, 1))).toBe(true);
  });

  it('treats reconstruction failures and foreign errors as fatal', () => {
    expect(isRecoverable(new ReconstructionError('x'))).toBe(false);
    expect(isRecoverable(new Error('x'))).toBe(false);
    expect(isRecoverable('x')).toBe(false);
  });
});
