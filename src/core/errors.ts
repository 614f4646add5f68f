import type { Cell } from '../types';
import { formatCell } from './util';

export const ERR = {
  INVALID_DIMENSIONS: 2001,
  OUT_OF_BOUNDS: 2002,
  INVALID_STATE: 2003,
  INVALID_CONFIGURATION: 2004,
  RECONSTRUCTION: 2005
} as const;

export type ErrorCode = (typeof ERR)[keyof typeof ERR];

/**
 * Base class for every error raised by the grid model and the search engine.
 */
export class PathfinderError extends Error {
  public constructor(public readonly code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidDimensionsError extends PathfinderError {
  public constructor(public readonly rows: number, public readonly cols: number, reason: string) {
    super(ERR.INVALID_DIMENSIONS, `Invalid grid dimensions ${rows}x${cols}: ${reason}`);
  }
}

export class OutOfBoundsError extends PathfinderError {
  public constructor(public readonly cell: Cell, rows: number, cols: number) {
    super(ERR.OUT_OF_BOUNDS, `Cell ${formatCell(cell)} is outside the ${rows}x${cols} grid`);
  }
}

/**
 * Raised when a start/target placement would collide with the other role
 * or leave the grid without one of them.
 */
export class InvalidStateError extends PathfinderError {
  public constructor(public readonly cell: Cell, message: string) {
    super(ERR.INVALID_STATE, message);
  }
}

export class InvalidConfigurationError extends PathfinderError {
  public constructor(public readonly cell: Cell, message: string) {
    super(ERR.INVALID_CONFIGURATION, message);
  }
}

/**
 * A broken predecessor chain. Signals a defect in the engine, never a user mistake.
 */
export class ReconstructionError extends PathfinderError {
  public constructor(message: string) {
    super(ERR.RECONSTRUCTION, message);
  }
}

/**
 * Checks whether an error is one the caller can report and carry on from.
 * @param err The caught value.
 * @returns True for pathfinder errors other than reconstruction failures.
 */
export function isRecoverable(err: unknown): err is PathfinderError {
  return err instanceof PathfinderError && !(err instanceof ReconstructionError);
}
