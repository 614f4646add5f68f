import type { Cell, Path } from './common';
import type { SearchStatus } from './enums';

export type SearchNode = {
  cell: Cell;
  gCost: number;
  fCost: number;
};

export type StepEvent = {
  index: number;
  // Absent on the step that finds the frontier empty.
  visited?: Cell;
  frontierUpdates: Cell[];
  status: SearchStatus;
  openCount: number;
};

export type TerminalStatus = SearchStatus.Succeeded | SearchStatus.Failed;

export type SearchOutcome = {
  status: TerminalStatus;
  path?: Path;
  steps: number;
  visitedCount: number;
};

export interface StepSequence extends Iterable<StepEvent> {
  readonly status: SearchStatus;
  readonly visual: boolean;
  next(): StepEvent | undefined;
  reconstructPath(): Path | undefined;
}
