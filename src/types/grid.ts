import type { Cell } from './common';
import type { CellState } from './enums';

export type GridOptions = {
  defaultStart?: Cell;
  defaultTarget?: Cell;
};

export type GridDimensions = {
  rows: number;
  cols: number;
};

// Read-only queries over a grid, for renderers and other observers.
export interface GridView {
  readonly rows: number;
  readonly cols: number;
  readonly start: Cell;
  readonly target: Cell;
  inBounds(cell: Cell): boolean;
  getCellState(cell: Cell): CellState;
  isTraversable(cell: Cell): boolean;
  obstacleCount(): number;
}
