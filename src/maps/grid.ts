import type { Cell, GridDimensions, GridOptions, GridView } from '../types';
import { CellState } from '../types/enums';
import { DEFAULT_START, DEFAULT_TARGET_COL_FROM_END, DEFAULT_TARGET_ROW } from '../core/const';
import { InvalidDimensionsError, InvalidStateError, OutOfBoundsError } from '../core/errors';
import { clamp, formatCell, sameCell } from '../core/util';

// Neighbour expansion order: up, down, left, right.
const ORTHOGONAL: readonly { dr: number; dc: number }[] = [
  { dr: -1, dc: 0 },
  { dr: 1, dc: 0 },
  { dr: 0, dc: -1 },
  { dr: 0, dc: 1 }
];

type RolePlacement = { start: Cell; target: Cell };

/**
 * Converts a cell to its index in the row-major state array.
 * @param row The row.
 * @param col The column.
 * @param cols The grid width.
 * @returns The 1D index.
 */
function idx(row: number, col: number, cols: number): number {
  return row * cols + col;
}

/**
 * Picks the start and target a fresh grid gets when the caller does not name them.
 * @param rows The grid height.
 * @param cols The grid width.
 * @returns The default role cells, always distinct for grids of two or more cells.
 */
export function defaultRoles(rows: number, cols: number): RolePlacement {
  const start: Cell = {
    row: clamp(DEFAULT_START.row, 0, rows - 1),
    col: clamp(DEFAULT_START.col, 0, cols - 1)
  };
  let target: Cell = {
    row: clamp(DEFAULT_TARGET_ROW, 0, rows - 1),
    col: clamp(cols - DEFAULT_TARGET_COL_FROM_END, 0, cols - 1)
  };

  if (sameCell(start, target)) {
    target = alternateCell(start, rows, cols);
  }

  return { start, target };
}

/**
 * The cell a role moves to when its preferred cell is taken: the last cell,
 * or the first when the last is the one taken.
 */
function alternateCell(taken: Cell, rows: number, cols: number): Cell {
  const last: Cell = { row: rows - 1, col: cols - 1 };
  return sameCell(taken, last) ? { row: 0, col: 0 } : last;
}

function avoiding(preferred: Cell, taken: Cell | undefined, rows: number, cols: number): Cell {
  return taken && sameCell(preferred, taken) ? alternateCell(taken, rows, cols) : preferred;
}

/**
 * Fixed-size rectangular grid of cell states with exactly one start and one target.
 */
export class Grid implements GridView {
  private readonly states: CellState[];
  private startCell: Cell;
  private targetCell: Cell;

  private constructor(
    public readonly rows: number,
    public readonly cols: number,
    private readonly defaults: RolePlacement,
    states?: CellState[]
  ) {
    this.states = states ?? new Array<CellState>(rows * cols).fill(CellState.Free);
    this.startCell = defaults.start;
    this.targetCell = defaults.target;
  }

  /**
   * Creates a grid with every cell free apart from the default start and target.
   * @param rows The number of rows.
   * @param cols The number of columns.
   * @param options Optional explicit default start and target cells.
   * @returns The new grid.
   */
  public static create(rows: number, cols: number, options: GridOptions = {}): Grid {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
      throw new InvalidDimensionsError(rows, cols, 'rows and columns must be positive integers');
    }
    if (rows * cols < 2) {
      throw new InvalidDimensionsError(rows, cols, 'a grid needs room for both a start and a target');
    }

    // A role the caller leaves out falls back to its default cell, moved off
    // the cell the caller gave the other role.
    const fallback: RolePlacement = defaultRoles(rows, cols);
    const start: Cell = options.defaultStart ?? avoiding(fallback.start, options.defaultTarget, rows, cols);
    const target: Cell = options.defaultTarget ?? avoiding(fallback.target, start, rows, cols);
    const defaults: RolePlacement = { start, target };

    const grid: Grid = new Grid(rows, cols, defaults);
    grid.assertInBounds(defaults.start);
    grid.assertInBounds(defaults.target);
    if (sameCell(defaults.start, defaults.target)) {
      throw new InvalidStateError(defaults.start, `Start and target cannot share cell ${formatCell(defaults.start)}`);
    }

    grid.placeDefaultRoles();
    return grid;
  }

  public get start(): Cell {
    return this.startCell;
  }

  public get target(): Cell {
    return this.targetCell;
  }

  public dimensions(): GridDimensions {
    return { rows: this.rows, cols: this.cols };
  }

  public inBounds(cell: Cell): boolean {
    return (
      Number.isInteger(cell.row) &&
      Number.isInteger(cell.col) &&
      cell.row >= 0 &&
      cell.row < this.rows &&
      cell.col >= 0 &&
      cell.col < this.cols
    );
  }

  public getCellState(cell: Cell): CellState {
    this.assertInBounds(cell);
    return this.states[idx(cell.row, cell.col, this.cols)];
  }

  /**
   * Checks whether a search may step onto a cell.
   * @param cell The cell to test.
   * @returns True unless the cell is an obstacle.
   */
  public isTraversable(cell: Cell): boolean {
    return this.getCellState(cell) !== CellState.Obstacle;
  }

  /**
   * Changes the state of one cell.
   *
   * Moving the start or target frees the cell that held the role before.
   * Rejected changes throw and leave the grid untouched.
   * @param cell The cell to change.
   * @param state The new state.
   */
  public setCellState(cell: Cell, state: CellState): void {
    const current: CellState = this.getCellState(cell);

    switch (state) {
      case CellState.Start:
        if (current === CellState.Target) {
          throw new InvalidStateError(cell, `Cannot place the start on the target at ${formatCell(cell)}`);
        }
        this.write(this.startCell, CellState.Free);
        this.write(cell, CellState.Start);
        this.startCell = { row: cell.row, col: cell.col };
        return;
      case CellState.Target:
        if (current === CellState.Start) {
          throw new InvalidStateError(cell, `Cannot place the target on the start at ${formatCell(cell)}`);
        }
        this.write(this.targetCell, CellState.Free);
        this.write(cell, CellState.Target);
        this.targetCell = { row: cell.row, col: cell.col };
        return;
      default:
        if (current === CellState.Start || current === CellState.Target) {
          throw new InvalidStateError(cell, `Cell ${formatCell(cell)} holds the ${current}; move it before changing the cell`);
        }
        this.write(cell, state);
    }
  }

  /**
   * Flips a cell between free and obstacle. Start and target cells are left alone.
   * @param cell The cell to toggle.
   * @returns True if the cell changed.
   */
  public toggleObstacle(cell: Cell): boolean {
    const current: CellState = this.getCellState(cell);
    if (current === CellState.Free) {
      this.write(cell, CellState.Obstacle);
      return true;
    }
    if (current === CellState.Obstacle) {
      this.write(cell, CellState.Free);
      return true;
    }
    return false;
  }

  /**
   * Lists the traversable orthogonal neighbours of a cell in up, down, left, right order.
   * @param cell The centre cell.
   * @returns Zero to four neighbouring cells.
   */
  public neighborsOf(cell: Cell): Cell[] {
    this.assertInBounds(cell);

    const out: Cell[] = [];
    for (const d of ORTHOGONAL) {
      const nb: Cell = { row: cell.row + d.dr, col: cell.col + d.dc };
      if (!this.inBounds(nb)) continue;
      if (this.states[idx(nb.row, nb.col, this.cols)] === CellState.Obstacle) continue;
      out.push(nb);
    }
    return out;
  }

  public obstacleCount(): number {
    let count: number = 0;
    for (const s of this.states) {
      if (s === CellState.Obstacle) count++;
    }
    return count;
  }

  /**
   * Clears every obstacle and puts start and target back on their defaults.
   */
  public reset(): void {
    this.states.fill(CellState.Free);
    this.placeDefaultRoles();
  }

  /**
   * Copies the grid by value; edits to either copy never reach the other.
   * @returns The copy.
   */
  public clone(): Grid {
    const copy: Grid = new Grid(this.rows, this.cols, this.defaults, [...this.states]);
    copy.startCell = this.startCell;
    copy.targetCell = this.targetCell;
    return copy;
  }

  private placeDefaultRoles(): void {
    this.startCell = this.defaults.start;
    this.targetCell = this.defaults.target;
    this.write(this.startCell, CellState.Start);
    this.write(this.targetCell, CellState.Target);
  }

  private write(cell: Cell, state: CellState): void {
    this.states[idx(cell.row, cell.col, this.cols)] = state;
  }

  private assertInBounds(cell: Cell): void {
    if (!this.inBounds(cell)) {
      throw new OutOfBoundsError(cell, this.rows, this.cols);
    }
  }
}
