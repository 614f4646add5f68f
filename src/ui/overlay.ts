import type { Cell, GridView, Path, StepEvent } from '../types';
import { CellState, CellView } from '../types/enums';
import { keyCell } from '../core/util';

/**
 * Search marks layered over the grid for drawing: which cells are on the
 * frontier, which are finished, and the final path.
 */
export class SearchOverlay {
  private readonly open: Set<string> = new Set<string>();
  private readonly closed: Set<string> = new Set<string>();
  private readonly path: Set<string> = new Set<string>();
  private unreachable: boolean = false;

  /**
   * Folds one step event into the marks.
   * @param event The event pulled from a run.
   */
  public apply(event: StepEvent): void {
    if (event.visited) {
      const k: string = keyCell(event.visited);
      this.open.delete(k);
      this.closed.add(k);
    }
    for (const c of event.frontierUpdates) {
      this.open.add(keyCell(c));
    }
  }

  public showPath(path: Path): void {
    this.path.clear();
    for (const c of path) this.path.add(keyCell(c));
  }

  public markUnreachable(): void {
    this.unreachable = true;
  }

  public clear(): void {
    this.open.clear();
    this.closed.clear();
    this.path.clear();
    this.unreachable = false;
  }

  public get openCount(): number {
    return this.open.size;
  }

  public get closedCount(): number {
    return this.closed.size;
  }

  public get isUnreachable(): boolean {
    return this.unreachable;
  }

  /**
   * Resolves how a cell should be drawn.
   * @param grid The grid the marks belong to.
   * @param cell The cell to resolve.
   * @returns The cell's view kind.
   */
  public viewOf(grid: GridView, cell: Cell): CellView {
    switch (grid.getCellState(cell)) {
      case CellState.Obstacle:
        return CellView.Obstacle;
      case CellState.Start:
        return CellView.Start;
      case CellState.Target:
        return this.unreachable ? CellView.Unreachable : CellView.Target;
      default:
        break;
    }

    const k: string = keyCell(cell);
    if (this.path.has(k)) return CellView.Path;
    if (this.closed.has(k)) return CellView.Closed;
    if (this.open.has(k)) return CellView.Open;
    return CellView.Free;
  }
}
