import { describe, it, expect } from 'vitest';
import { CellState, CellView, SearchStatus } from '../types/enums';
import { Grid } from '../maps/grid';
import { SearchOverlay } from './overlay';

describe('SearchOverlay', () => {
  it('moves visited cells from open to closed', () => {
    const grid = Grid.create(3, 3);
    const overlay = new SearchOverlay();
    overlay.apply({ index: 0, visited: { row: 1, col: 1 }, frontierUpdates: [{ row: 0, col: 1 }, { row: 1, col: 2 }], status: SearchStatus.Running, openCount: 2 });
    overlay.apply({ index: 1, visited: { row: 0, col: 1 }, frontierUpdates: [], status: SearchStatus.Running, openCount: 1 });

    expect(overlay.viewOf(grid, { row: 1, col: 1 })).toBe(CellView.Closed);
    expect(overlay.viewOf(grid, { row: 0, col: 1 })).toBe(CellView.Closed);
    expect(overlay.viewOf(grid, { row: 1, col: 2 })).toBe(CellView.Open);
    expect(overlay.viewOf(grid, { row: 0, col: 0 })).toBe(CellView.Free);
    expect(overlay.openCount).toBe(1);
    expect(overlay.closedCount).toBe(2);
  });

  it('draws the path over closed cells but never over roles or obstacles', () => {
    const grid = Grid.create(3, 3);
    grid.setCellState({ row: 0, col: 0 }, CellState.Obstacle);
    const overlay = new SearchOverlay();
    overlay.apply({ index: 0, visited: { row: 2, col: 1 }, frontierUpdates: [], status: SearchStatus.Running, openCount: 0 });
    overlay.showPath([{ row: 2, col: 2 }, { row: 2, col: 1 }, { row: 2, col: 0 }]);

    expect(overlay.viewOf(grid, { row: 2, col: 1 })).toBe(CellView.Path);
    expect(overlay.viewOf(grid, { row: 2, col: 2 })).toBe(CellView.Start);
    expect(overlay.viewOf(grid, { row: 2, col: 0 })).toBe(CellView.Target);
    expect(overlay.viewOf(grid, { row: 0, col: 0 })).toBe(CellView.Obstacle);
  });

  it('flags the target once marked unreachable and forgets everything on clear', () => {
    const grid = Grid.create(3, 3);
    const overlay = new SearchOverlay();
    overlay.apply({ index: 0, visited: { row: 1, col: 1 }, frontierUpdates: [{ row: 0, col: 1 }], status: SearchStatus.Running, openCount: 1 });
    overlay.markUnreachable();
    expect(overlay.viewOf(grid, grid.target)).toBe(CellView.Unreachable);

    overlay.clear();
    expect(overlay.isUnreachable).toBe(false);
    expect(overlay.viewOf(grid, grid.target)).toBe(CellView.Target);
    expect(overlay.viewOf(grid, { row: 1, col: 1 })).toBe(CellView.Free);
    expect(overlay.openCount).toBe(0);
  });
});
