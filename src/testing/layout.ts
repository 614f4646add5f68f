import type { Cell } from '../types';
import { CellState } from '../types/enums';
import { Grid } from '../maps/grid';
import { keyCell, sameCell } from '../core/util';

/**
 * Builds a grid from rows of characters: `.` free, `#` obstacle, `S` start, `T` target.
 * @param rows The picture, one string per row, all the same length.
 * @returns The grid.
 */
export function parseLayout(rows: readonly string[]): Grid {
  let start: Cell | undefined;
  let target: Cell | undefined;
  const obstacles: Cell[] = [];

  rows.forEach((line: string, row: number) => {
    [...line].forEach((ch: string, col: number) => {
      if (ch === 'S') start = { row, col };
      else if (ch === 'T') target = { row, col };
      else if (ch === '#') obstacles.push({ row, col });
      else if (ch !== '.') throw new Error(`parseLayout: unknown cell '${ch}'`);
    });
  });

  if (!start || !target) {
    throw new Error('parseLayout: layout needs an S and a T');
  }

  const grid: Grid = Grid.create(rows.length, rows[0].length, { defaultStart: start, defaultTarget: target });
  for (const c of obstacles) grid.setCellState(c, CellState.Obstacle);
  return grid;
}

/**
 * Shortest move count between two cells by plain breadth-first search.
 * @returns The number of moves, or undefined if the target cannot be reached.
 */
export function bfsDistance(grid: Grid, start: Cell, target: Cell): number | undefined {
  const dist: Map<string, number> = new Map<string, number>([[keyCell(start), 0]]);
  const queue: Cell[] = [start];

  for (let head: number = 0; head < queue.length; head++) {
    const c: Cell = queue[head];
    const d: number = dist.get(keyCell(c)) ?? 0;
    if (sameCell(c, target)) return d;
    for (const nb of grid.neighborsOf(c)) {
      if (dist.has(keyCell(nb))) continue;
      dist.set(keyCell(nb), d + 1);
      queue.push(nb);
    }
  }
  return undefined;
}
