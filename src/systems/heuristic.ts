import type { Cell } from '../types';
import { EDGE_COST } from '../core/const';
import { formatCell, manhattan } from '../core/util';

/**
 * Estimates the remaining cost between two cells on a 4-connected unit-cost grid.
 * Manhattan distance never overestimates that cost, so A* stays optimal.
 * @param a The first cell.
 * @param b The second cell.
 * @returns The estimate; zero only when the cells are equal.
 */
export function heuristic(a: Cell, b: Cell): number {
  return manhattan(a, b);
}

/**
 * Returns the cost of one move between orthogonally adjacent cells.
 * @param a The cell moved from.
 * @param b The cell moved to.
 * @returns The unit edge cost.
 */
export function edgeCost(a: Cell, b: Cell): number {
  if (manhattan(a, b) !== 1) {
    throw new Error(`edgeCost: ${formatCell(a)} and ${formatCell(b)} are not adjacent`);
  }
  return EDGE_COST;
}
