import type { Cell, Path } from '../types';
import { ReconstructionError } from '../core/errors';
import { formatCell, keyCell, sameCell } from '../core/util';

/**
 * Walks predecessor links from the target back to the start.
 * @param predecessors Maps a cell key to the cell it was reached from.
 * @param start The search start.
 * @param target The cell the search finished on.
 * @returns The cells from start to target inclusive.
 */
export function reconstructPath(predecessors: ReadonlyMap<string, Cell>, start: Cell, target: Cell): Path {
  const reversed: Cell[] = [target];
  let current: Cell = target;

  while (!sameCell(current, start)) {
    const prev: Cell | undefined = predecessors.get(keyCell(current));
    if (!prev) {
      throw new ReconstructionError(`Predecessor chain breaks at ${formatCell(current)}`);
    }
    reversed.push(prev);
    // Each cell has one predecessor, so a chain longer than the map loops.
    if (reversed.length > predecessors.size + 1) {
      throw new ReconstructionError(`Predecessor chain from ${formatCell(target)} never reaches ${formatCell(start)}`);
    }
    current = prev;
  }

  return reversed.reverse();
}
