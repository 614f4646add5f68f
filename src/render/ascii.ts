import type { GridView } from '../types';
import type { SearchOverlay } from '../ui/overlay';
import { CellView } from '../types/enums';

export function renderGridAscii(grid: GridView, overlay: SearchOverlay): string {
  let out: string = '';

  for (let row: number = 0; row < grid.rows; row++) {
    for (let col: number = 0; col < grid.cols; col++) {
      out += viewChar(overlay.viewOf(grid, { row, col }));
    }
    out += '\n';
  }

  return out;
}

export function viewChar(view: CellView): string {
  switch (view) {
    case CellView.Obstacle: return '#';
    case CellView.Start: return 'S';
    case CellView.Target: return 'T';
    case CellView.Unreachable: return '!';
    case CellView.Path: return '*';
    case CellView.Closed: return 'x';
    case CellView.Open: return 'o';
    default: return '.';
  }
}
