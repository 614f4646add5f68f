import type { Cell, Rect } from '../types';
import { CellView } from '../types/enums';

export const DEFAULT_GRID_ROWS: number = 20;
export const DEFAULT_GRID_COLS: number = 30;

export const DEFAULT_START: Cell = { row: 9, col: 4 };
export const DEFAULT_TARGET_ROW: number = 9;
// Target column counted back from the right edge.
export const DEFAULT_TARGET_COL_FROM_END: number = 5;

export const EDGE_COST: number = 1;

export const STEP_DELAY_MS: number = 50;
export const MESSAGE_LOG_SIZE: number = 50;

export const GRID_RECT: Rect = { x: 0, y: 0, width: 750, height: 500 };
export const MENU_RECT: Rect = { x: 0, y: 500, width: 750, height: 200 };

export const MENU_LAYOUT = {
  rows: 3,
  cols: 3,
  padding: 14
};

export const CELL_COLORS: Record<CellView, number> = {
  [CellView.Free]: 0xffffff,
  [CellView.Obstacle]: 0x000000,
  [CellView.Start]: 0x0000ff,
  [CellView.Target]: 0x0000ff,
  [CellView.Open]: 0xffff00,
  [CellView.Closed]: 0xff0000,
  [CellView.Path]: 0x00ff00,
  [CellView.Unreachable]: 0xff0000
};

export const UI_COLORS = {
  cellBorder: 0x000000,
  cellText: 0xffffff,
  menuBackground: 0x505050,
  buttonText: 0xffffff,
  activeButtonText: 0xffd24a
};
