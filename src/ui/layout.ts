import type { Cell, Point, Rect } from '../types';

export function rectContains(rect: Rect, p: Point): boolean {
  return p.x >= rect.x && p.x < rect.x + rect.width && p.y >= rect.y && p.y < rect.y + rect.height;
}

/**
 * Size of one cell when the grid is drawn into a rectangle. Matches the
 * whole-pixel cells the renderers draw.
 * @param rect The grid area.
 * @param rows The grid height in cells.
 * @param cols The grid width in cells.
 * @returns The cell width and height in pixels.
 */
export function cellSize(rect: Rect, rows: number, cols: number): { width: number; height: number } {
  return {
    width: Math.floor(rect.width / cols),
    height: Math.floor(rect.height / rows)
  };
}

/**
 * Maps a pointer position to the grid cell under it.
 * @param p The pointer position.
 * @param rect The grid area.
 * @param rows The grid height in cells.
 * @param cols The grid width in cells.
 * @returns The cell, or undefined if the point misses the grid.
 */
export function pointToCell(p: Point, rect: Rect, rows: number, cols: number): Cell | undefined {
  if (!rectContains(rect, p)) {
    return undefined;
  }
  const size = cellSize(rect, rows, cols);
  const row: number = Math.floor((p.y - rect.y) / size.height);
  const col: number = Math.floor((p.x - rect.x) / size.width);
  // The rightmost and bottom pixels left over by flooring fall outside every cell.
  if (row >= rows || col >= cols) {
    return undefined;
  }
  return { row, col };
}

export function cellRect(c: Cell, rect: Rect, rows: number, cols: number): Rect {
  const size = cellSize(rect, rows, cols);
  return {
    x: rect.x + c.col * size.width,
    y: rect.y + c.row * size.height,
    width: size.width,
    height: size.height
  };
}
