import { describe, it, expect } from 'vitest';
import { GRID_RECT } from '../core/const';
import { cellRect, cellSize, pointToCell, rectContains } from './layout';

describe('layout', () => {
  it('uses half-open rectangles', () => {
    const r = { x: 10, y: 10, width: 5, height: 5 };
    expect(rectContains(r, { x: 10, y: 10 })).toBe(true);
    expect(rectContains(r, { x: 15, y: 12 })).toBe(false);
  });

  it('gives the full-size grid 25px cells', () => {
    expect(cellSize(GRID_RECT, 20, 30)).toEqual({ width: 25, height: 25 });
  });

  it('maps points to cells', () => {
    expect(pointToCell({ x: 0, y: 0 }, GRID_RECT, 20, 30)).toEqual({ row: 0, col: 0 });
    expect(pointToCell({ x: 110, y: 260 }, GRID_RECT, 20, 30)).toEqual({ row: 10, col: 4 });
    expect(pointToCell({ x: 749, y: 499 }, GRID_RECT, 20, 30)).toEqual({ row: 19, col: 29 });
    expect(pointToCell({ x: 750, y: 0 }, GRID_RECT, 20, 30)).toBeUndefined();
    expect(pointToCell({ x: 10, y: 600 }, GRID_RECT, 20, 30)).toBeUndefined();
  });

  it('ignores the leftover strip when cells do not divide the area', () => {
    const rect = { x: 0, y: 0, width: 100, height: 100 };
    expect(pointToCell({ x: 98, y: 10 }, rect, 3, 3)).toEqual({ row: 0, col: 2 });
    expect(pointToCell({ x: 99, y: 10 }, rect, 3, 3)).toBeUndefined();
  });

  it('places cell rectangles', () => {
    expect(cellRect({ row: 1, col: 2 }, GRID_RECT, 20, 30)).toEqual({ x: 50, y: 25, width: 25, height: 25 });
  });
});
