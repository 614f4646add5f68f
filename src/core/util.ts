import type { Cell } from '../types';

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.row === b.row && a.col === b.col;
}

export function manhattan(a: Cell, b: Cell): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

export function keyCell(c: Cell): string {
  return `${c.row},${c.col}`;
}

export function formatCell(c: Cell): string {
  return `(${c.row}, ${c.col})`;
}
