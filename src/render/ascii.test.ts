import { describe, it, expect } from 'vitest';
import { CellView } from '../types/enums';
import { SearchOverlay } from '../ui/overlay';
import { PathfinderSession } from '../ui/session';
import { parseLayout } from '../testing/layout';
import { renderGridAscii, viewChar } from './ascii';

describe('renderGridAscii', () => {
  it('draws a fresh grid', () => {
    const grid = parseLayout(['S.#', '..T']);
    expect(renderGridAscii(grid, new SearchOverlay())).toBe('S.#\n..T\n');
  });

  it('draws search marks and the path after a solve', () => {
    // 3x3 defaults: start (2, 2), target (2, 0).
    const session = new PathfinderSession({ rows: 3, cols: 3 });
    session.solveInstantly();
    expect(renderGridAscii(session.view, session.overlay)).toBe('...\n.oo\nT*S\n');
  });

  it('flags an unreachable target', () => {
    const grid = parseLayout(['S#T']);
    const overlay = new SearchOverlay();
    overlay.markUnreachable();
    expect(renderGridAscii(grid, overlay)).toBe('S#!\n');
  });
});

describe('viewChar', () => {
  it('gives every view its own character', () => {
    const chars: string[] = Object.values(CellView).map(viewChar);
    expect(chars).toEqual(['.', '#', 'S', 'T', 'o', 'x', '*', '!']);
  });
});
