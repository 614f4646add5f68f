import type { MenuButton, Point, Rect } from '../types';
import { MenuAction, SelectionMode } from '../types/enums';
import { MENU_LAYOUT } from '../core/const';
import { rectContains } from './layout';

// First column: placement modes. Second column: grid actions.
const COLUMNS: readonly MenuAction[][] = [
  [MenuAction.PlaceObstacles, MenuAction.PlaceStart, MenuAction.PlaceTarget],
  [MenuAction.ResetGrid, MenuAction.SolveVisual, MenuAction.SolveInstant]
];

const MODE_FOR_ACTION: Partial<Record<MenuAction, SelectionMode>> = {
  [MenuAction.PlaceObstacles]: SelectionMode.Obstacle,
  [MenuAction.PlaceStart]: SelectionMode.Start,
  [MenuAction.PlaceTarget]: SelectionMode.Target
};

/**
 * Lays the six menu buttons out inside the menu area.
 * The first column takes a third of the width, the second the rest.
 * @param rect The menu area.
 * @returns The buttons, placement buttons first.
 */
export function layoutMenu(rect: Rect): MenuButton[] {
  const firstWidth: number = Math.floor(rect.width / MENU_LAYOUT.cols);
  const rowHeight: number = Math.floor(rect.height / MENU_LAYOUT.rows);
  const widths: number[] = [firstWidth, rect.width - firstWidth];

  const buttons: MenuButton[] = [];
  let x: number = rect.x;
  COLUMNS.forEach((actions: MenuAction[], col: number) => {
    actions.forEach((action: MenuAction, row: number) => {
      buttons.push({
        action,
        labelKey: `menu.${action}`,
        rect: { x, y: rect.y + row * rowHeight, width: widths[col], height: rowHeight }
      });
    });
    x += widths[col];
  });
  return buttons;
}

export function menuButtonAt(buttons: readonly MenuButton[], p: Point): MenuButton | undefined {
  return buttons.find((b) => rectContains(b.rect, p));
}

export function modeForAction(action: MenuAction): SelectionMode | undefined {
  return MODE_FOR_ACTION[action];
}

/**
 * Checks whether a button selects the placement mode currently in use.
 */
export function isActiveButton(button: MenuButton, mode: SelectionMode): boolean {
  return modeForAction(button.action) === mode;
}
