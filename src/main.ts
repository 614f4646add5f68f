import type { Cell, MenuButton, Point } from './types';
import type { SearchRun } from './systems/astar';
import { MenuAction, MessageLevel, RendererMode } from './types/enums';
import { DEFAULT_GRID_COLS, DEFAULT_GRID_ROWS, GRID_RECT, MENU_RECT } from './core/const';
import { PathfinderSession } from './ui/session';
import { SearchAnimator } from './ui/animator';
import { layoutMenu, menuButtonAt } from './ui/menu';
import { pointToCell } from './ui/layout';
import { renderGridAscii } from './render/ascii';
import { PixiRenderer } from './render/pixi';
import { t } from './i18n';

function requireElement<T extends HTMLElement>(id: string, kind: { new (): T }): T {
  const el: HTMLElement | null = document.getElementById(id);
  if (!(el instanceof kind)) {
    throw new Error(`Missing #${id} element.`);
  }
  return el;
}

const canvas: HTMLCanvasElement = requireElement('gameCanvas', HTMLCanvasElement);
const asciiEl: HTMLPreElement = requireElement('ascii', HTMLPreElement);
const logEl: HTMLElement = requireElement('log', HTMLElement);
const btnAscii: HTMLButtonElement = requireElement('btnAscii', HTMLButtonElement);
const btnCanvas: HTMLButtonElement = requireElement('btnCanvas', HTMLButtonElement);

const session: PathfinderSession = new PathfinderSession({ rows: DEFAULT_GRID_ROWS, cols: DEFAULT_GRID_COLS });
const buttons: MenuButton[] = layoutMenu(MENU_RECT);
const renderer: PixiRenderer = new PixiRenderer(canvas, GRID_RECT.width, GRID_RECT.height + MENU_RECT.height);
const animator: SearchAnimator = new SearchAnimator(session, () => render());

let rendererMode: RendererMode = RendererMode.Pixi;
let pointerHeld: boolean = false;

function render(): void {
  // The canvas always carries the menu; the ASCII view mirrors the grid beside it.
  renderer.render({
    grid: session.view,
    overlay: session.overlay,
    gridRect: GRID_RECT,
    menuRect: MENU_RECT,
    buttons,
    mode: session.selectionMode
  });
  if (rendererMode === RendererMode.Ascii) {
    asciiEl.textContent = renderGridAscii(session.view, session.overlay);
  }
  renderLog();
}

function renderLog(): void {
  logEl.replaceChildren(
    ...session.log.all().map((m) => {
      const line: HTMLDivElement = document.createElement('div');
      line.textContent = m.text;
      if (m.level === MessageLevel.Warn) line.className = 'warn';
      return line;
    })
  );
}

function syncRendererUi(): void {
  asciiEl.hidden = rendererMode !== RendererMode.Ascii;
  btnAscii.disabled = rendererMode === RendererMode.Ascii;
  btnCanvas.disabled = rendererMode === RendererMode.Pixi;
  btnAscii.textContent = t('renderer.ascii');
  btnCanvas.textContent = t('renderer.pixi');
}

function canvasPoint(e: PointerEvent): Point {
  const rect: DOMRect = canvas.getBoundingClientRect();
  return { x: e.clientX - rect.left, y: e.clientY - rect.top };
}

function onMenu(action: MenuAction): void {
  const run: SearchRun | undefined = session.handleMenu(action);
  if (run) {
    animator.start();
  }
  render();
}

canvas.addEventListener('pointerdown', (e: PointerEvent) => {
  const p: Point = canvasPoint(e);
  const button: MenuButton | undefined = menuButtonAt(buttons, p);
  if (button) {
    onMenu(button.action);
    return;
  }

  pointerHeld = true;
  const cell: Cell | undefined = pointToCell(p, GRID_RECT, session.view.rows, session.view.cols);
  if (cell && session.pointerDown(cell)) {
    render();
  }
});

canvas.addEventListener('pointermove', (e: PointerEvent) => {
  if (!pointerHeld) return;
  const cell: Cell | undefined = pointToCell(canvasPoint(e), GRID_RECT, session.view.rows, session.view.cols);
  if (cell && session.pointerDown(cell)) {
    render();
  }
});

window.addEventListener('pointerup', () => {
  pointerHeld = false;
  session.pointerUp();
});

btnAscii.addEventListener('click', () => {
  rendererMode = RendererMode.Ascii;
  syncRendererUi();
  render();
});

btnCanvas.addEventListener('click', () => {
  rendererMode = RendererMode.Pixi;
  syncRendererUi();
  render();
});

syncRendererUi();
render();
