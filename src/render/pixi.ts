import { Application, Container, Graphics, Text } from 'pixi.js';
import type { GridView, MenuButton, Rect } from '../types';
import { CellView, SelectionMode } from '../types/enums';
import type { SearchOverlay } from '../ui/overlay';
import { cellRect } from '../ui/layout';
import { isActiveButton } from '../ui/menu';
import { t } from '../i18n';
import { CELL_COLORS, MENU_LAYOUT, UI_COLORS } from '../core/const';

export type PixiRenderContext = {
  grid: GridView;
  overlay: SearchOverlay;
  gridRect: Rect;
  menuRect: Rect;
  buttons: readonly MenuButton[];
  mode: SelectionMode;
};

export class PixiRenderer {
  private readonly app: Application;
  private gridLayer!: Container;
  private labelLayer!: Container;
  private menuLayer!: Container;
  private initialized: boolean;
  private pendingRender?: PixiRenderContext;

  public constructor(canvas: HTMLCanvasElement, width: number, height: number) {
    this.initialized = false;

    this.app = new Application();
    void this.app
      .init({
        canvas,
        width,
        height,
        background: UI_COLORS.menuBackground,
        antialias: false,
        autoDensity: true
      })
      .then(() => {
        // Frames are drawn on demand, when the grid or a search step changes.
        this.app.ticker.stop();

        this.gridLayer = new Container();
        this.labelLayer = new Container();
        this.menuLayer = new Container();
        this.app.stage.addChild(this.gridLayer);
        this.app.stage.addChild(this.labelLayer);
        this.app.stage.addChild(this.menuLayer);
        this.initialized = true;

        if (this.pendingRender) {
          const pending: PixiRenderContext = this.pendingRender;
          this.pendingRender = undefined;
          this.render(pending);
        }
      })
      .catch((err: unknown) => {
        console.error('Pixi renderer init failed', err);
      });
  }

  public render(ctx: PixiRenderContext): void {
    if (!this.initialized) {
      this.pendingRender = ctx;
      return;
    }

    this.drawGrid(ctx);
    this.drawMenu(ctx);
    this.app.render();
  }

  private drawGrid(ctx: PixiRenderContext): void {
    const { grid, overlay, gridRect } = ctx;

    for (const child of this.labelLayer.removeChildren()) {
      child.destroy();
    }
    for (const child of this.gridLayer.removeChildren()) {
      child.destroy();
    }

    const g: Graphics = new Graphics();
    for (let row: number = 0; row < grid.rows; row++) {
      for (let col: number = 0; col < grid.cols; col++) {
        const view: CellView = overlay.viewOf(grid, { row, col });
        const r: Rect = cellRect({ row, col }, gridRect, grid.rows, grid.cols);
        g.rect(r.x, r.y, r.width, r.height).fill(CELL_COLORS[view]);
        g.rect(r.x, r.y, r.width, r.height).stroke({ width: 1, color: UI_COLORS.cellBorder });

        const glyph: string | undefined = roleGlyph(view);
        if (glyph) {
          this.labelLayer.addChild(this.centeredText(glyph, r, UI_COLORS.cellText, Math.floor(r.height * 0.8)));
        }
      }
    }
    this.gridLayer.addChild(g);
  }

  private drawMenu(ctx: PixiRenderContext): void {
    for (const child of this.menuLayer.removeChildren()) {
      child.destroy();
    }

    const bg: Graphics = new Graphics();
    bg.rect(ctx.menuRect.x, ctx.menuRect.y, ctx.menuRect.width, ctx.menuRect.height).fill(UI_COLORS.menuBackground);
    this.menuLayer.addChild(bg);

    for (const b of ctx.buttons) {
      const active: boolean = isActiveButton(b, ctx.mode);
      const label: string = active ? `[${t(b.labelKey)}]` : t(b.labelKey);
      const color: number = active ? UI_COLORS.activeButtonText : UI_COLORS.buttonText;
      this.menuLayer.addChild(this.centeredText(label, b.rect, color, Math.max(10, Math.floor(b.rect.height / 3) - MENU_LAYOUT.padding / 2)));
    }
  }

  private centeredText(text: string, r: Rect, color: number, fontSize: number): Text {
    const label: Text = new Text({
      text,
      style: { fontFamily: 'Arial', fontSize, fontWeight: 'bold', fill: color }
    });
    label.anchor.set(0.5);
    label.x = r.x + r.width / 2;
    label.y = r.y + r.height / 2;
    return label;
  }
}

function roleGlyph(view: CellView): string | undefined {
  switch (view) {
    case CellView.Start:
      return 'S';
    case CellView.Target:
    case CellView.Unreachable:
      return 'T';
    default:
      return undefined;
  }
}
