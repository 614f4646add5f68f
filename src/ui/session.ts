import type { Cell, GridView, Path, SessionOptions, StepEvent } from '../types';
import { CellState, MenuAction, SearchStatus, SelectionMode } from '../types/enums';
import { Grid } from '../maps/grid';
import { SearchRun, startSearch } from '../systems/astar';
import { isRecoverable } from '../core/errors';
import { MESSAGE_LOG_SIZE } from '../core/const';
import { formatCell, keyCell } from '../core/util';
import { t } from '../i18n';
import { MessageLog } from './log';
import { SearchOverlay } from './overlay';
import { modeForAction } from './menu';

/**
 * Interactive state around one grid: what a click places, the active search
 * run, and the marks left by the last search.
 *
 * The session holds the only mutable reference to its grid. Edits are refused
 * while a search runs and after a solve, until the grid is reset.
 */
export class PathfinderSession {
  public readonly log: MessageLog;
  public readonly overlay: SearchOverlay = new SearchOverlay();
  private readonly grid: Grid;
  private mode: SelectionMode = SelectionMode.Obstacle;
  private readonly dragSelection: Set<string> = new Set<string>();
  private run: SearchRun | undefined;
  private solved: boolean = false;
  private lastPath: Path | undefined;
  private lockNoticeShown: boolean = false;

  public constructor(options: SessionOptions, log?: MessageLog) {
    this.grid = Grid.create(options.rows, options.cols, {
      defaultStart: options.defaultStart,
      defaultTarget: options.defaultTarget
    });
    this.log = log ?? new MessageLog(options.logSize ?? MESSAGE_LOG_SIZE);
    this.log.push(t('log.ready', { rows: options.rows, cols: options.cols }));
  }

  /**
   * Read-only view of the session's grid. Edits go through the session.
   */
  public get view(): GridView {
    return this.grid;
  }

  public get selectionMode(): SelectionMode {
    return this.mode;
  }

  public get isSearching(): boolean {
    return this.run !== undefined;
  }

  public get isSolved(): boolean {
    return this.solved;
  }

  public get path(): Path | undefined {
    return this.lastPath;
  }

  public get activeRun(): SearchRun | undefined {
    return this.run;
  }

  public setMode(mode: SelectionMode): void {
    if (mode === this.mode) return;
    this.mode = mode;
    this.log.push(t(`mode.${mode}`));
  }

  /**
   * Applies a press (or a drag over a cell) in the current selection mode.
   * @param cell The cell under the pointer.
   * @returns True if the grid changed.
   */
  public pointerDown(cell: Cell): boolean {
    if (this.isSearching) {
      return false;
    }
    if (this.solved) {
      if (!this.lockNoticeShown) {
        this.lockNoticeShown = true;
        this.log.warn(t('log.gridLocked'));
      }
      return false;
    }

    try {
      switch (this.mode) {
        case SelectionMode.Obstacle: {
          const k: string = keyCell(cell);
          // One toggle per cell per drag, so sweeping back over a cell does not undo it.
          if (this.dragSelection.has(k)) return false;
          this.dragSelection.add(k);
          return this.grid.toggleObstacle(cell);
        }
        case SelectionMode.Start:
          if (this.grid.getCellState(cell) === CellState.Target) return false;
          this.grid.setCellState(cell, CellState.Start);
          return true;
        case SelectionMode.Target:
          if (this.grid.getCellState(cell) === CellState.Start) return false;
          this.grid.setCellState(cell, CellState.Target);
          return true;
      }
    } catch (err: unknown) {
      this.report(err);
      return false;
    }
  }

  /**
   * Ends the current drag.
   */
  public pointerUp(): void {
    this.dragSelection.clear();
    this.lockNoticeShown = false;
  }

  /**
   * Runs a menu action.
   * @param action The selected action.
   * @returns The new run when the action starts a visual search.
   */
  public handleMenu(action: MenuAction): SearchRun | undefined {
    const mode: SelectionMode | undefined = modeForAction(action);
    if (mode) {
      this.setMode(mode);
      return undefined;
    }

    switch (action) {
      case MenuAction.ResetGrid:
        this.reset();
        return undefined;
      case MenuAction.SolveVisual:
        return this.beginSolve(true);
      case MenuAction.SolveInstant:
        this.solveInstantly();
        return undefined;
      default:
        return undefined;
    }
  }

  /**
   * Clears obstacles and search marks and restores the default start and target.
   * Abandons any running search.
   */
  public reset(): void {
    this.run = undefined;
    this.solved = false;
    this.lastPath = undefined;
    this.grid.reset();
    this.overlay.clear();
    this.dragSelection.clear();
    this.lockNoticeShown = false;
    this.log.push(t('log.reset'));
  }

  /**
   * Starts a new search from the grid's start to its target.
   * @param visual Whether the caller will animate the steps.
   * @returns The run, or undefined if one is already in progress or the grid was rejected.
   */
  public beginSolve(visual: boolean): SearchRun | undefined {
    if (this.run) {
      this.log.warn(t('log.searchBusy'));
      return undefined;
    }

    try {
      this.run = startSearch(this.grid, this.grid.start, this.grid.target, visual);
    } catch (err: unknown) {
      this.report(err);
      return undefined;
    }

    this.solved = false;
    this.lastPath = undefined;
    this.overlay.clear();
    this.log.push(t('log.searching', { start: formatCell(this.grid.start), target: formatCell(this.grid.target) }));
    return this.run;
  }

  /**
   * Pulls the next step of the active run into the overlay.
   * @returns The event, or undefined when no search is running.
   */
  public advance(): StepEvent | undefined {
    const run: SearchRun | undefined = this.run;
    if (!run) {
      return undefined;
    }

    const ev: StepEvent | undefined = run.next();
    if (ev) {
      this.overlay.apply(ev);
    }
    if (run.isFinished()) {
      this.finish(run);
    }
    return ev;
  }

  /**
   * Runs a whole search without pausing between steps.
   * @returns The path, or undefined if none exists or the search could not start.
   */
  public solveInstantly(): Path | undefined {
    if (!this.beginSolve(false)) {
      return undefined;
    }
    let ev: StepEvent | undefined = this.advance();
    while (ev) {
      ev = this.advance();
    }
    return this.lastPath;
  }

  private finish(run: SearchRun): void {
    this.run = undefined;
    this.solved = true;

    if (run.status === SearchStatus.Succeeded) {
      const path: Path | undefined = run.reconstructPath();
      if (path) {
        this.lastPath = path;
        this.overlay.showPath(path);
        this.log.push(t('log.pathFound', { length: path.length, steps: run.steps }));
      }
      return;
    }

    this.overlay.markUnreachable();
    this.log.push(t('log.noPath', { start: formatCell(run.start), target: formatCell(run.target) }));
  }

  private report(err: unknown): void {
    if (!isRecoverable(err)) {
      throw err;
    }
    this.log.warn(t('log.rejected', { message: err.message }));
  }
}
