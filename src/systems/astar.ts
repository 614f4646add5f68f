import type { Cell, Path, SearchNode, SearchOutcome, StepEvent, StepSequence } from '../types';
import { CellState, SearchStatus } from '../types/enums';
import type { Grid } from '../maps/grid';
import { InvalidConfigurationError, OutOfBoundsError } from '../core/errors';
import { formatCell, keyCell, sameCell } from '../core/util';
import { edgeCost, heuristic } from './heuristic';
import { MinPriorityQueue } from './frontier';
import { reconstructPath } from './path';

/**
 * One A* run over a private copy of a grid, advanced one frontier pop at a time.
 *
 * Ready → Running → Succeeded | Failed. A finished run stays finished;
 * search again by starting a new run.
 */
export class SearchRun implements StepSequence {
  private readonly grid: Grid;
  private readonly open: MinPriorityQueue<Cell> = new MinPriorityQueue<Cell>(keyCell);
  private readonly closed: Set<string> = new Set<string>();
  private readonly nodes: Map<string, SearchNode> = new Map<string, SearchNode>();
  private readonly predecessors: Map<string, Cell> = new Map<string, Cell>();
  private state: SearchStatus = SearchStatus.Ready;
  private emitted: number = 0;
  private exhausted: boolean = false;

  /**
   * @param grid The grid to search. The run keeps its own copy.
   * @param start The cell to search from.
   * @param target The cell to reach.
   * @param visual Whether the caller means to watch each step. Does not change the search.
   */
  public constructor(grid: Grid, public readonly start: Cell, public readonly target: Cell, public readonly visual: boolean = false) {
    const endpoints: readonly [string, Cell][] = [
      ['start', start],
      ['target', target]
    ];
    for (const [role, endpoint] of endpoints) {
      if (!grid.inBounds(endpoint)) {
        throw new OutOfBoundsError(endpoint, grid.rows, grid.cols);
      }
      if (grid.getCellState(endpoint) === CellState.Obstacle) {
        throw new InvalidConfigurationError(endpoint, `The ${role} cell ${formatCell(endpoint)} is an obstacle`);
      }
    }

    this.grid = grid.clone();

    const h: number = heuristic(start, target);
    this.nodes.set(keyCell(start), { cell: start, gCost: 0, fCost: h });
    this.open.insert(start, h);
  }

  public get status(): SearchStatus {
    return this.state;
  }

  public get steps(): number {
    return this.emitted;
  }

  public get openCount(): number {
    return this.open.size;
  }

  public get closedCount(): number {
    return this.closed.size;
  }

  public isFinished(): boolean {
    return this.state === SearchStatus.Succeeded || this.state === SearchStatus.Failed;
  }

  public isOpen(cell: Cell): boolean {
    return this.open.has(cell);
  }

  public isClosed(cell: Cell): boolean {
    return this.closed.has(keyCell(cell));
  }

  public gCostOf(cell: Cell): number | undefined {
    return this.nodes.get(keyCell(cell))?.gCost;
  }

  public fCostOf(cell: Cell): number | undefined {
    return this.nodes.get(keyCell(cell))?.fCost;
  }

  /**
   * Performs one pop-and-expand cycle.
   * @returns The step event, or undefined once the terminal event has been returned.
   */
  public next(): StepEvent | undefined {
    if (this.exhausted) {
      return undefined;
    }
    if (this.isFinished()) {
      this.exhausted = true;
      return undefined;
    }

    this.state = SearchStatus.Running;

    const current: Cell | undefined = this.open.extractMin();
    if (!current) {
      this.state = SearchStatus.Failed;
      return this.emit(undefined, []);
    }

    const currentKey: string = keyCell(current);
    this.closed.add(currentKey);

    if (sameCell(current, this.target)) {
      this.state = SearchStatus.Succeeded;
      return this.emit(current, []);
    }

    const currentNode: SearchNode | undefined = this.nodes.get(currentKey);
    if (!currentNode) {
      throw new Error(`SearchRun: popped ${formatCell(current)} without a search node`);
    }

    const updates: Cell[] = [];
    for (const nb of this.grid.neighborsOf(current)) {
      const nbKey: string = keyCell(nb);
      if (this.closed.has(nbKey)) continue;

      const tentativeG: number = currentNode.gCost + edgeCost(current, nb);
      const known: SearchNode | undefined = this.nodes.get(nbKey);
      if (known && tentativeG >= known.gCost) continue;

      const f: number = tentativeG + heuristic(nb, this.target);
      this.nodes.set(nbKey, { cell: nb, gCost: tentativeG, fCost: f });
      this.predecessors.set(nbKey, current);

      if (this.open.has(nb)) {
        this.open.decreaseKey(nb, f);
      } else {
        this.open.insert(nb, f);
      }
      updates.push(nb);
    }

    return this.emit(current, updates);
  }

  /**
   * Pulls events until the run ends or `maxSteps` events have been pulled.
   * @param maxSteps Optional cap on the number of events pulled by this call.
   * @returns The last event pulled, or undefined if none was left.
   */
  public drain(maxSteps: number = Number.POSITIVE_INFINITY): StepEvent | undefined {
    let last: StepEvent | undefined;
    for (let i: number = 0; i < maxSteps; i++) {
      const ev: StepEvent | undefined = this.next();
      if (!ev) break;
      last = ev;
    }
    return last;
  }

  /**
   * Rebuilds the path found by a successful run.
   * @returns The start-to-target path, or undefined unless the run succeeded.
   */
  public reconstructPath(): Path | undefined {
    if (this.state !== SearchStatus.Succeeded) {
      return undefined;
    }
    return reconstructPath(this.predecessors, this.start, this.target);
  }

  public *[Symbol.iterator](): Iterator<StepEvent> {
    let ev: StepEvent | undefined = this.next();
    while (ev) {
      yield ev;
      ev = this.next();
    }
  }

  private emit(visited: Cell | undefined, frontierUpdates: Cell[]): StepEvent {
    const ev: StepEvent = {
      index: this.emitted,
      frontierUpdates,
      status: this.state,
      openCount: this.open.size
    };
    if (visited) {
      ev.visited = visited;
    }
    this.emitted++;
    return ev;
  }
}

/**
 * Begins a new search run. The grid is copied, so later edits do not reach the run.
 * @param grid The grid to search.
 * @param start The start cell.
 * @param target The target cell.
 * @param visual Whether the caller will render each step.
 * @returns The run, ready for its first step.
 */
export function startSearch(grid: Grid, start: Cell, target: Cell, visual: boolean = false): SearchRun {
  return new SearchRun(grid, start, target, visual);
}

/**
 * Searches from the grid's own start to its own target without stopping.
 * @param grid The grid to solve.
 * @returns The outcome, with the path when one exists.
 */
export function solve(grid: Grid): SearchOutcome {
  const run: SearchRun = startSearch(grid, grid.start, grid.target);
  run.drain();

  const outcome: SearchOutcome = {
    status: run.status === SearchStatus.Succeeded ? SearchStatus.Succeeded : SearchStatus.Failed,
    steps: run.steps,
    visitedCount: run.closedCount
  };
  const path: Path | undefined = run.reconstructPath();
  if (path) {
    outcome.path = path;
  }
  return outcome;
}
