export enum CellState {
  Free = 'free',
  Obstacle = 'obstacle',
  Start = 'start',
  Target = 'target'
}

export enum SearchStatus {
  Ready = 'ready',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed'
}

export enum SelectionMode {
  Obstacle = 'obstacle',
  Start = 'start',
  Target = 'target'
}

export enum MenuAction {
  PlaceObstacles = 'placeObstacles',
  PlaceStart = 'placeStart',
  PlaceTarget = 'placeTarget',
  ResetGrid = 'resetGrid',
  SolveVisual = 'solveVisual',
  SolveInstant = 'solveInstant'
}

// How a cell is drawn once search marks are layered over its state.
export enum CellView {
  Free = 'free',
  Obstacle = 'obstacle',
  Start = 'start',
  Target = 'target',
  Open = 'open',
  Closed = 'closed',
  Path = 'path',
  Unreachable = 'unreachable'
}

export enum MessageLevel {
  Info = 'info',
  Warn = 'warn'
}

export enum RendererMode {
  Ascii = 'ascii',
  Pixi = 'pixi'
}
