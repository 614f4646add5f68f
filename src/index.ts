// Pathfinding core: grid model, A* engine and step contract.
export * from './types';
export { Grid, defaultRoles } from './maps/grid';
export { SearchRun, startSearch, solve } from './systems/astar';
export { heuristic, edgeCost } from './systems/heuristic';
export { reconstructPath } from './systems/path';
export { MinPriorityQueue } from './systems/frontier';
export {
  ERR,
  PathfinderError,
  InvalidDimensionsError,
  OutOfBoundsError,
  InvalidStateError,
  InvalidConfigurationError,
  ReconstructionError,
  isRecoverable
} from './core/errors';
export type { ErrorCode } from './core/errors';
