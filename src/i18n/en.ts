export const en: Record<string, string> = {
  'menu.placeObstacles': 'Place obstacles',
  'menu.placeStart': 'Place start node',
  'menu.placeTarget': 'Place target node',
  'menu.resetGrid': 'Reset grid',
  'menu.solveVisual': 'Solve with visual',
  'menu.solveInstant': 'Solve without visual',
  'mode.obstacle': 'Placing obstacles',
  'mode.start': 'Placing the start',
  'mode.target': 'Placing the target',
  'log.ready': 'Grid {rows}x{cols} ready.',
  'log.reset': 'Grid reset.',
  'log.searching': 'Searching from {start} to {target}...',
  'log.pathFound': 'Path found: {length} cells after {steps} steps.',
  'log.noPath': 'No path exists between {start} and {target}.',
  'log.searchBusy': 'A search is already running.',
  'log.gridLocked': 'Reset the grid before editing it again.',
  'log.rejected': '{message}',
  'renderer.ascii': 'ASCII',
  'renderer.pixi': 'Canvas'
};
