// Re-export all types from a single entry point
export * from './common';
export * from './enums';
export * from './grid';
export * from './search';
export * from './ui';
