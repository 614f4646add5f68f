export type Point = { x: number; y: number };

export type Cell = { readonly row: number; readonly col: number };

export type Rect = { x: number; y: number; width: number; height: number };

export type Path = readonly Cell[];
