export type Pos = { x: number; y: number };

export type Cell = {
  x: number;
  y: number;
  // cost paid on entering this cell
  cost: number;
};

export type Grid = {
  width: number;
  height: number;
  // row-major: cells[y * width + x]
  cells: Cell[];
};

export type Edge = { from: Cell; to: Cell; weight: number };

export type Route = { cost: number; path: Pos[] };
