import { MalformedInputError } from '@daily-puzzles/shared';
import type { Cell, Edge, Grid, Pos } from './types';

export enum Direction {
  Up,
  Right,
  Down,
  Left
}

const DELTAS: Record<Direction, { dx: number; dy: number }> = {
  [Direction.Up]: { dx: 0, dy: -1 },
  [Direction.Right]: { dx: 1, dy: 0 },
  [Direction.Down]: { dx: 0, dy: 1 },
  [Direction.Left]: { dx: -1, dy: 0 }
};

export function step(p: Pos, dir: Direction): Pos {
  const d = DELTAS[dir];
  return { x: p.x + d.dx, y: p.y + d.dy };
}

export function parseGrid(text: string): Grid {
  const lines = text.replace(/\r\n/g, '\n').split('\n');
  while (lines.length && lines[lines.length - 1].trim() === '') lines.pop();
  if (!lines.length) throw new MalformedInputError('grid is empty');

  const width = lines[0].length;
  const cells: Cell[] = [];
  lines.forEach((line, y) => {
    if (line.length !== width) {
      throw new MalformedInputError(`row ${y} has ${line.length} cells, expected ${width}`);
    }
    for (let x = 0; x < line.length; x++) {
      const ch = line[x];
      if (ch < '0' || ch > '9') {
        throw new MalformedInputError(`bad cell '${ch}' at ${x},${y}`);
      }
      cells.push({ x, y, cost: ch.charCodeAt(0) - 48 });
    }
  });
  return makeGrid(cells);
}

// Cells in any order; result is row-major.
export function makeGrid(cells: readonly Cell[]): Grid {
  let width = 0;
  let height = 0;
  for (const c of cells) {
    width = Math.max(width, c.x + 1);
    height = Math.max(height, c.y + 1);
  }
  const ordered = [...cells].sort((a, b) => a.y - b.y || a.x - b.x);
  const grid = { width, height, cells: ordered };
  assertRectangular(grid);
  return grid;
}

export function assertRectangular(g: Grid): void {
  if (g.width === 0 || g.height === 0) throw new MalformedInputError('grid is empty');
  if (g.cells.length !== g.width * g.height) {
    throw new MalformedInputError(`expected ${g.width * g.height} cells, got ${g.cells.length}`);
  }
  for (let i = 0; i < g.cells.length; i++) {
    const c = g.cells[i];
    if (c.y * g.width + c.x !== i) {
      throw new MalformedInputError(`missing or duplicate cell near ${c.x},${c.y}`);
    }
  }
}

export function inBounds(g: Grid, p: Pos): boolean {
  return p.x >= 0 && p.x < g.width && p.y >= 0 && p.y < g.height;
}

export function cellAt(g: Grid, x: number, y: number): Cell | undefined {
  if (!inBounds(g, { x, y })) return undefined;
  return g.cells[y * g.width + x];
}

export function indexOf(g: Grid, p: Pos): number {
  return p.y * g.width + p.x;
}

// Tile (bx, by) shifts every cost by bx + by, wrapping 9 -> 1.
export function scaleGrid(g: Grid, factor: number): Grid {
  if (!Number.isInteger(factor) || factor < 1) {
    throw new MalformedInputError(`scale factor must be a positive integer, got ${factor}`);
  }
  const cells: Cell[] = [];
  for (let by = 0; by < factor; by++) {
    for (let y = 0; y < g.height; y++) {
      for (let bx = 0; bx < factor; bx++) {
        for (let x = 0; x < g.width; x++) {
          const { cost } = g.cells[y * g.width + x];
          cells.push({
            x: bx * g.width + x,
            y: by * g.height + y,
            cost: bx === 0 && by === 0 ? cost : ((cost - 1 + bx + by) % 9) + 1
          });
        }
      }
    }
  }
  return { width: g.width * factor, height: g.height * factor, cells };
}

// Both directions of every right/down adjacency; entering a cell costs that cell.
export function buildEdges(g: Grid): Edge[] {
  const edges: Edge[] = [];
  for (const from of g.cells) {
    for (const dir of [Direction.Right, Direction.Down]) {
      const p = step(from, dir);
      const to = cellAt(g, p.x, p.y);
      if (!to) continue;
      edges.push({ from, to, weight: to.cost });
      edges.push({ from: to, to: from, weight: from.cost });
    }
  }
  return edges;
}

export function minCost(g: Grid): number {
  let m = Number.POSITIVE_INFINITY;
  for (const c of g.cells) m = Math.min(m, c.cost);
  return m;
}
