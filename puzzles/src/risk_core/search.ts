import { InvariantViolation } from '@daily-puzzles/shared';
import type { Edge, Grid, Pos, Route } from './types';
import { assertRectangular, buildEdges, indexOf, minCost } from './grid';
import { BinaryHeap } from './heap';

type Open = {
  i: number;     // cell index
  g: number;     // cost so far
  f: number;     // g + heuristic
};

function adjacency(g: Grid, edges: Edge[]): Edge[][] {
  const out: Edge[][] = g.cells.map(() => []);
  for (const e of edges) out[indexOf(g, e.from)].push(e);
  return out;
}

// A* from top-left to bottom-right; the start cell is free.
// h = Manhattan distance * cheapest cell, admissible with zero-cost cells.
export function findMinCostRoute(g: Grid): Route {
  assertRectangular(g);
  const adj = adjacency(g, buildEdges(g));
  const goal = g.cells.length - 1;
  const end = g.cells[goal];
  const floor = minCost(g);
  const h = (i: number) => (end.x - g.cells[i].x + end.y - g.cells[i].y) * floor;

  const dist = new Array<number>(g.cells.length).fill(Number.POSITIVE_INFINITY);
  const prev = new Array<number>(g.cells.length).fill(-1);
  const closed = new Uint8Array(g.cells.length);
  const open = new BinaryHeap<Open>((a, b) => a.f < b.f || (a.f === b.f && a.g > b.g));

  dist[0] = 0;
  open.push({ i: 0, g: 0, f: h(0) });

  while (open.size) {
    const cur = open.pop();
    if (!cur) break;
    if (closed[cur.i]) continue;
    closed[cur.i] = 1;
    if (cur.i === goal) return { cost: cur.g, path: reconstruct(g, prev, goal) };

    for (const e of adj[cur.i]) {
      const j = indexOf(g, e.to);
      if (closed[j]) continue;
      const alt = cur.g + e.weight;
      if (alt < dist[j]) {
        dist[j] = alt;
        prev[j] = cur.i;
        open.push({ i: j, g: alt, f: alt + h(j) });
      }
    }
  }

  throw new InvariantViolation(`no path from 0,0 to ${end.x},${end.y}`);
}

export function findMinCostPath(g: Grid): number {
  return findMinCostRoute(g).cost;
}

function reconstruct(g: Grid, prev: number[], goal: number): Pos[] {
  const path: Pos[] = [];
  for (let i = goal; i !== -1; i = prev[i]) {
    const { x, y } = g.cells[i];
    path.push({ x, y });
  }
  return path.reverse();
}
