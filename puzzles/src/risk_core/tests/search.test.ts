import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { parseGrid, scaleGrid } from '../grid';
import { findMinCostPath, findMinCostRoute } from '../search';
import { BinaryHeap } from '../heap';

const SAMPLE = [
  '1163751742',
  '1381373672',
  '2136511328',
  '3694931569',
  '7463417111',
  '1319128137',
  '1359912421',
  '3125421639',
  '1293138521',
  '2311944581'
].join('\n');

describe('findMinCostPath', () => {
  it('finds the cheapest route through the 10x10 sample', () => {
    assert.equal(findMinCostPath(parseGrid(SAMPLE)), 40);
  });

  it('finds the cheapest route through the sample scaled by 5', () => {
    assert.equal(findMinCostPath(scaleGrid(parseGrid(SAMPLE), 5)), 315);
  });

  it('does not pay for the start cell', () => {
    assert.equal(findMinCostPath(parseGrid('91\n11')), 2);
    assert.equal(findMinCostPath(parseGrid('7')), 0);
  });

  it('prefers the cheap side of a fork', () => {
    assert.equal(findMinCostPath(parseGrid('19\n11')), 2);
  });

  it('follows routes that double back up and left', () => {
    const g = parseGrid(['19111', '19191', '11191', '99991'].join('\n'));
    const route = findMinCostRoute(g);
    assert.equal(route.cost, 11);
    assert.deepEqual(route.path.slice(0, 7), [
      { x: 0, y: 0 },
      { x: 0, y: 1 },
      { x: 0, y: 2 },
      { x: 1, y: 2 },
      { x: 2, y: 2 },
      { x: 2, y: 1 },
      { x: 2, y: 0 }
    ]);
    assert.deepEqual(route.path[route.path.length - 1], { x: 4, y: 3 });
  });

  it('never beats the Manhattan distance when every cost is at least 1', () => {
    for (const text of ['11\n11', '123\n456\n789', '999\n999', SAMPLE]) {
      const g = parseGrid(text);
      assert.ok(findMinCostPath(g) >= g.width - 1 + g.height - 1);
    }
  });

  it('handles zero-cost cells', () => {
    assert.equal(findMinCostPath(parseGrid('100\n990\n990')), 0);
  });
});

describe('BinaryHeap', () => {
  it('pops in ascending order', () => {
    const h = new BinaryHeap<number>((a, b) => a < b);
    for (const n of [5, 3, 8, 1, 9, 2, 2]) h.push(n);
    const out: number[] = [];
    while (h.size) {
      const n = h.pop();
      if (n !== undefined) out.push(n);
    }
    assert.deepEqual(out, [1, 2, 2, 3, 5, 8, 9]);
    assert.equal(h.pop(), undefined);
  });

  it('peeks without removing', () => {
    const h = new BinaryHeap<number>((a, b) => a < b);
    h.push(4);
    h.push(2);
    assert.equal(h.peek(), 2);
    assert.equal(h.size, 2);
  });
});
