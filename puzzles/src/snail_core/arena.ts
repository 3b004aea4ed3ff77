import { InvariantViolation } from '@daily-puzzles/shared';
import { type SnailNumber, leaf, pair } from './types';

export type Handle = number;

export type Side = 'left' | 'right';

type Link = {
  parent: Handle | null;
  // which child of `parent` this node is; null for the root
  side: Side | null;
};

type LeafNode = Link & { kind: 'leaf'; value: number };
type PairNode = Link & { kind: 'pair'; left: Handle; right: Handle };
type ArenaNode = LeafNode | PairNode;

// Pairs nested this deep or deeper explode.
export const EXPLODE_DEPTH = 4;
// Leaves at or above this value split.
export const SPLIT_AT = 10;

// Nodes addressed by handle, each linked to its parent. Explode and split
// rewrite in place or append, so handles stay stable; detached nodes are
// left behind for the life of one reduction.
export class SnailArena {
  private nodes: ArenaNode[] = [];
  readonly root: Handle;

  private constructor(tree: SnailNumber) {
    this.root = this.insert(tree, null, null);
  }

  static fromTree(tree: SnailNumber): SnailArena {
    return new SnailArena(tree);
  }

  private insert(tree: SnailNumber, parent: Handle | null, side: Side | null): Handle {
    const h = this.nodes.length;
    if (tree.kind === 'leaf') {
      this.nodes.push({ kind: 'leaf', value: tree.value, parent, side });
      return h;
    }
    // reserve the slot so the pair's handle precedes its children
    this.nodes.push({ kind: 'leaf', value: 0, parent, side });
    const left = this.insert(tree.left, h, 'left');
    const right = this.insert(tree.right, h, 'right');
    this.nodes[h] = { kind: 'pair', left, right, parent, side };
    return h;
  }

  node(h: Handle): ArenaNode {
    const n = this.nodes[h];
    if (!n) throw new InvariantViolation(`dangling handle ${h}`);
    return n;
  }

  private leafAt(h: Handle): LeafNode {
    const n = this.node(h);
    if (n.kind !== 'leaf') throw new InvariantViolation(`handle ${h} is not a leaf`);
    return n;
  }

  depthOf(h: Handle): number {
    let depth = 0;
    for (let p = this.node(h).parent; p !== null; p = this.node(p).parent) depth++;
    return depth;
  }

  private extremeLeaf(h: Handle, side: Side): Handle {
    let cur = h;
    for (let n = this.node(cur); n.kind === 'pair'; n = this.node(cur)) {
      cur = side === 'left' ? n.left : n.right;
    }
    return cur;
  }

  leftNeighbour(h: Handle): Handle | null {
    return this.neighbour(h, 'left');
  }

  rightNeighbour(h: Handle): Handle | null {
    return this.neighbour(h, 'right');
  }

  // Nearest leaf on the `dir` side, or null.
  // Climb while we are the `dir` child, step across to the sibling subtree,
  // then descend to its leaf nearest to us.
  private neighbour(h: Handle, dir: Side): Handle | null {
    let cur = h;
    let n = this.node(cur);
    while (n.side === dir) {
      if (n.parent === null) return null;
      cur = n.parent;
      n = this.node(cur);
    }
    if (n.parent === null) return null;
    const parent = this.node(n.parent);
    if (parent.kind !== 'pair') throw new InvariantViolation(`parent of ${cur} is a leaf`);
    const sibling = dir === 'left' ? parent.left : parent.right;
    return this.extremeLeaf(sibling, dir === 'left' ? 'right' : 'left');
  }

  // pre-order, left first
  findExploding(): Handle | null {
    const stack: { h: Handle; depth: number }[] = [{ h: this.root, depth: 0 }];
    while (stack.length) {
      const top = stack.pop();
      if (!top) break;
      const n = this.node(top.h);
      if (n.kind === 'leaf') continue;
      if (
        top.depth >= EXPLODE_DEPTH &&
        this.node(n.left).kind === 'leaf' &&
        this.node(n.right).kind === 'leaf'
      ) {
        return top.h;
      }
      stack.push({ h: n.right, depth: top.depth + 1 });
      stack.push({ h: n.left, depth: top.depth + 1 });
    }
    return null;
  }

  findSplittable(): Handle | null {
    for (const h of this.leaves()) {
      if (this.leafAt(h).value >= SPLIT_AT) return h;
    }
    return null;
  }

  explode(): boolean {
    const h = this.findExploding();
    if (h === null) return false;
    const n = this.node(h);
    if (n.kind !== 'pair') throw new InvariantViolation(`exploding handle ${h} is not a pair`);
    const l = this.leafAt(n.left);
    const r = this.leafAt(n.right);

    const before = this.leftNeighbour(h);
    if (before !== null) this.leafAt(before).value += l.value;
    const after = this.rightNeighbour(h);
    if (after !== null) this.leafAt(after).value += r.value;

    this.nodes[h] = { kind: 'leaf', value: 0, parent: n.parent, side: n.side };
    return true;
  }

  split(): boolean {
    const h = this.findSplittable();
    if (h === null) return false;
    const n = this.leafAt(h);
    const half = Math.floor(n.value / 2);
    const left = this.nodes.push({ kind: 'leaf', value: half, parent: h, side: 'left' }) - 1;
    const right =
      this.nodes.push({ kind: 'leaf', value: n.value - half, parent: h, side: 'right' }) - 1;
    this.nodes[h] = { kind: 'pair', left, right, parent: n.parent, side: n.side };
    return true;
  }

  // Explosions always win over splits; one rewrite per pass.
  reduce(): this {
    let changed = true;
    while (changed) changed = this.explode() || this.split();
    return this;
  }

  magnitude(h: Handle = this.root): number {
    const n = this.node(h);
    if (n.kind === 'leaf') return n.value;
    return 3 * this.magnitude(n.left) + 2 * this.magnitude(n.right);
  }

  // in order, from the root only
  leaves(): Handle[] {
    const out: Handle[] = [];
    const stack: Handle[] = [this.root];
    while (stack.length) {
      const h = stack.pop();
      if (h === undefined) break;
      const n = this.node(h);
      if (n.kind === 'leaf') {
        out.push(h);
      } else {
        stack.push(n.right, n.left);
      }
    }
    return out;
  }

  toTree(h: Handle = this.root): SnailNumber {
    const n = this.node(h);
    if (n.kind === 'leaf') return leaf(n.value);
    return pair(this.toTree(n.left), this.toTree(n.right));
  }
}
