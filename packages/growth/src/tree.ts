/**
 * Tree - flat node arena for a growing forest
 *
 * Nodes live in one array and refer to each other by index. Ids are
 * assigned in append order, so a child's id is always greater than its
 * parent's and index order is a topological order. Positions and radii
 * never change after creation; only child lists grow.
 */

import type { NodeId, Vec2 } from '@arbor/core';
import { v2 } from '@arbor/core';

export interface TreeNode {
  readonly id: NodeId;
  readonly position: Vec2;
  readonly radius: number;
  readonly parent: NodeId | null;
  readonly children: readonly NodeId[];
}

interface MutableNode extends TreeNode {
  children: NodeId[];
}

export type Edge = readonly [parent: NodeId, child: NodeId];

export class Tree {
  private nodes: MutableNode[] = [];

  /**
   * Tree with a single root at id 0
   */
  static withRoot(position: Vec2, radius: number): Tree {
    const tree = new Tree();
    tree.addRoot(position, radius);
    return tree;
  }

  get size(): number {
    return this.nodes.length;
  }

  addRoot(position: Vec2, radius: number): NodeId {
    return this.append(position, radius, null);
  }

  addChild(parent: NodeId, position: Vec2, radius: number): NodeId {
    const parentNode = this.node(parent);
    const id = this.append(position, radius, parent);
    parentNode.children.push(id);
    return id;
  }

  get(id: NodeId): TreeNode {
    return this.node(id);
  }

  has(id: NodeId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.nodes.length;
  }

  all(): readonly TreeNode[] {
    return this.nodes;
  }

  roots(): NodeId[] {
    return this.nodes.filter(n => n.parent === null).map(n => n.id);
  }

  *edges(): IterableIterator<Edge> {
    for (const node of this.nodes) {
      for (const child of node.children) {
        yield [node.id, child];
      }
    }
  }

  /**
   * True when some existing child of `parent` lies strictly closer than
   * `threshold` to `position`.
   */
  hasChildNear(parent: NodeId, position: Vec2, threshold: number): boolean {
    const thresholdSq = threshold * threshold;
    for (const child of this.node(parent).children) {
      if (v2.distanceSq(this.nodes[child].position, position) < thresholdSq) {
        return true;
      }
    }
    return false;
  }

  clear(): void {
    this.nodes = [];
  }

  private append(position: Vec2, radius: number, parent: NodeId | null): NodeId {
    const id = this.nodes.length;
    this.nodes.push({
      id,
      position: Object.freeze(v2.clone(position)),
      radius,
      parent,
      children: [],
    });
    return id;
  }

  private node(id: NodeId): MutableNode {
    if (!this.has(id)) {
      throw new Error(`Unknown node id: ${id}`);
    }
    return this.nodes[id];
  }
}
