/**
 * AttractorSet - insertion-ordered attractor storage
 *
 * Attractors are never removed while the set lives. Killing one leaves a
 * tombstone (`alive: false`) so indices stay stable for anything holding
 * on to them, and a dead attractor never comes back.
 */

import type { NodeId, Vec2 } from '@arbor/core';
import { v2 } from '@arbor/core';

export interface Attractor {
  readonly position: Vec2;
  readonly alive: boolean;
  /** Node credited by the latest attraction phase, if any */
  readonly owner: NodeId | null;
}

interface AttractorState {
  position: Vec2;
  alive: boolean;
  owner: NodeId | null;
}

export class AttractorSet implements Iterable<Attractor> {
  private points: AttractorState[] = [];
  private living = 0;

  static fromPositions(positions: Iterable<Vec2>): AttractorSet {
    const set = new AttractorSet();
    set.addMany(positions);
    return set;
  }

  get size(): number {
    return this.points.length;
  }

  add(position: Vec2): number {
    this.points.push({ position: v2.clone(position), alive: true, owner: null });
    this.living++;
    return this.points.length - 1;
  }

  /**
   * Append several attractors, returning the index range [start, end)
   */
  addMany(positions: Iterable<Vec2>): { start: number; end: number } {
    const start = this.points.length;
    for (const position of positions) {
      this.add(position);
    }
    return { start, end: this.points.length };
  }

  get(index: number): Attractor {
    return this.point(index);
  }

  /**
   * Reposition an attractor between ticks (drag-to-move)
   */
  move(index: number, position: Vec2): void {
    this.point(index).position = v2.clone(position);
  }

  setOwner(index: number, owner: NodeId | null): void {
    this.point(index).owner = owner;
  }

  /**
   * Mark an attractor dead. Returns false when it was already dead.
   */
  kill(index: number): boolean {
    const point = this.point(index);
    if (!point.alive) {
      return false;
    }
    point.alive = false;
    point.owner = null;
    this.living--;
    return true;
  }

  aliveCount(): number {
    return this.living;
  }

  anyAlive(): boolean {
    return this.living > 0;
  }

  /**
   * Indices of alive attractors, ascending
   */
  *aliveIndices(): IterableIterator<number> {
    for (let i = 0; i < this.points.length; i++) {
      if (this.points[i].alive) {
        yield i;
      }
    }
  }

  [Symbol.iterator](): Iterator<Attractor> {
    return this.points[Symbol.iterator]();
  }

  clear(): void {
    this.points = [];
    this.living = 0;
  }

  private point(index: number): AttractorState {
    if (!Number.isInteger(index) || index < 0 || index >= this.points.length) {
      throw new Error(`Attractor index out of range: ${index}`);
    }
    return this.points[index];
  }
}
