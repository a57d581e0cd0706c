/**
 * InfluenceBuffer - per-node accumulator for one phase-cycle
 *
 * Slot `i` holds the summed attraction direction and contributor count
 * for node `i`. The attraction phase resizes and zeroes the buffer
 * before accumulating, so nothing carries over between cycles.
 */

import type { NodeId, Vec2 } from '@arbor/core';
import { v2 } from '@arbor/core';

export class InfluenceBuffer {
  private dirX: Float64Array;
  private dirY: Float64Array;
  private counts: Uint32Array;

  constructor(len = 0) {
    this.dirX = new Float64Array(len);
    this.dirY = new Float64Array(len);
    this.counts = new Uint32Array(len);
  }

  get length(): number {
    return this.counts.length;
  }

  /**
   * Resize to exactly `len` slots and zero every slot
   */
  ensureLen(len: number): void {
    if (this.counts.length !== len) {
      this.dirX = new Float64Array(len);
      this.dirY = new Float64Array(len);
      this.counts = new Uint32Array(len);
      return;
    }
    this.clear();
  }

  clear(): void {
    this.dirX.fill(0);
    this.dirY.fill(0);
    this.counts.fill(0);
  }

  add(id: NodeId, dir: Vec2): void {
    this.check(id);
    this.dirX[id] += dir.x;
    this.dirY[id] += dir.y;
    this.counts[id] += 1;
  }

  count(id: NodeId): number {
    this.check(id);
    return this.counts[id];
  }

  sum(id: NodeId): Vec2 {
    this.check(id);
    return v2.vec2(this.dirX[id], this.dirY[id]);
  }

  /**
   * Mean contributed direction, ZERO when nothing contributed
   */
  avgDir(id: NodeId): Vec2 {
    const c = this.count(id);
    if (c === 0) {
      return v2.ZERO;
    }
    return v2.vec2(this.dirX[id] / c, this.dirY[id] / c);
  }

  isInfluenced(id: NodeId): boolean {
    return this.count(id) > 0;
  }

  /**
   * Ids with at least one contributor, ascending
   */
  influencedIndices(): NodeId[] {
    const ids: NodeId[] = [];
    for (let i = 0; i < this.counts.length; i++) {
      if (this.counts[i] > 0) {
        ids.push(i);
      }
    }
    return ids;
  }

  /**
   * Add another buffer's contributions slot by slot (reduction step for
   * partitioned accumulation)
   */
  mergeFrom(other: InfluenceBuffer): void {
    if (other.length !== this.length) {
      throw new Error(`Buffer length mismatch: ${this.length} vs ${other.length}`);
    }
    for (let i = 0; i < this.counts.length; i++) {
      this.dirX[i] += other.dirX[i];
      this.dirY[i] += other.dirY[i];
      this.counts[i] += other.counts[i];
    }
  }

  private check(id: NodeId): void {
    if (!Number.isInteger(id) || id < 0 || id >= this.counts.length) {
      throw new Error(`Node id ${id} outside influence buffer of length ${this.counts.length}`);
    }
  }
}
