/**
 * Simulation - tick driver and lifecycle owner
 *
 * Owns one Tree and one AttractorSet. A tick runs up to `cyclesPerTick`
 * phase-cycles (ATTRACTION -> GROWTH -> KILL), then evaluates the
 * termination policy. Once a condition fires it is latched: later ticks
 * run nothing and report it again until resume(), reset() or clear().
 *
 * Everything is synchronous. A stop request is only observed between
 * ticks.
 */

import type {
  InvalidConfigError,
  Rng,
  SimulationConfig,
  SimulationConfigInput,
  SpawnShape,
  SpawnTool,
  TraceContext,
  TraceEntry,
  Vec2,
  NodeId,
} from '@arbor/core';
import {
  addTrace,
  createRng,
  createTraceContext,
  isOk,
  unwrap,
  v2,
  validateConfig,
  type Result,
} from '@arbor/core';
import {
  AttractorSet,
  InfluenceBuffer,
  Tree,
  parsePosition,
  parseShape,
  runPhaseCycle,
  sampleShape,
  shapeForTool,
} from '@arbor/growth';
import { evaluateTermination, isReleasedBySpawn } from './termination';
import type {
  SimulationSnapshot,
  SimulationStats,
  TerminalCondition,
  TickListener,
  TickSummary,
} from './types';

export interface SimulationOptions {
  /** Random source for spawning; defaults to a generator seeded from config.seed */
  rng?: Rng;
}

export class Simulation {
  private active: SimulationConfig;
  private rng: Rng;
  private readonly customRng?: Rng;

  private tree = new Tree();
  private attractors = new AttractorSet();
  private buffer = new InfluenceBuffer();

  private ticks = 0;
  private iterations = 0;
  private cyclesWithoutKill = 0;
  private lastAdded: NodeId[] = [];
  private latched: TerminalCondition | null = null;
  private stopRequested = false;

  private context: TraceContext;
  private listeners: Set<TickListener> = new Set();

  constructor(config: SimulationConfigInput = {}, options: SimulationOptions = {}) {
    this.active = unwrap(validateConfig(config));
    this.customRng = options.rng;
    this.rng = options.rng ?? createRng(this.active.seed);
    this.context = createTraceContext({ enabled: this.active.trace });
  }

  get config(): Readonly<SimulationConfig> {
    return this.active;
  }

  get trace(): readonly TraceEntry[] {
    return this.context.trace;
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  /**
   * Validate and replace the active config. On failure the previous
   * config stays active.
   */
  configure(input: SimulationConfigInput): Result<SimulationConfig, InvalidConfigError> {
    const result = validateConfig(input);
    if (isOk(result)) {
      this.active = result.value;
      this.context = { ...this.context, enabled: result.value.trace };
    }
    return result;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Discard all state and rebuild from seed roots and spawn shapes.
   * Inputs are validated first; an invalid one throws and leaves the
   * current state untouched.
   */
  reset(seeds: readonly Vec2[], ...spawn: SpawnShape[]): void {
    const roots = seeds.map(s => parsePosition(s));
    const shapes = spawn.map(s => parseShape(s));

    this.clear();
    this.rng = this.customRng ?? createRng(this.active.seed);

    for (const root of roots) {
      this.tree.addRoot(root, this.active.rootRadius);
    }
    for (const shape of shapes) {
      this.attractors.addMany(sampleShape(shape, this.rng));
    }
  }

  /**
   * Empty tree and attractors, zero the counters
   */
  clear(): void {
    this.tree.clear();
    this.attractors.clear();
    this.buffer = new InfluenceBuffer();
    this.ticks = 0;
    this.iterations = 0;
    this.cyclesWithoutKill = 0;
    this.lastAdded = [];
    this.latched = null;
    this.stopRequested = false;
    this.context = createTraceContext({ enabled: this.active.trace });
  }

  spawnRoot(position: Vec2): NodeId {
    const id = this.tree.addRoot(parsePosition(position), this.active.rootRadius);
    this.release('root');
    return id;
  }

  /**
   * Append a sampled attractor cloud; returns the new index range [start, end)
   */
  spawnAttractors(shape: SpawnShape): { start: number; end: number } {
    const range = this.attractors.addMany(sampleShape(parseShape(shape), this.rng));
    if (range.end > range.start) {
      this.release('attractors');
    }
    return range;
  }

  /**
   * Spawn with a tool shape sized by the active config
   */
  spawnAttractorsAt(tool: SpawnTool, center: Vec2): { start: number; end: number } {
    return this.spawnAttractors(shapeForTool(tool, center, this.active));
  }

  addAttractor(position: Vec2): number {
    const index = this.attractors.add(parsePosition(position));
    this.release('attractors');
    return index;
  }

  moveAttractor(index: number, position: Vec2): void {
    this.attractors.move(index, parsePosition(position));
  }

  // ===========================================================================
  // Driver
  // ===========================================================================

  requestStop(): void {
    this.stopRequested = true;
  }

  /**
   * Clear a latched condition and any pending stop request
   */
  resume(): void {
    this.latched = null;
    this.stopRequested = false;
    this.cyclesWithoutKill = 0;
  }

  onTick(listener: TickListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  runTick(): TickSummary {
    if (this.latched !== null) {
      return this.notify(this.idleSummary(this.latched));
    }

    const start = Date.now();
    // A pending stop request runs no cycles; the policy reports it
    const budget = this.stopRequested
      ? 0
      : Math.min(this.active.cyclesPerTick, Math.max(0, this.active.maxIterations - this.iterations));
    const nodesAdded: NodeId[] = [];
    const killsPerCycle: number[] = [];

    for (let c = 0; c < budget && this.attractors.anyAlive(); c++) {
      const report = runPhaseCycle(this.tree, this.attractors, this.active, this.buffer);
      this.iterations++;
      nodesAdded.push(...report.growth.added);

      const kills = report.kill.killed.length;
      killsPerCycle.push(kills);
      this.cyclesWithoutKill = kills > 0 ? 0 : this.cyclesWithoutKill + 1;
    }

    const cycles = killsPerCycle.length;
    if (cycles > 0) {
      this.ticks++;
      this.lastAdded = [...nodesAdded];
    }

    const terminal = evaluateTermination(
      {
        stopRequested: this.stopRequested,
        aliveAttractors: this.attractors.aliveCount(),
        iterations: this.iterations,
        cyclesWithoutKill: this.cyclesWithoutKill,
      },
      this.active
    );

    const attractorsKilled = killsPerCycle.reduce((sum, k) => sum + k, 0);
    this.context = addTrace(this.context, {
      tick: this.ticks,
      cycles,
      added: nodesAdded.length,
      killed: attractorsKilled,
      durationMs: Date.now() - start,
    });

    const summary: TickSummary = {
      tick: this.ticks,
      cycles,
      nodesAdded,
      attractorsKilled,
      killsPerCycle,
    };
    if (terminal !== null) {
      this.latch(terminal);
      summary.terminal = terminal;
    }
    return this.notify(summary);
  }

  /**
   * Run ticks until a terminal condition fires or `tickLimit` ticks ran
   */
  runUntilTerminal(tickLimit: number): TickSummary[] {
    const summaries: TickSummary[] = [];
    for (let i = 0; i < tickLimit; i++) {
      const summary = this.runTick();
      summaries.push(summary);
      if (summary.terminal !== undefined) {
        break;
      }
    }
    return summaries;
  }

  // ===========================================================================
  // Read-only views
  // ===========================================================================

  stats(): SimulationStats {
    return {
      ticks: this.ticks,
      iterations: this.iterations,
      nodeCount: this.tree.size,
      attractorCount: this.attractors.size,
      aliveAttractors: this.attractors.aliveCount(),
      cyclesWithoutKill: this.cyclesWithoutKill,
      lastAdded: [...this.lastAdded],
      terminal: this.latched,
    };
  }

  snapshot(): SimulationSnapshot {
    return {
      nodes: this.tree.all().map(node => ({
        id: node.id,
        position: v2.clone(node.position),
        radius: node.radius,
        parent: node.parent,
        children: [...node.children],
      })),
      edges: [...this.tree.edges()].map(([parent, child]): [NodeId, NodeId] => [parent, child]),
      attractors: [...this.attractors].map((a, index) => ({
        index,
        position: v2.clone(a.position),
        alive: a.alive,
        owner: a.owner,
      })),
      stats: this.stats(),
    };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private idleSummary(terminal: TerminalCondition): TickSummary {
    return {
      tick: this.ticks,
      cycles: 0,
      nodesAdded: [],
      attractorsKilled: 0,
      killsPerCycle: [],
      terminal,
    };
  }

  private latch(condition: TerminalCondition): void {
    this.latched = condition;
    if (this.active.trace) {
      console.info(`[Simulation] Terminal condition after tick ${this.ticks}: ${condition}`);
    }
  }

  private release(spawned: 'root' | 'attractors'): void {
    if (this.latched !== null && isReleasedBySpawn(spawned, this.latched)) {
      this.latched = null;
      this.cyclesWithoutKill = 0;
    }
  }

  private notify(summary: TickSummary): TickSummary {
    for (const listener of this.listeners) {
      try {
        listener(summary);
      } catch (error) {
        console.error('[Simulation] Tick listener failed:', error);
      }
    }
    return summary;
  }
}
