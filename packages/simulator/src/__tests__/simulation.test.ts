import { describe, it, expect, vi, afterEach } from 'vitest';
import { InvalidConfigError, type SimulationConfigInput } from '@arbor/core';
import { Simulation } from '../simulation.js';

const p = (x: number, y: number) => ({ x, y });

const chainConfig: SimulationConfigInput = {
  influenceRadius: 20,
  killRadius: 1,
  stepLen: 1,
  attractFromKn: 1,
  killFromKn: 1,
  tropism: p(0, 0),
};

function chain(overrides: SimulationConfigInput = {}): Simulation {
  const sim = new Simulation({ ...chainConfig, ...overrides });
  sim.reset([p(0, 0)]);
  sim.addAttractor(p(10, 0));
  return sim;
}

function symmetric(overrides: SimulationConfigInput = {}): Simulation {
  const sim = new Simulation({
    influenceRadius: 5,
    killRadius: 0.5,
    stepLen: 1,
    stallWindow: 5,
    ...overrides,
  });
  sim.reset([p(0, 0)]);
  sim.addAttractor(p(0, 1));
  sim.addAttractor(p(0, -1));
  return sim;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('straight chain', () => {
  it('grows ten nodes along the x-axis and kills the attractor', () => {
    const sim = chain();
    const summaries = Array.from({ length: 10 }, () => sim.runTick());
    const snap = sim.snapshot();

    expect(snap.nodes).toHaveLength(10);
    snap.nodes.forEach((node, i) => {
      expect(node.position).toEqual(p(i, 0));
      expect(node.parent).toBe(i === 0 ? null : i - 1);
    });
    expect(snap.attractors[0]?.alive).toBe(false);

    expect(summaries.slice(0, 9).map(s => s.nodesAdded)).toEqual([
      [1], [2], [3], [4], [5], [6], [7], [8], [9],
    ]);
    expect(summaries[8]).toMatchObject({ tick: 9, attractorsKilled: 1, terminal: 'exhausted' });
    expect(summaries[9]).toEqual({
      tick: 9,
      cycles: 0,
      nodesAdded: [],
      attractorsKilled: 0,
      killsPerCycle: [],
      terminal: 'exhausted',
    });
  });

  it('runs several phase-cycles per tick', () => {
    const sim = chain({ cyclesPerTick: 4 });
    const [t1, t2, t3] = sim.runUntilTerminal(10);

    expect(t1).toMatchObject({ tick: 1, cycles: 4, nodesAdded: [1, 2, 3, 4], killsPerCycle: [0, 0, 0, 0] });
    expect(t2).toMatchObject({ tick: 2, cycles: 4, nodesAdded: [5, 6, 7, 8] });
    expect(t3).toMatchObject({ tick: 3, cycles: 1, nodesAdded: [9], killsPerCycle: [1], terminal: 'exhausted' });
    expect(sim.stats().iterations).toBe(9);
  });

  it('records the owning node until the attractor dies', () => {
    const sim = chain();
    sim.runTick();
    expect(sim.snapshot().attractors[0]).toMatchObject({ owner: 0, alive: true });
    sim.runUntilTerminal(20);
    expect(sim.snapshot().attractors[0]).toMatchObject({ owner: null, alive: false });
  });
});

describe('symmetric cancellation', () => {
  it('never grows and reports a stall', () => {
    const sim = symmetric();
    const summaries = sim.runUntilTerminal(100);

    expect(summaries).toHaveLength(5);
    expect(summaries.every(s => s.nodesAdded.length === 0)).toBe(true);
    expect(summaries[4]?.terminal).toBe('stalled');
    expect(sim.stats()).toMatchObject({ nodeCount: 1, aliveAttractors: 2, terminal: 'stalled' });
  });

  it('stays latched until resumed', () => {
    const sim = symmetric();
    sim.runUntilTerminal(100);

    expect(sim.runTick()).toMatchObject({ cycles: 0, terminal: 'stalled' });

    sim.resume();
    const summary = sim.runTick();
    expect(summary.cycles).toBe(1);
    expect(summary.terminal).toBeUndefined();
    expect(sim.stats().nodeCount).toBe(1);
  });

  it('grows once a new attractor breaks the symmetry', () => {
    const sim = symmetric();
    sim.runUntilTerminal(100);

    sim.addAttractor(p(3, 0));
    const summary = sim.runTick();

    expect(summary.nodesAdded).toEqual([1]);
    expect(summary.terminal).toBeUndefined();
    expect(sim.snapshot().nodes[1]?.position).toEqual(p(1, 0));
  });
});

describe('tropism', () => {
  it('grows along +x and kills the symmetric pair', () => {
    const sim = symmetric({ killRadius: 1.5, killFromKn: 2, tropism: p(1, 0) });
    const summary = sim.runTick();

    expect(summary).toMatchObject({ tick: 1, nodesAdded: [1], attractorsKilled: 2, terminal: 'exhausted' });
    expect(sim.snapshot().nodes[1]?.position).toEqual(p(1, 0));
    expect(sim.stats().aliveAttractors).toBe(0);
  });
});

describe('reset and snapshot', () => {
  it('returns exactly the seeds and spawned attractors', () => {
    const sim = new Simulation();
    sim.reset([p(0, 0), p(5, 5)], { kind: 'circle', center: p(0, 50), radius: 10, count: 25 });
    const snap = sim.snapshot();

    expect(snap.nodes).toEqual([
      { id: 0, position: p(0, 0), radius: 1, parent: null, children: [] },
      { id: 1, position: p(5, 5), radius: 1, parent: null, children: [] },
    ]);
    expect(snap.edges).toEqual([]);
    expect(snap.attractors).toHaveLength(25);
    snap.attractors.forEach((a, i) => {
      expect(a.index).toBe(i);
      expect(a.alive).toBe(true);
      expect(a.owner).toBeNull();
      expect(Math.hypot(a.position.x, a.position.y - 50)).toBeLessThanOrEqual(10 + 1e-9);
    });
    expect(snap.stats).toEqual({
      ticks: 0,
      iterations: 0,
      nodeCount: 2,
      attractorCount: 25,
      aliveAttractors: 25,
      cyclesWithoutKill: 0,
      lastAdded: [],
      terminal: null,
    });
  });

  it('accepts several spawn shapes', () => {
    const sim = new Simulation();
    sim.reset(
      [p(0, 0)],
      { kind: 'rect', center: p(0, 0), halfExtents: p(1, 1), count: 3 },
      { kind: 'annulus', center: p(0, 0), innerRadius: 1, outerRadius: 2, count: 4 }
    );
    expect(sim.stats().attractorCount).toBe(7);
  });

  it('reproduces the same cloud on every reset', () => {
    const shape = { kind: 'oval' as const, center: p(0, 0), radii: p(10, 5), count: 8 };
    const sim = new Simulation({ seed: 42 });
    sim.reset([p(0, 0)], shape);
    const first = sim.snapshot().attractors;
    sim.reset([p(0, 0)], shape);
    expect(sim.snapshot().attractors).toEqual(first);

    const other = new Simulation({ seed: 42 });
    other.reset([p(0, 0)], shape);
    expect(other.snapshot().attractors).toEqual(first);
  });

  it('uses an injected random source', () => {
    const sim = new Simulation({}, { rng: () => 0 });
    sim.reset([], { kind: 'rect', center: p(0, 0), halfExtents: p(2, 3), count: 2 });
    expect(sim.snapshot().attractors.map(a => a.position)).toEqual([p(-2, -3), p(-2, -3)]);
  });

  it('rejects an invalid spawn shape without touching state', () => {
    const sim = chain();
    expect(() =>
      sim.reset([p(0, 0)], { kind: 'circle', center: p(0, 0), radius: -1, count: 1 })
    ).toThrow('Invalid spawn shape');
    expect(sim.stats().attractorCount).toBe(1);
  });

  it('returns copies', () => {
    const sim = chain();
    sim.runTick();
    const snap = sim.snapshot();
    snap.nodes[0]?.children.push(99);
    snap.attractors.pop();
    expect(sim.snapshot().nodes[0]?.children).toEqual([1]);
    expect(sim.snapshot().attractors).toHaveLength(1);
  });

  it('lists edges', () => {
    const sim = chain();
    sim.runTick();
    sim.runTick();
    expect(sim.snapshot().edges).toEqual([[0, 1], [1, 2]]);
  });
});

describe('clear', () => {
  it('empties the simulation', () => {
    const sim = chain();
    sim.runTick();
    sim.clear();

    const snap = sim.snapshot();
    expect(snap.nodes).toEqual([]);
    expect(snap.attractors).toEqual([]);
    expect(sim.runTick()).toEqual({
      tick: 0,
      cycles: 0,
      nodesAdded: [],
      attractorsKilled: 0,
      killsPerCycle: [],
      terminal: 'exhausted',
    });
  });
});

describe('configure', () => {
  it('keeps the previous config when validation fails', () => {
    const sim = new Simulation({ stepLen: 3 });
    const result = sim.configure({ stepLen: 0 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidConfigError);
      expect(result.error.issues[0]?.path).toBe('stepLen');
    }
    expect(sim.config.stepLen).toBe(3);
  });

  it('replaces the whole config', () => {
    const sim = new Simulation({ influenceRadius: 20 });
    const result = sim.configure({ stepLen: 3 });

    expect(result.ok).toBe(true);
    expect(sim.config.stepLen).toBe(3);
    expect(sim.config.influenceRadius).toBe(40);
  });

  it('throws from the constructor on an invalid config', () => {
    expect(() => new Simulation({ killRadius: -1 })).toThrow(InvalidConfigError);
  });
});

describe('termination', () => {
  it('observes a stop request between ticks', () => {
    const sim = chain();
    sim.runTick();
    sim.requestStop();

    expect(sim.runTick()).toMatchObject({ tick: 1, cycles: 0, terminal: 'stopped' });
    expect(sim.runTick().terminal).toBe('stopped');
    expect(sim.stats().nodeCount).toBe(2);

    sim.resume();
    const summary = sim.runTick();
    expect(summary).toMatchObject({ tick: 2, nodesAdded: [2] });
    expect(summary.terminal).toBeUndefined();
  });

  it('reports a stop through the termination policy and traces it', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const sim = chain({ trace: true });
    sim.runTick();
    sim.requestStop();

    expect(sim.runTick()).toEqual({
      tick: 1,
      cycles: 0,
      nodesAdded: [],
      attractorsKilled: 0,
      killsPerCycle: [],
      terminal: 'stopped',
    });
    expect(sim.trace).toHaveLength(2);
    expect(sim.trace[1]).toMatchObject({ tick: 1, cycles: 0, added: 0, killed: 0 });
    expect(info).toHaveBeenCalledWith('[Simulation] Terminal condition after tick 1: stopped');
  });

  it('stops at the phase-cycle budget', () => {
    const sim = new Simulation({
      influenceRadius: 200,
      killRadius: 1,
      stepLen: 1,
      cyclesPerTick: 3,
      maxIterations: 4,
    });
    sim.reset([p(0, 0)]);
    sim.addAttractor(p(100, 0));

    const first = sim.runTick();
    const second = sim.runTick();

    expect(first).toMatchObject({ cycles: 3, nodesAdded: [1, 2, 3] });
    expect(first.terminal).toBeUndefined();
    expect(second).toMatchObject({ cycles: 1, nodesAdded: [4], terminal: 'max-iterations' });
    expect(sim.stats()).toMatchObject({ iterations: 4, nodeCount: 5 });
  });

  it('keeps exhaustion latched after a new root but not after new attractors', () => {
    const sim = chain();
    sim.runUntilTerminal(20);

    expect(sim.spawnRoot(p(50, 50))).toBe(10);
    expect(sim.stats().terminal).toBe('exhausted');

    sim.addAttractor(p(50, 52));
    expect(sim.stats().terminal).toBeNull();

    const summary = sim.runTick();
    expect(summary).toMatchObject({ nodesAdded: [11], attractorsKilled: 1, terminal: 'exhausted' });
    expect(sim.snapshot().nodes[11]).toMatchObject({ parent: 10, position: p(50, 51) });
  });
});

describe('position validation', () => {
  it('rejects a non-finite attractor before it can drive growth', () => {
    const sim = new Simulation({ tropism: p(1, 0) });
    sim.reset([p(0, 0)]);

    expect(() => sim.addAttractor(p(Number.NaN, 0))).toThrow('Invalid position');
    expect(sim.stats().attractorCount).toBe(0);

    sim.runUntilTerminal(5);
    expect(sim.stats().nodeCount).toBe(1);
  });

  it('rejects non-finite roots, seeds and moves', () => {
    const sim = chain();

    expect(() => sim.spawnRoot(p(Number.POSITIVE_INFINITY, 0))).toThrow('Invalid position');
    expect(() => sim.moveAttractor(0, p(0, Number.NaN))).toThrow('Invalid position');
    expect(() => sim.reset([p(Number.NaN, 1)])).toThrow('Invalid position');

    expect(sim.stats()).toMatchObject({ nodeCount: 1, attractorCount: 1 });
    expect(sim.snapshot().attractors[0]?.position).toEqual(p(10, 0));
  });
});

describe('spawning between ticks', () => {
  it('spawns a tool shape sized by the config', () => {
    const sim = new Simulation({ spawnCount: 10, spawnRectHalfExtents: p(5, 5) });
    sim.reset([p(0, 0)]);

    expect(sim.spawnAttractorsAt('rect', p(20, 20))).toEqual({ start: 0, end: 10 });
    for (const a of sim.snapshot().attractors) {
      expect(a.position.x).toBeGreaterThanOrEqual(15);
      expect(a.position.x).toBeLessThan(25);
      expect(a.position.y).toBeGreaterThanOrEqual(15);
      expect(a.position.y).toBeLessThan(25);
    }
  });

  it('moves an attractor and grows toward its new position', () => {
    const sim = chain();
    sim.moveAttractor(0, p(0, 5));
    expect(sim.snapshot().attractors[0]?.position).toEqual(p(0, 5));

    sim.runTick();
    expect(sim.snapshot().nodes[1]?.position).toEqual(p(0, 1));
  });

  it('keeps independent simulations apart', () => {
    const a = chain();
    const b = chain();
    a.runUntilTerminal(20);
    expect(a.stats().nodeCount).toBe(10);
    expect(b.stats().nodeCount).toBe(1);
  });
});

describe('invariants on a random cloud', () => {
  it('keeps ids monotonic and dead attractors dead', () => {
    const sim = new Simulation({ seed: 7 });
    sim.reset([p(0, 0)], { kind: 'rect', center: p(0, 60), halfExtents: p(40, 40), count: 200 });

    const dead = new Set<number>();
    let previousCount = 1;

    for (let t = 0; t < 40; t++) {
      const summary = sim.runTick();
      const snap = sim.snapshot();

      expect(summary.nodesAdded).toEqual(
        Array.from({ length: snap.nodes.length - previousCount }, (_, i) => previousCount + i)
      );
      previousCount = snap.nodes.length;

      snap.nodes.forEach((node, i) => {
        expect(node.id).toBe(i);
        if (node.parent !== null) {
          expect(node.parent).toBeLessThan(node.id);
        }
      });

      for (const index of dead) {
        expect(snap.attractors[index]?.alive).toBe(false);
      }
      snap.attractors.forEach(a => {
        if (!a.alive) {
          dead.add(a.index);
        }
      });

      if (summary.terminal !== undefined) {
        break;
      }
    }

    expect(previousCount).toBeGreaterThan(1);
  });
});

describe('tick listeners', () => {
  it('notifies until unsubscribed', () => {
    const sim = chain();
    const seen: number[] = [];
    const off = sim.onTick(s => seen.push(s.tick));

    sim.runTick();
    sim.runTick();
    off();
    sim.runTick();

    expect(seen).toEqual([1, 2]);
  });

  it('logs listener failures without interrupting the tick', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const sim = chain();
    sim.onTick(() => {
      throw new Error('listener broke');
    });

    expect(sim.runTick().nodesAdded).toEqual([1]);
    expect(spy).toHaveBeenCalledWith('[Simulation] Tick listener failed:', expect.any(Error));
  });
});

describe('tracing', () => {
  it('records one entry per tick and logs the terminal condition', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const sim = chain({ trace: true });

    sim.runUntilTerminal(20);

    expect(sim.trace).toHaveLength(9);
    expect(sim.trace[0]).toMatchObject({ tick: 1, cycles: 1, added: 1, killed: 0 });
    expect(sim.trace[8]).toMatchObject({ tick: 9, cycles: 1, added: 1, killed: 1 });
    expect(info).toHaveBeenCalledWith('[Simulation] Terminal condition after tick 9: exhausted');
  });

  it('stays silent when tracing is off', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const sim = chain();

    sim.runUntilTerminal(20);

    expect(sim.trace).toEqual([]);
    expect(info).not.toHaveBeenCalled();
  });
});
