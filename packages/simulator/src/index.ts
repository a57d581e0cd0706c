/**
 * @arbor/simulator - Tick driver for the space-colonization engine
 *
 * The Simulation class is the surface a rendering or control layer
 * talks to: configure, reset/clear, spawn, runTick, snapshot.
 */

export * from './types';
export * from './termination';
export * from './simulation';
