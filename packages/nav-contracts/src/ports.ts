/**
 * Ports the navigation engine consumes.
 *
 * Implementations live outside the engine (or in @statenav/core as
 * in-memory defaults). Every component takes them through its constructor.
 */

import type { StateRecord } from './state-types.js';
import type { TransitionCollection } from './transition-types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export interface StateRegistry {
  recordById(id: number): StateRecord | undefined;
  recordByName(name: string): StateRecord | undefined;
  idByName(name: string): number | undefined;
  allKnownIds(): Set<number>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Transition store
// ─────────────────────────────────────────────────────────────────────────────

export interface TransitionStore {
  transitionsForState(id: number): TransitionCollection | undefined;
  addTransitionCollection(collection: TransitionCollection): void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Evidence
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One match produced by the pattern-matching pipeline. Only the owner state
 * matters to the engine; the rest is carried through untouched.
 */
export interface EvidenceMatch {
  ownerStateId?: number;
  objectName?: string;
  score?: number;
}

/**
 * The pattern-matching pipeline: searches the screen for a state's objects.
 */
export interface StateFinder {
  find(state: StateRecord): Promise<EvidenceMatch[]>;
}

/**
 * "Is this state showing?" Before resolving `true` the implementation must
 * have inserted the state into the active-state memory its caller reads;
 * the boolean alone does not activate anything.
 */
export interface StateProbe {
  probe(stateId: number): Promise<boolean>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Randomness
// ─────────────────────────────────────────────────────────────────────────────

export interface RandomSource {
  /** Uniform integer in the closed range [min, max] */
  nextInt(min: number, max: number): number;
}
