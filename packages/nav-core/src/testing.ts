/**
 * @statenav/core/testing
 *
 * Fakes and builders for tests of the engine and of code built on it.
 * Import from this sub-path, never from the main index.
 *
 * All helpers that record calls use vitest's `vi.fn()`.
 */

import { vi } from 'vitest';
import type {
  EvidenceMatch,
  ILogger,
  RandomSource,
  StateFinder,
  StateRecord,
  StateTransition,
  TransitionCollection,
} from '@statenav/contracts';

// ─── Logger mock ──────────────────────────────────────────────────────────────

export function makeMockLogger(): ILogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

// ─── State record ─────────────────────────────────────────────────────────────

export function makeState(id: number, name: string, overrides: Partial<StateRecord> = {}): StateRecord {
  return {
    id,
    name,
    probabilityExists: 0,
    baseProbabilityExists: 100,
    timesVisited: 0,
    hiddenStateIds: [],
    ...overrides,
  };
}

// ─── Transitions ──────────────────────────────────────────────────────────────

export interface TransitionSpec {
  activate?: number[];
  activateNames?: string[];
  exit?: number[];
  execute?: () => boolean | Promise<boolean>;
  pathCost?: number;
}

export function makeTransition(spec: TransitionSpec = {}): StateTransition {
  return {
    activate: new Set(spec.activate ?? []),
    activateNames: spec.activateNames ? new Set(spec.activateNames) : undefined,
    exit: new Set(spec.exit ?? []),
    execute: spec.execute ?? (() => true),
    pathCost: spec.pathCost ?? 1,
    timesSuccessful: 0,
    staysVisible: 'none',
  };
}

export function makeCollection(
  stateName: string,
  transitions: StateTransition[],
  stateId?: number,
): TransitionCollection {
  return {
    stateId,
    stateName,
    transitions,
    staysVisibleAfterTransition: false,
  };
}

// ─── Randomness ───────────────────────────────────────────────────────────────

/**
 * Returns the given draws in order, repeating the last one when exhausted.
 * Each draw is clamped into the requested range.
 */
export function sequenceRandom(values: number[]): RandomSource & { calls: Array<[number, number]> } {
  let index = 0;
  const calls: Array<[number, number]> = [];
  return {
    calls,
    nextInt(min: number, max: number): number {
      calls.push([min, max]);
      const value = values[Math.min(index, values.length - 1)] ?? min;
      index++;
      return Math.min(max, Math.max(min, value));
    },
  };
}

// ─── Pattern-matching pipeline ────────────────────────────────────────────────

/**
 * StateFinder that "sees" a configurable set of states. A visible state
 * yields one match owned by itself.
 */
export class FakeStateFinder implements StateFinder {
  readonly visible = new Set<number>();
  readonly failing = new Set<number>();
  readonly find = vi.fn(async (state: StateRecord): Promise<EvidenceMatch[]> => {
    if (this.failing.has(state.id)) {
      throw new Error(`capture failed for ${state.name}`);
    }
    if (!this.visible.has(state.id)) {
      return [];
    }
    return [{ ownerStateId: state.id, objectName: `${state.name}-image`, score: 0.95 }];
  });

  constructor(visible: Iterable<number> = []) {
    for (const id of visible) {
      this.visible.add(id);
    }
  }

  show(...ids: number[]): this {
    for (const id of ids) {
      this.visible.add(id);
    }
    return this;
  }

  hide(...ids: number[]): this {
    for (const id of ids) {
      this.visible.delete(id);
    }
    return this;
  }
}
