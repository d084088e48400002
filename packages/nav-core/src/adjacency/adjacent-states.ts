/**
 * AdjacentStates - which states are one transition away.
 *
 * Read-only over active-state memory, the transition store and the registry.
 * The PREVIOUS marker is replaced by the hidden states recorded on the
 * source state, so "go back" transitions need no edge per predecessor.
 */

import type { StateRegistry, TransitionStore } from '@statenav/contracts';
import { SpecialStateType } from '@statenav/contracts';
import type { ActiveStateMemory } from '../memory/index.js';

export class AdjacentStates {
  constructor(
    private readonly registry: StateRegistry,
    private readonly transitions: TransitionStore,
    private readonly memory: ActiveStateMemory,
  ) {}

  /**
   * States reachable in a single hop from one source state, or from any of
   * several source states.
   */
  adjacentTo(sourceStateId: number): Set<number>;
  adjacentTo(sourceStateIds: ReadonlySet<number>): Set<number>;
  adjacentTo(source: number | ReadonlySet<number>): Set<number> {
    if (typeof source === 'number') {
      return this.adjacentToOne(source);
    }

    const adjacent = new Set<number>();
    if (source.size === 0) {
      return adjacent;
    }
    for (const sourceId of source) {
      for (const id of this.adjacentToOne(sourceId)) {
        adjacent.add(id);
      }
    }
    return adjacent;
  }

  /** States reachable from whatever is active right now */
  adjacentToActive(): Set<number> {
    return this.adjacentTo(this.memory.snapshot());
  }

  private adjacentToOne(sourceStateId: number): Set<number> {
    const adjacent = new Set<number>();
    const collection = this.transitions.transitionsForState(sourceStateId);
    if (!collection) {
      return adjacent;
    }

    for (const transition of collection.transitions) {
      // Empty activation sets are misconfiguration, not self-loops.
      if (transition.activate.size === 0) {
        continue;
      }
      for (const id of transition.activate) {
        adjacent.add(id);
      }
    }

    if (adjacent.delete(SpecialStateType.PREVIOUS)) {
      const source = this.registry.recordById(sourceStateId);
      for (const hiddenId of source?.hiddenStateIds ?? []) {
        adjacent.add(hiddenId);
      }
    }

    return adjacent;
  }
}
