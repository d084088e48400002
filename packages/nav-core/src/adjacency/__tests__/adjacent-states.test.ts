import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SpecialStateType } from '@statenav/contracts';
import { AdjacentStates } from '../adjacent-states.js';
import { ActiveStateMemory } from '../../memory/index.js';
import { InMemoryStateRegistry, InMemoryTransitionStore } from '../../registry/index.js';
import { makeCollection, makeTransition } from '../../testing.js';

describe('AdjacentStates', () => {
  let registry: InMemoryStateRegistry;
  let store: InMemoryTransitionStore;
  let memory: ActiveStateMemory;
  let adjacent: AdjacentStates;

  beforeEach(() => {
    registry = new InMemoryStateRegistry();
    store = new InMemoryTransitionStore();
    memory = new ActiveStateMemory(registry);
    adjacent = new AdjacentStates(registry, store, memory);
  });

  describe('adjacentTo (single source)', () => {
    it('unions activation sets of every transition', () => {
      registry.register({ id: 1, name: 'Home' });
      store.addTransitionCollection(
        makeCollection('Home', [makeTransition({ activate: [2, 3] }), makeTransition({ activate: [4] })], 1),
      );
      expect(adjacent.adjacentTo(1)).toEqual(new Set([2, 3, 4]));
    });

    it('returns an empty set when the state has no transitions', () => {
      expect(adjacent.adjacentTo(7).size).toBe(0);
    });

    it('replaces PREVIOUS with the hidden states of the source', () => {
      registry.register({ id: 1, name: 'Dialog', hiddenStateIds: [10, 11] });
      store.addTransitionCollection(
        makeCollection('Dialog', [makeTransition({ activate: [SpecialStateType.PREVIOUS, 2] })], 1),
      );
      const result = adjacent.adjacentTo(1);
      expect(result).toEqual(new Set([2, 10, 11]));
      expect(result.has(SpecialStateType.PREVIOUS)).toBe(false);
    });

    it('drops PREVIOUS when the source has no record', () => {
      store.addTransitionCollection(
        makeCollection('Ghost', [makeTransition({ activate: [SpecialStateType.PREVIOUS, 5] })], 9),
      );
      expect(adjacent.adjacentTo(9)).toEqual(new Set([5]));
    });

    it('ignores transitions with an empty activation set', () => {
      registry.register({ id: 1, name: 'Home' });
      store.addTransitionCollection(
        makeCollection('Home', [makeTransition({ activate: [] }), makeTransition({ activate: [3] })], 1),
      );
      expect(adjacent.adjacentTo(1)).toEqual(new Set([3]));
    });

    it('does not modify the transition graph', () => {
      registry.register({ id: 1, name: 'Dialog', hiddenStateIds: [10] });
      const transition = makeTransition({ activate: [SpecialStateType.PREVIOUS] });
      store.addTransitionCollection(makeCollection('Dialog', [transition], 1));
      adjacent.adjacentTo(1);
      expect(transition.activate).toEqual(new Set([SpecialStateType.PREVIOUS]));
    });
  });

  describe('adjacentTo (set of sources)', () => {
    beforeEach(() => {
      registry.register({ id: 1, name: 'A' });
      registry.register({ id: 2, name: 'B', hiddenStateIds: [20] });
      store.addTransitionCollection(makeCollection('A', [makeTransition({ activate: [3] })], 1));
      store.addTransitionCollection(
        makeCollection('B', [makeTransition({ activate: [4, SpecialStateType.PREVIOUS] })], 2),
      );
    });

    it('unions the per-source results', () => {
      expect(adjacent.adjacentTo(new Set([1, 2]))).toEqual(new Set([3, 4, 20]));
    });

    it('short-circuits on an empty set without touching the store', () => {
      const spy = vi.spyOn(store, 'transitionsForState');
      expect(adjacent.adjacentTo(new Set<number>()).size).toBe(0);
      expect(spy).not.toHaveBeenCalled();
    });

    it('reads the active states for adjacentToActive', () => {
      memory.add(2);
      expect(adjacent.adjacentToActive()).toEqual(new Set([4, 20]));
    });

    it('never writes to active-state memory', () => {
      memory.add(1);
      adjacent.adjacentToActive();
      expect([...memory.snapshot()]).toEqual([1]);
    });
  });
});
