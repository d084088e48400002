/**
 * In-process transition store, one collection per source state.
 */

import type {
  StateTransition,
  TransitionCollection,
  TransitionStore,
} from '@statenav/contracts';

export class InMemoryTransitionStore implements TransitionStore {
  private collections = new Map<number, TransitionCollection>();
  private unlinked: TransitionCollection[] = [];
  private added = new WeakSet<TransitionCollection>();

  /**
   * Add a collection. A second collection for the same source merges its
   * transitions into a store-owned copy; adding the same object again is a
   * no-op. Collections without a source id are held until `relink()` runs
   * after linking.
   */
  addTransitionCollection(collection: TransitionCollection): void {
    if (this.added.has(collection)) {
      return;
    }
    this.added.add(collection);

    if (collection.stateId === undefined) {
      this.unlinked.push(collection);
      return;
    }
    this.index(collection.stateId, collection);
  }

  /**
   * Move collections that gained a source id since they were added.
   */
  relink(): void {
    const pending = this.unlinked;
    this.unlinked = [];
    for (const collection of pending) {
      if (collection.stateId === undefined) {
        this.unlinked.push(collection);
      } else {
        this.index(collection.stateId, collection);
      }
    }
  }

  transitionsForState(id: number): TransitionCollection | undefined {
    return this.collections.get(id);
  }

  allStateIds(): Set<number> {
    return new Set(this.collections.keys());
  }

  allTransitions(): StateTransition[] {
    return Array.from(this.collections.values()).flatMap((c) => c.transitions);
  }

  /** Collections added so far, linked or not */
  allCollections(): TransitionCollection[] {
    return [...this.collections.values(), ...this.unlinked];
  }

  unlinkedCollections(): TransitionCollection[] {
    return [...this.unlinked];
  }

  clear(): void {
    this.collections.clear();
    this.unlinked = [];
    this.added = new WeakSet();
  }

  private index(stateId: number, collection: TransitionCollection): void {
    const existing = this.collections.get(stateId);
    if (!existing) {
      this.collections.set(stateId, {
        ...collection,
        transitions: [...collection.transitions],
      });
      return;
    }

    existing.transitions.push(...collection.transitions);
    if (!existing.transitionFinish && collection.transitionFinish) {
      existing.transitionFinish = collection.transitionFinish;
    }
  }
}
