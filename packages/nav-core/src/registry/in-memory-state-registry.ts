/**
 * In-process state registry.
 *
 * Issues ids from 1 upward to records registered without one, so every
 * ordinary id stays clear of the negative special-state range.
 */

import type { StateRecord, StateRecordInput, StateRegistry } from '@statenav/contracts';

export class InMemoryStateRegistry implements StateRegistry {
  private byId = new Map<number, StateRecord>();
  private idsByName = new Map<string, number>();
  private nextId = 1;

  /**
   * Register a state and return the stored record.
   *
   * Registering a name that already exists replaces the earlier record.
   * An id held by another name is rejected.
   */
  register(input: StateRecordInput): StateRecord {
    const existingId = this.idsByName.get(input.name);
    const id = input.id ?? existingId ?? this.issueId();

    if (!Number.isInteger(id) || id <= 0) {
      throw new RangeError(`State id must be a positive integer, got ${id} for "${input.name}"`);
    }
    const holder = this.byId.get(id);
    if (holder && holder.name !== input.name) {
      throw new RangeError(`State id ${id} is already registered to "${holder.name}"`);
    }

    const baseProbability = input.baseProbabilityExists ?? 100;
    const record: StateRecord = {
      id,
      name: input.name,
      baseProbabilityExists: baseProbability,
      probabilityExists: input.probabilityExists ?? baseProbability,
      timesVisited: input.timesVisited ?? 0,
      hiddenStateIds: [...(input.hiddenStateIds ?? [])],
    };

    if (existingId !== undefined && existingId !== id) {
      this.byId.delete(existingId);
    }
    this.byId.set(id, record);
    this.idsByName.set(record.name, id);
    this.nextId = Math.max(this.nextId, id + 1);
    return record;
  }

  recordById(id: number): StateRecord | undefined {
    return this.byId.get(id);
  }

  recordByName(name: string): StateRecord | undefined {
    const id = this.idsByName.get(name);
    return id === undefined ? undefined : this.byId.get(id);
  }

  idByName(name: string): number | undefined {
    return this.idsByName.get(name);
  }

  allKnownIds(): Set<number> {
    return new Set(this.byId.keys());
  }

  all(): StateRecord[] {
    return Array.from(this.byId.values());
  }

  count(): number {
    return this.byId.size;
  }

  private issueId(): number {
    while (this.byId.has(this.nextId)) {
      this.nextId++;
    }
    return this.nextId;
  }
}
