/**
 * ActiveStateMemory - the set of states currently believed to be showing.
 *
 * Single source of truth for the rest of the engine. Every mutation goes
 * through this class; readers get copies. Mutations are synchronous, so
 * interleaved async callers (parallel probes) cannot lose updates.
 */

import type {
  EvidenceMatch,
  ILogger,
  StateRecord,
  StateRegistry,
} from '@statenav/contracts';
import { SpecialStateType } from '@statenav/contracts';
import { noopLogger } from '../logging/index.js';

/** Belief assigned to a state the moment it becomes active */
export const ACTIVE_PROBABILITY = 100;

export interface ActiveStateMemoryOptions {
  logger?: ILogger;
}

export interface AddStateOptions {
  /** Log the insert on its own line at info level */
  newLine?: boolean;
}

export class ActiveStateMemory {
  private readonly active = new Set<number>();
  private readonly logger: ILogger;

  constructor(
    private readonly registry: StateRegistry,
    options: ActiveStateMemoryOptions = {},
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  // ── Mutation ──────────────────────────────────────────────────────────────

  /**
   * Mark a state active. Returns true when the state was not active before.
   *
   * Ids without a registry record are still recorded; only the bookkeeping
   * on the record is skipped.
   */
  add(stateId: number, options: AddStateOptions = {}): boolean {
    if (stateId === SpecialStateType.NULL || !Number.isInteger(stateId)) {
      this.logger.debug('Rejected active state insert', { stateId });
      return false;
    }
    if (this.active.has(stateId)) {
      return false;
    }

    this.active.add(stateId);

    const record = this.registry.recordById(stateId);
    if (record) {
      record.probabilityExists = ACTIVE_PROBABILITY;
      record.timesVisited += 1;
    }

    if (options.newLine) {
      this.logger.info(`Active state added: ${record?.name ?? stateId}`, { stateId });
    }
    return true;
  }

  /** No-op when the state is not active */
  remove(stateId: number): boolean {
    if (!this.active.delete(stateId)) {
      return false;
    }
    const record = this.registry.recordById(stateId);
    if (record) {
      record.probabilityExists = 0;
    }
    return true;
  }

  removeByName(name: string): boolean {
    const id = this.registry.idByName(name);
    if (id === undefined) {
      return false;
    }
    return this.remove(id);
  }

  removeMany(stateIds: Iterable<number>): void {
    for (const id of stateIds) {
      this.remove(id);
    }
  }

  removeAll(): void {
    this.removeMany([...this.active]);
  }

  /**
   * Add the owner state of every match. Never removes: a missing match is
   * not evidence that a state is gone.
   */
  adjustFromEvidence(evidence: readonly EvidenceMatch[] | null | undefined): void {
    if (!evidence || evidence.length === 0) {
      return;
    }
    const owners = new Set<number>();
    for (const match of evidence) {
      if (match.ownerStateId !== undefined) {
        owners.add(match.ownerStateId);
      }
    }
    for (const id of owners) {
      this.add(id);
    }
  }

  /**
   * Reset the belief of every active, registered state to its baseline.
   */
  setProbabilityToBaseForActiveStates(): void {
    for (const record of this.resolveToRecords()) {
      record.probabilityExists = record.baseProbabilityExists;
    }
  }

  // ── Queries ───────────────────────────────────────────────────────────────

  /** Copy of the current members, in insertion order */
  snapshot(): Set<number> {
    return new Set(this.active);
  }

  has(stateId: number): boolean {
    return this.active.has(stateId);
  }

  get size(): number {
    return this.active.size;
  }

  isEmpty(): boolean {
    return this.active.size === 0;
  }

  /** Registry records of active states; members without a record are skipped */
  resolveToRecords(): StateRecord[] {
    const records: StateRecord[] = [];
    for (const id of this.active) {
      const record = this.registry.recordById(id);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  namesAsList(): string[] {
    return this.resolveToRecords().map((r) => r.name);
  }

  /** Names in insertion order, `", "`-separated; empty string when none */
  namesJoined(): string {
    return this.namesAsList().join(', ');
  }
}
