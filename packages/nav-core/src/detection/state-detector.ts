/**
 * StateDetector - answers "is this state showing?" by asking the
 * pattern-matching pipeline for evidence and feeding what it finds into
 * active-state memory.
 */

import type {
  ILogger,
  StateFinder,
  StateProbe,
  StateRegistry,
} from '@statenav/contracts';
import { SpecialStateType, isSpecialStateId } from '@statenav/contracts';
import type { ActiveStateMemory } from '../memory/index.js';
import { noopLogger } from '../logging/index.js';

export class StateDetector implements StateProbe {
  private readonly logger: ILogger;

  constructor(
    private readonly registry: StateRegistry,
    private readonly memory: ActiveStateMemory,
    private readonly finder: StateFinder,
    options: { logger?: ILogger } = {},
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Search for one state. Special and unregistered ids are never found.
   */
  async probe(stateId: number): Promise<boolean> {
    if (isSpecialStateId(stateId)) {
      return false;
    }
    const record = this.registry.recordById(stateId);
    if (!record) {
      return false;
    }

    const evidence = await this.finder.find(record);
    this.memory.adjustFromEvidence(evidence);
    this.logger.debug(`Probed ${record.name}`, { stateId, matches: evidence.length });
    return evidence.length > 0;
  }

  /**
   * Re-probe every active state and drop the ones no longer found.
   * Markers such as UNKNOWN cannot be confirmed and are dropped too.
   * Returns the ids still active afterwards.
   */
  async checkActiveStates(): Promise<Set<number>> {
    for (const id of this.memory.snapshot()) {
      const found = await this.probe(id);
      if (!found) {
        this.memory.remove(id);
      }
    }
    return this.memory.snapshot();
  }

  /** Probe every registered state */
  async searchAllStates(): Promise<void> {
    for (const id of this.registry.allKnownIds()) {
      if (!isSpecialStateId(id)) {
        await this.probe(id);
      }
    }
  }

  /** Forget everything, then search all states */
  async refreshStates(): Promise<Set<number>> {
    this.memory.removeAll();
    await this.searchAllStates();
    return this.memory.snapshot();
  }

  /**
   * Keep what is still visible; when nothing is, search everything; when
   * that finds nothing either, fall back to UNKNOWN.
   */
  async rebuildActiveStates(): Promise<Set<number>> {
    await this.checkActiveStates();
    if (!this.memory.isEmpty()) {
      return this.memory.snapshot();
    }

    await this.searchAllStates();
    if (this.memory.isEmpty()) {
      this.logger.warn('No state found on screen; marking UNKNOWN');
      this.memory.add(SpecialStateType.UNKNOWN);
    }
    return this.memory.snapshot();
  }
}
