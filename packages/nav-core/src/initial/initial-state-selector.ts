/**
 * InitialStateSelector - decides which states are showing when a run
 * starts.
 *
 * Candidate sets are registered with weights at configuration time.
 * `resolve()` then either probes the application (live mode) or draws one
 * candidate set by weight and activates it directly (simulated mode).
 *
 * @example
 * ```typescript
 * const selector = new InitialStateSelector(registry, memory, detector, {
 *   config: { mode: 'simulated' },
 * });
 * selector.addCandidateSet(60, 'Login');
 * selector.addCandidateSet(40, 'Dashboard', 'Sidebar');
 * const active = await selector.resolve();
 * ```
 */

import type {
  ILogger,
  NavigationConfig,
  NavigationConfigInput,
  RandomSource,
  StateProbe,
  StateRecord,
  StateRegistry,
} from '@statenav/contracts';
import {
  InitialStateResolutionError,
  isSpecialStateId,
  parseNavigationConfig,
} from '@statenav/contracts';
import type { ActiveStateMemory } from '../memory/index.js';
import { noopLogger } from '../logging/index.js';
import { mathRandomSource } from '../random/index.js';
import { WeightedCandidates, type CandidateSetView } from './weighted-candidates.js';

/** A state given directly, or by registry name */
export type CandidateRef = StateRecord | string;

export interface InitialStateSelectorOptions {
  config?: NavigationConfigInput;
  random?: RandomSource;
  logger?: ILogger;
}

export class InitialStateSelector {
  private readonly candidates = new WeightedCandidates();
  private readonly config: NavigationConfig;
  private readonly random: RandomSource;
  private readonly logger: ILogger;
  private resolved = false;

  constructor(
    private readonly registry: StateRegistry,
    private readonly memory: ActiveStateMemory,
    private readonly probe: StateProbe,
    options: InitialStateSelectorOptions = {},
  ) {
    this.config = parseNavigationConfig(options.config ?? {});
    this.random = options.random ?? mathRandomSource;
    this.logger = options.logger ?? noopLogger;
  }

  // ── Registration ──────────────────────────────────────────────────────────

  /**
   * Register a weighted candidate set. Returns true when an entry was added.
   *
   * Non-positive weights are ignored without a log line: zero is how callers
   * switch a candidate off. Names that do not resolve are dropped; a set left
   * with no states adds no entry and no weight. Sets registered after
   * `resolve()` are refused until `reset()`.
   */
  addCandidateSet(weight: number, ...states: CandidateRef[]): boolean {
    if (this.resolved) {
      this.logger.warn('Candidate set registered after initial states were resolved', {
        weight,
      });
      return false;
    }
    if (!(weight > 0)) {
      return false;
    }
    if (!Number.isInteger(weight)) {
      this.logger.warn('Ignoring candidate set with non-integer weight', { weight });
      return false;
    }

    const stateIds = new Set<number>();
    const unresolved: string[] = [];
    for (const ref of states) {
      if (typeof ref === 'string') {
        const id = this.registry.idByName(ref);
        if (id === undefined) {
          unresolved.push(ref);
        } else {
          stateIds.add(id);
        }
      } else {
        stateIds.add(ref.id);
      }
    }

    if (unresolved.length > 0) {
      this.logger.warn('Dropped unknown states from candidate set', { names: unresolved });
    }
    if (stateIds.size === 0) {
      return false;
    }

    this.candidates.add(weight, stateIds);
    return true;
  }

  get totalWeight(): number {
    return this.candidates.totalWeight;
  }

  hasCandidates(): boolean {
    return this.candidates.size > 0;
  }

  candidateSets(): CandidateSetView[] {
    return this.candidates.view();
  }

  isResolved(): boolean {
    return this.resolved;
  }

  /** Allow another `resolve()`; registered candidate sets are kept. */
  reset(): void {
    this.resolved = false;
  }

  // ── Resolution ────────────────────────────────────────────────────────────

  /**
   * Populate active-state memory for the start of a run and return what is
   * active afterwards. No-op when nothing was registered. Runs once per
   * `reset()`; later calls log a warning and return the current snapshot.
   *
   * @throws InitialStateResolutionError in live mode when no state is found
   */
  async resolve(): Promise<Set<number>> {
    if (!this.hasCandidates()) {
      return this.memory.snapshot();
    }
    if (this.resolved) {
      this.logger.warn('Initial states already resolved', {
        active: [...this.memory.snapshot()],
      });
      return this.memory.snapshot();
    }

    this.resolved = true;
    if (this.config.mode === 'simulated') {
      this.resolveSimulated();
    } else {
      await this.resolveLive();
    }
    return this.memory.snapshot();
  }

  private resolveSimulated(): void {
    const draw = this.random.nextInt(1, this.candidates.totalWeight);
    const chosen = this.candidates.select(draw);
    if (!chosen) {
      return;
    }

    for (const id of chosen.stateIds) {
      this.memory.add(id);
      const record = this.registry.recordById(id);
      if (record) {
        record.probabilityExists = record.baseProbabilityExists;
      }
    }
    this.logger.debug('Simulated initial states', { draw, stateIds: [...chosen.stateIds] });
  }

  private async resolveLive(): Promise<void> {
    const targeted = this.candidates.allStateIds();
    const reported = await this.probeAll(targeted);
    const probed = [...targeted];

    if (this.memory.isEmpty() && this.config.exhaustiveFallback) {
      const probedSet = new Set(targeted);
      const remaining = [...this.registry.allKnownIds()].filter(
        (id) => !probedSet.has(id) && !isSpecialStateId(id),
      );
      this.logger.info('No candidate state found; searching all states', {
        remaining: remaining.length,
      });
      reported.push(...(await this.probeAll(remaining)));
      probed.push(...remaining);
    }

    if (this.memory.isEmpty() && reported.length > 0) {
      this.logger.warn('State reported found but not recorded in active-state memory', {
        stateIds: reported,
      });
    }
    if (this.memory.isEmpty()) {
      const error = new InitialStateResolutionError(probed);
      this.logger.error(error.message, { probed });
      throw error;
    }

    this.memory.setProbabilityToBaseForActiveStates();
    this.logger.info(`Initial states: ${this.memory.namesJoined()}`);
  }

  /**
   * Probe ids with at most `maxConcurrentProbes` in flight. Returns the ids
   * reported as found.
   */
  private async probeAll(ids: number[]): Promise<number[]> {
    const queue = [...ids];
    const found: number[] = [];
    const worker = async (): Promise<void> => {
      for (let id = queue.shift(); id !== undefined; id = queue.shift()) {
        if (await this.safeProbe(id)) {
          found.push(id);
        }
      }
    };
    const workers = Math.min(this.config.maxConcurrentProbes, queue.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));
    return found;
  }

  private async safeProbe(id: number): Promise<boolean> {
    try {
      return await this.probe.probe(id);
    } catch (error) {
      this.logger.warn('State probe failed', {
        stateId: id,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
