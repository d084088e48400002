/**
 * Weighted candidate sets and cumulative-distribution selection.
 */

export interface CandidateSet {
  weight: number;
  stateIds: Set<number>;
}

export interface CandidateSetView extends CandidateSet {
  /** Upper bound of the weight range this entry owns: (previous, cumulativeWeight] */
  cumulativeWeight: number;
}

export class WeightedCandidates {
  private entries: CandidateSet[] = [];
  private sum = 0;

  add(weight: number, stateIds: Set<number>): void {
    this.entries.push({ weight, stateIds: new Set(stateIds) });
    this.sum += weight;
  }

  get totalWeight(): number {
    return this.sum;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Entry owning `draw`, walking entries in registration order.
   * `draw` is expected in [1, totalWeight].
   */
  select(draw: number): CandidateSet | undefined {
    let cumulative = 0;
    for (const entry of this.entries) {
      cumulative += entry.weight;
      if (draw <= cumulative) {
        return entry;
      }
    }
    return undefined;
  }

  /** Distinct state ids across all entries, in first-seen order */
  allStateIds(): number[] {
    const ids = new Set<number>();
    for (const entry of this.entries) {
      for (const id of entry.stateIds) {
        ids.add(id);
      }
    }
    return [...ids];
  }

  view(): CandidateSetView[] {
    let cumulative = 0;
    return this.entries.map((entry) => {
      cumulative += entry.weight;
      return {
        weight: entry.weight,
        stateIds: new Set(entry.stateIds),
        cumulativeWeight: cumulative,
      };
    });
  }

  clear(): void {
    this.entries = [];
    this.sum = 0;
  }
}
