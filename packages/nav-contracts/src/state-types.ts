/**
 * State records as kept by the registry.
 *
 * The navigation engine reads these and updates the probability and visit
 * bookkeeping fields; it never creates or deletes them.
 */
export interface StateRecord {
  /** Stable identifier, > 0 for real states */
  id: number;
  name: string;
  /** Current belief (0-100) that the state is showing */
  probabilityExists: number;
  /** Configured baseline the belief resets to */
  baseProbabilityExists: number;
  timesVisited: number;
  /**
   * States that were active right before this one and were hidden (not
   * exited) by the transition into it. Resolves the PREVIOUS marker.
   */
  hiddenStateIds: number[];
}

/**
 * Fields a caller may omit when registering a state.
 */
export type StateRecordInput = Pick<StateRecord, 'name'> &
  Partial<Omit<StateRecord, 'name'>>;
