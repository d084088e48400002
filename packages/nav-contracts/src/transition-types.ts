/**
 * Whether the source state stays visible after a transition runs.
 * `none` leaves the decision to the transition collection.
 */
export type StaysVisible = 'true' | 'false' | 'none';

/** Opaque executable behind a transition */
export type TransitionTask = () => boolean | Promise<boolean>;

export interface StateTransition {
  /** Target ids to activate; may hold PREVIOUS, never CURRENT/EXPECTED/NULL */
  activate: Set<number>;
  /** Names to link into `activate` once the registry is populated */
  activateNames?: Set<string>;
  /** Ids to exit */
  exit: Set<number>;
  execute: TransitionTask;
  /** Route ranking cost; lower is cheaper */
  pathCost: number;
  timesSuccessful: number;
  staysVisible: StaysVisible;
}

/**
 * All transitions leaving one source state.
 */
export interface TransitionCollection {
  /** Unset until linked, unless assigned up front */
  stateId?: number;
  stateName: string;
  transitions: StateTransition[];
  /** Runs after arrival to confirm the transition */
  transitionFinish?: StateTransition;
  staysVisibleAfterTransition: boolean;
}
