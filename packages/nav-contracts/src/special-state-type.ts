/**
 * SpecialStateType defines the symbolic state markers.
 *
 * Every ordinary state id issued by a registry is > 0, so any id < 0 is a
 * marker. `NULL` means "no state" and is never an active state.
 */
export enum SpecialStateType {
  /** Nothing could be confirmed on screen */
  UNKNOWN = -1,
  /** Whatever was hidden by the transition into the source state */
  PREVIOUS = -2,
  CURRENT = -3,
  EXPECTED = -4,
  /** No state at all */
  NULL = -5,
}

const SPECIAL_BY_ID = new Map<number, SpecialStateType>([
  [SpecialStateType.UNKNOWN, SpecialStateType.UNKNOWN],
  [SpecialStateType.PREVIOUS, SpecialStateType.PREVIOUS],
  [SpecialStateType.CURRENT, SpecialStateType.CURRENT],
  [SpecialStateType.EXPECTED, SpecialStateType.EXPECTED],
  [SpecialStateType.NULL, SpecialStateType.NULL],
]);

/**
 * The one place that decides whether an id is a symbolic marker.
 */
export function isSpecialStateId(id: number): boolean {
  return id < 0;
}

export function specialStateTypeFromId(id: number): SpecialStateType | undefined {
  return SPECIAL_BY_ID.get(id);
}

export function specialStateName(type: SpecialStateType): string {
  return SpecialStateType[type];
}
