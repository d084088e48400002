export { InitialStateSelector } from './initial-state-selector.js';
export type { CandidateRef, InitialStateSelectorOptions } from './initial-state-selector.js';
export { WeightedCandidates } from './weighted-candidates.js';
export type { CandidateSet, CandidateSetView } from './weighted-candidates.js';
