export { ActiveStateMemory, ACTIVE_PROBABILITY } from './active-state-memory.js';
export type { ActiveStateMemoryOptions, AddStateOptions } from './active-state-memory.js';
