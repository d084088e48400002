export { InMemoryStateRegistry } from './in-memory-state-registry.js';
export { InMemoryTransitionStore } from './in-memory-transition-store.js';
