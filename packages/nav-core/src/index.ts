/**
 * @statenav/core
 *
 * State graph navigation: active-state memory, adjacency queries,
 * initial-state selection and transition linking.
 */

export { createNavigationEngine } from './engine.js';
export type { NavigationEngine, NavigationEngineOptions } from './engine.js';

// Active-state memory
export * from './memory/index.js';

// Adjacency queries
export * from './adjacency/index.js';

// Initial-state selection
export * from './initial/index.js';

// Name-to-id linking
export * from './linking/index.js';

// Probing through the pattern-matching pipeline
export * from './detection/index.js';

// In-memory registry and transition store
export * from './registry/index.js';

// Config loading
export * from './config/index.js';

// Logging
export * from './logging/index.js';

// Randomness
export * from './random/index.js';
