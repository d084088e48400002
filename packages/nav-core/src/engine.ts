/**
 * createNavigationEngine - wires the registry, transition store, memory,
 * adjacency queries, linking, detection and initial-state selection
 * around one shared ActiveStateMemory.
 */

import type {
  ILogger,
  NavigationConfig,
  NavigationConfigInput,
  RandomSource,
  StateFinder,
} from '@statenav/contracts';
import { parseNavigationConfig } from '@statenav/contracts';
import { ActiveStateMemory } from './memory/index.js';
import { AdjacentStates } from './adjacency/index.js';
import { StateIdResolver, type LinkResult } from './linking/index.js';
import { StateDetector } from './detection/index.js';
import { InitialStateSelector } from './initial/index.js';
import { InMemoryStateRegistry, InMemoryTransitionStore } from './registry/index.js';
import { createConsoleLogger } from './logging/index.js';

export interface NavigationEngineOptions {
  /** Pattern-matching pipeline used for live probing */
  finder: StateFinder;
  registry?: InMemoryStateRegistry;
  transitions?: InMemoryTransitionStore;
  config?: NavigationConfigInput;
  random?: RandomSource;
  /** Defaults to a console logger at `config.logLevel` */
  logger?: ILogger;
}

export interface NavigationEngine {
  config: NavigationConfig;
  registry: InMemoryStateRegistry;
  transitions: InMemoryTransitionStore;
  memory: ActiveStateMemory;
  adjacent: AdjacentStates;
  resolver: StateIdResolver;
  detector: StateDetector;
  initialStates: InitialStateSelector;
  /** Link every stored collection by name and index the newly linked ones */
  link(): LinkResult;
}

export function createNavigationEngine(options: NavigationEngineOptions): NavigationEngine {
  const config = parseNavigationConfig(options.config ?? {});
  const logger = options.logger ?? createConsoleLogger(config.logLevel);
  const registry = options.registry ?? new InMemoryStateRegistry();
  const transitions = options.transitions ?? new InMemoryTransitionStore();

  const memory = new ActiveStateMemory(registry, { logger });
  const adjacent = new AdjacentStates(registry, transitions, memory);
  const resolver = new StateIdResolver(registry, { logger });
  const detector = new StateDetector(registry, memory, options.finder, { logger });
  const initialStates = new InitialStateSelector(registry, memory, detector, {
    config,
    random: options.random,
    logger,
  });

  return {
    config,
    registry,
    transitions,
    memory,
    adjacent,
    resolver,
    detector,
    initialStates,
    link(): LinkResult {
      const result = resolver.linkAll(transitions.allCollections());
      transitions.relink();
      return result;
    },
  };
}
