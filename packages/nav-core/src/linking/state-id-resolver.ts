/**
 * StateIdResolver - links name references in transition collections to
 * registry ids once the registry is populated.
 *
 * Idempotent: ids already present are kept, names are merged in.
 */

import type { ILogger, StateRegistry, TransitionCollection } from '@statenav/contracts';
import { noopLogger } from '../logging/index.js';

export interface LinkResult {
  /** Name references that resolved to an id */
  resolved: number;
  /** Name references with no registry entry */
  unresolved: string[];
}

export class StateIdResolver {
  private readonly logger: ILogger;

  constructor(
    private readonly registry: StateRegistry,
    options: { logger?: ILogger } = {},
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  linkOne(collection: TransitionCollection): LinkResult {
    const result: LinkResult = { resolved: 0, unresolved: [] };

    // A pre-assigned source id is never overwritten.
    if (collection.stateId === undefined) {
      const sourceId = this.registry.idByName(collection.stateName);
      if (sourceId === undefined) {
        result.unresolved.push(collection.stateName);
      } else {
        collection.stateId = sourceId;
        result.resolved++;
      }
    }

    const transitions = collection.transitionFinish
      ? [...collection.transitions, collection.transitionFinish]
      : collection.transitions;

    for (const transition of transitions) {
      if (!transition.activateNames) {
        continue;
      }
      for (const name of transition.activateNames) {
        const id = this.registry.idByName(name);
        if (id === undefined) {
          result.unresolved.push(name);
          continue;
        }
        transition.activate.add(id);
        result.resolved++;
      }
    }

    if (result.unresolved.length > 0) {
      this.logger.warn(`Unresolved state names in transitions of "${collection.stateName}"`, {
        names: result.unresolved,
      });
    }
    return result;
  }

  linkAll(collections: Iterable<TransitionCollection>): LinkResult {
    const total: LinkResult = { resolved: 0, unresolved: [] };
    for (const collection of collections) {
      const result = this.linkOne(collection);
      total.resolved += result.resolved;
      total.unresolved.push(...result.unresolved);
    }
    return total;
  }
}
