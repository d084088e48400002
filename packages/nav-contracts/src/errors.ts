/**
 * Errors surfaced by the navigation engine.
 *
 * Almost everything in the engine degrades to "no effect"; these cover the
 * few conditions a host has to act on.
 */

export class StateNavigationError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'StateNavigationError';
    this.code = code;
  }
}

/**
 * Live resolution probed the candidates and every known state and found
 * nothing. Automation cannot safely begin.
 */
export class InitialStateResolutionError extends StateNavigationError {
  readonly probedStateIds: number[];

  constructor(probedStateIds: number[]) {
    super(
      'INITIAL_STATES_NOT_FOUND',
      `No initial state found after probing ${probedStateIds.length} state(s)`,
    );
    this.name = 'InitialStateResolutionError';
    this.probedStateIds = probedStateIds;
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends StateNavigationError {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(
      'INVALID_CONFIG',
      `Invalid navigation config: ${issues.map((i) => `${i.path || '<root>'}: ${i.message}`).join('; ')}`,
    );
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}
