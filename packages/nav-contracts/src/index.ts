// ============================================
// State Navigation - Type Contracts
// ============================================

// Special states
export {
  SpecialStateType,
  isSpecialStateId,
  specialStateTypeFromId,
  specialStateName,
} from './special-state-type.js';

// State and transition model
export type { StateRecord, StateRecordInput } from './state-types.js';
export type {
  StaysVisible,
  TransitionTask,
  StateTransition,
  TransitionCollection,
} from './transition-types.js';

// Ports
export type {
  StateRegistry,
  TransitionStore,
  EvidenceMatch,
  StateFinder,
  StateProbe,
  RandomSource,
} from './ports.js';

// Logging
export type { ILogger, LogLevel } from './logger.js';

// Errors
export {
  StateNavigationError,
  InitialStateResolutionError,
  ConfigValidationError,
} from './errors.js';
export type { ConfigIssue } from './errors.js';

// Config schemas
export {
  RunModeSchema,
  LogLevelSettingSchema,
  NavigationConfigSchema,
  parseNavigationConfig,
  validateNavigationConfig,
} from './config-schemas.js';
export type {
  RunMode,
  LogLevelSetting,
  NavigationConfig,
  NavigationConfigInput,
} from './config-schemas.js';
