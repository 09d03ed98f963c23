/**
 * @vidbatch/core
 * 
 * Core package containing:
 * - Job status state machine
 * - Error taxonomy
 * - External binary resolution
 */

// State machine
export {
  JOB_STATUSES,
  JobStateMachine,
  isValidTransition,
  getNextStates,
  isTerminalStatus,
} from './stateMachine.js';

export type {
  JobStatus,
  TerminalJobStatus,
  JobStateTransition,
} from './stateMachine.js';

// Errors
export {
  VidbatchError,
  isVidbatchError,
  ValidationError,
  StateTransitionError,
  ToolMissingError,
  ProbeError,
  SelectionError,
  TemplateError,
  OptionConflictError,
  JobError,
  PresetNotFoundError,
  PresetStoreError,
} from './errors/index.js';

export type {
  ProbeErrorKind,
  TemplateErrorKind,
  JobErrorKind,
  PresetStoreErrorKind,
} from './errors/index.js';

// Binaries
export {
  findOnPath,
  resolveBinary,
  assertBinaries,
} from './config/binaries.js';

export type {
  BinaryName,
  BinaryConfig,
  BinariesConfig,
  ResolveBinaryOptions,
} from './config/binaries.js';
