/**
 * Custom Error Classes
 *
 * Every failure the engine reports is a VidbatchError subclass with a stable
 * `code` and, where a failure has several causes, a discriminating `kind`.
 */

import type { JobStatus } from '../stateMachine.js';

/**
 * Base error class for all vidbatch errors
 */
export class VidbatchError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'VidbatchError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

export function isVidbatchError(value: unknown): value is VidbatchError {
  return value instanceof VidbatchError;
}

/**
 * Validation error for invalid configuration or arguments
 */
export class ValidationError extends VidbatchError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * State transition error for invalid job status changes
 */
export class StateTransitionError extends VidbatchError {
  constructor(
    jobId: string,
    fromState: JobStatus,
    toState: JobStatus,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { jobId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * A required external binary could not be resolved
 */
export class ToolMissingError extends VidbatchError {
  constructor(tool: string, searched: string[]) {
    super(
      `Required tool not found: ${tool}`,
      'TOOL_MISSING',
      { tool, searched }
    );
    this.name = 'ToolMissingError';
  }
}

export type ProbeErrorKind =
  | 'NotFound'
  | 'Unreadable'
  | 'ToolMissing'
  | 'MalformedOutput'
  | 'ToolTimeout';

/**
 * Metadata probing failed for one file
 */
export class ProbeError extends VidbatchError {
  public readonly kind: ProbeErrorKind;
  public readonly path: string;

  constructor(kind: ProbeErrorKind, path: string, message: string) {
    super(message, 'PROBE_ERROR', { kind, path });
    this.name = 'ProbeError';
    this.kind = kind;
    this.path = path;
  }
}

/**
 * A selection root does not exist
 */
export class SelectionError extends VidbatchError {
  public readonly kind = 'PathNotFound' as const;
  public readonly path: string;

  constructor(path: string) {
    super(`Selection root not found: ${path}`, 'SELECTION_ERROR', {
      kind: 'PathNotFound',
      path,
    });
    this.name = 'SelectionError';
    this.path = path;
  }
}

export type TemplateErrorKind =
  | 'UnknownPlaceholder'
  | 'MalformedPattern'
  | 'CollisionDenied'
  | 'SameAsInput';

/**
 * Output naming failed: bad pattern or an output path that may not be used
 */
export class TemplateError extends VidbatchError {
  public readonly kind: TemplateErrorKind;

  constructor(kind: TemplateErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(message, 'TEMPLATE_ERROR', { kind, ...details });
    this.name = 'TemplateError';
    this.kind = kind;
  }
}

/**
 * Contradictory transcode options
 */
export class OptionConflictError extends VidbatchError {
  public readonly conflicts: readonly string[];

  constructor(conflicts: string[]) {
    super(
      conflicts.length === 1
        ? `Conflicting options: ${conflicts[0]}`
        : `Conflicting options:\n  - ${conflicts.join('\n  - ')}`,
      'OPTION_CONFLICT',
      { conflicts }
    );
    this.name = 'OptionConflictError';
    this.conflicts = Object.freeze([...conflicts]);
  }
}

export type JobErrorKind =
  | 'NonZeroExit'
  | 'Killed'
  | 'SpawnFailed'
  | 'OutputWriteFailed';

/**
 * External transcode process failure
 */
export class JobError extends VidbatchError {
  public readonly kind: JobErrorKind;
  public readonly exitCode?: number;
  public readonly diagnostics: string;

  constructor(
    kind: JobErrorKind,
    message: string,
    options: { exitCode?: number; diagnostics?: string; command?: string } = {}
  ) {
    super(message, 'JOB_ERROR', {
      kind,
      exitCode: options.exitCode,
      command: options.command,
    });
    this.name = 'JobError';
    this.kind = kind;
    this.exitCode = options.exitCode;
    this.diagnostics = options.diagnostics ?? '';
  }
}

/**
 * Preset lookup by name failed
 */
export class PresetNotFoundError extends VidbatchError {
  public readonly presetName: string;

  constructor(name: string) {
    super(`Preset not found: ${name}`, 'PRESET_NOT_FOUND', { name });
    this.name = 'PresetNotFoundError';
    this.presetName = name;
  }
}

export type PresetStoreErrorKind =
  | 'Unreadable'
  | 'InvalidFormat'
  | 'WriteFailed'
  | 'InvalidName';

/**
 * The preset store file cannot be read, parsed or written
 */
export class PresetStoreError extends VidbatchError {
  public readonly kind: PresetStoreErrorKind;

  constructor(kind: PresetStoreErrorKind, message: string, file?: string) {
    super(message, 'PRESET_STORE_ERROR', { kind, file });
    this.name = 'PresetStoreError';
    this.kind = kind;
  }
}
