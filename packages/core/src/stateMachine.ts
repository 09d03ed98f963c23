/**
 * Job State Machine
 * 
 * Strict state machine for the lifecycle of one transcode job.
 * 
 * State Flow:
 * PENDING → RUNNING → SUCCEEDED | FAILED | CANCELLED
 *        ↘ SKIPPED (rejected before execution)
 *        ↘ CANCELLED (batch cancelled before the job started)
 * 
 * Rules:
 * - Transitions are monotonic; nothing re-enters RUNNING
 * - Invalid transitions throw errors
 */

import { StateTransitionError } from './errors/index.js';

export const JOB_STATUSES = [
  'PENDING',
  'RUNNING',
  'SUCCEEDED',
  'FAILED',
  'SKIPPED',
  'CANCELLED',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type TerminalJobStatus = Exclude<JobStatus, 'PENDING' | 'RUNNING'>;

/**
 * Represents a state transition with metadata
 */
export interface JobStateTransition {
  from: JobStatus;
  to: JobStatus;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<JobStatus, ReadonlySet<JobStatus>> = {
  PENDING: new Set<JobStatus>(['RUNNING', 'SKIPPED', 'CANCELLED']),
  RUNNING: new Set<JobStatus>(['SUCCEEDED', 'FAILED', 'CANCELLED']),
  SUCCEEDED: new Set<JobStatus>(),
  FAILED: new Set<JobStatus>(),
  SKIPPED: new Set<JobStatus>(),
  CANCELLED: new Set<JobStatus>(),
};

/**
 * Check if a transition from one state to another is valid
 */
export function isValidTransition(from: JobStatus, to: JobStatus): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: JobStatus): JobStatus[] {
  return Array.from(validTransitions[current]);
}

export function isTerminalStatus(status: JobStatus): status is TerminalJobStatus {
  return validTransitions[status].size === 0;
}

/**
 * Job State Machine class
 * Manages state transitions with validation
 */
export class JobStateMachine {
  private currentState: JobStatus = 'PENDING';
  private readonly history: JobStateTransition[] = [];
  private readonly jobId: string;

  constructor(jobId: string) {
    this.jobId = jobId;
  }

  /**
   * Get the current state
   */
  getState(): JobStatus {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<JobStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: JobStatus): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: JobStatus, reason?: string): JobStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.jobId, this.currentState, targetState);
    }

    const transition: JobStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return isTerminalStatus(this.currentState);
  }
}
