import { describe, it, expect } from 'vitest';
import {
  JobStateMachine,
  StateTransitionError,
  getNextStates,
  isTerminalStatus,
  isValidTransition,
} from '../src/index.js';

describe('JobStateMachine', () => {
  it('starts pending and records each transition', () => {
    const machine = new JobStateMachine('job-1');
    expect(machine.getState()).toBe('PENDING');

    machine.transitionTo('RUNNING');
    machine.transitionTo('SUCCEEDED', 'exit 0');

    expect(machine.getState()).toBe('SUCCEEDED');
    expect(machine.isTerminal()).toBe(true);
    expect(machine.getHistory().map((t) => [t.from, t.to, t.reason])).toEqual([
      ['PENDING', 'RUNNING', undefined],
      ['RUNNING', 'SUCCEEDED', 'exit 0'],
    ]);
  });

  it('lets a pending job be skipped or cancelled without running', () => {
    expect(isValidTransition('PENDING', 'SKIPPED')).toBe(true);
    expect(isValidTransition('PENDING', 'CANCELLED')).toBe(true);
    expect(isValidTransition('PENDING', 'SUCCEEDED')).toBe(false);
  });

  it('rejects leaving a terminal state', () => {
    const machine = new JobStateMachine('job-2');
    machine.transitionTo('SKIPPED');

    expect(() => machine.transitionTo('RUNNING')).toThrow(StateTransitionError);
    expect(() => machine.transitionTo('RUNNING')).toThrow('Invalid state transition from SKIPPED to RUNNING');
    expect(machine.getState()).toBe('SKIPPED');
  });

  it('lists next states', () => {
    expect(getNextStates('RUNNING')).toEqual(['SUCCEEDED', 'FAILED', 'CANCELLED']);
    expect(getNextStates('FAILED')).toEqual([]);
  });

  it.each([
    ['PENDING', false],
    ['RUNNING', false],
    ['SUCCEEDED', true],
    ['FAILED', true],
    ['SKIPPED', true],
    ['CANCELLED', true],
  ] as const)('isTerminalStatus(%s) is %s', (status, terminal) => {
    expect(isTerminalStatus(status)).toBe(terminal);
  });
});
