import { InvalidTransitionError } from '../errors';
import type { CallState, TerminalCallState } from './types';

const TRANSITIONS: Record<CallState, readonly CallState[]> = {
  INITIATED: ['CONFIG_RESOLVED', 'ENDED_BY_CALLER', 'ERROR_TERMINATED'],
  CONFIG_RESOLVED: ['AI_ACTIVE', 'FORWARDING', 'ENDED_BY_CALLER', 'ERROR_TERMINATED'],
  AI_ACTIVE: ['FORWARDING', 'ENDED_BY_TOOL', 'ENDED_BY_CALLER', 'ERROR_TERMINATED'],
  FORWARDING: ['FORWARDED', 'ENDED_BY_CALLER', 'ERROR_TERMINATED'],
  FORWARDED: [],
  ENDED_BY_TOOL: [],
  ENDED_BY_CALLER: [],
  ERROR_TERMINATED: [],
};

const TERMINAL: ReadonlySet<CallState> = new Set<CallState>([
  'FORWARDED',
  'ENDED_BY_TOOL',
  'ENDED_BY_CALLER',
  'ERROR_TERMINATED',
]);

export function isTerminalState(state: CallState): state is TerminalCallState {
  return TERMINAL.has(state);
}

export function canTransition(from: CallState, to: CallState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: CallState, to: CallState): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}
