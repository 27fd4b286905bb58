/**
 * Session phase graph and event-log replay
 */

import type { SessionPhase } from '@devloop/sdk';
import { InvalidStateError } from '../errors';

export const INITIAL_PHASE: SessionPhase = 'intake';

const ALLOWED: Record<SessionPhase, readonly SessionPhase[]> = {
  intake: ['planning', 'failed', 'cancelled'],
  planning: ['executing', 'failed', 'cancelled'],
  executing: ['planning', 'reviewing', 'failed', 'cancelled'],
  reviewing: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export interface PhaseTransition {
  seq: number;
  from: SessionPhase;
  to: SessionPhase;
  trigger: string;        // Id of the message or internal event that caused it
  reason?: string;
  at: number;
}

export function canTransition(from: SessionPhase, to: SessionPhase): boolean {
  return ALLOWED[from].includes(to);
}

/**
 * Rebuild the phase history from an event log, validating every step.
 * Returns the phases visited, starting with the initial phase.
 */
export function replayPhases(log: readonly PhaseTransition[]): SessionPhase[] {
  const phases: SessionPhase[] = [INITIAL_PHASE];
  let current = INITIAL_PHASE;

  log.forEach((entry, index) => {
    if (entry.seq !== index + 1) {
      throw new InvalidStateError(`Transition ${index + 1} has sequence number ${entry.seq}`);
    }
    if (entry.from !== current) {
      throw new InvalidStateError(`Transition ${entry.seq} starts from ${entry.from}, session was ${current}`);
    }
    if (!canTransition(entry.from, entry.to)) {
      throw new InvalidStateError(`Transition ${entry.seq} from ${entry.from} to ${entry.to} is not allowed`);
    }
    current = entry.to;
    phases.push(current);
  });

  return phases;
}
