import type { VoiceEventType } from '../events/types';
import type { CallPhase } from './types';

type TransitionTable = Record<CallPhase, Record<VoiceEventType, CallPhase>>;

/**
 * Phase transitions. The first event for an unseen call creates it in `Created`
 * and is then applied through this table like any other event. `Ended` absorbs
 * every event: late deliveries may add data but never move the phase back.
 */
export const CALL_TRANSITIONS: TransitionTable = {
  Created: {
    'call-started': 'Created',
    'status-update': 'InProgress',
    'turn-completed': 'InProgress',
    'end-of-call-report': 'Ended',
  },
  InProgress: {
    'call-started': 'InProgress',
    'status-update': 'InProgress',
    'turn-completed': 'InProgress',
    'end-of-call-report': 'Ended',
  },
  Ended: {
    'call-started': 'Ended',
    'status-update': 'Ended',
    'turn-completed': 'Ended',
    'end-of-call-report': 'Ended',
  },
};

const TRANSCRIPT_EVENTS: ReadonlySet<VoiceEventType> = new Set(['status-update', 'turn-completed']);

export function nextPhase(current: CallPhase, eventType: VoiceEventType): CallPhase {
  return CALL_TRANSITIONS[current][eventType];
}

export function appendsTranscript(eventType: VoiceEventType): boolean {
  return TRANSCRIPT_EVENTS.has(eventType);
}

export function isTerminal(phase: CallPhase): boolean {
  return phase === 'Ended';
}
