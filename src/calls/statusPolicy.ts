import type { TerminalCallStatus } from './types';

export interface CallOutcomeSummary {
  turns: number;
  transcriptEntries: number;
  endedReason?: string;
}

/** Decides the terminal status of a call whose end-of-call report named no outcome. */
export type TerminalStatusPolicy = (summary: CallOutcomeSummary) => TerminalCallStatus;

export type TerminalStatusPolicyName = 'turn_count' | 'always_completed';

export const turnCountPolicy: TerminalStatusPolicy = (summary) =>
  summary.turns > 0 ? 'completed' : 'missed';

export const alwaysCompletedPolicy: TerminalStatusPolicy = () => 'completed';

export function resolveStatusPolicy(name: TerminalStatusPolicyName): TerminalStatusPolicy {
  switch (name) {
    case 'always_completed':
      return alwaysCompletedPolicy;
    case 'turn_count':
      return turnCountPolicy;
  }
}
