/**
 * Allowed-transition table for the round workflow.
 *
 * Every phase-advancing admin event has exactly one predecessor phase and one
 * successor phase. Sending it from any other phase is rejected with the
 * listed code.
 */
import type { BallotRejection, WorkflowPhase } from './index';
import { Events, PHASE_ORDER, WorkflowPhases } from './events';

export interface PhaseTransition {
  from: WorkflowPhase;
  to: WorkflowPhase;
  rejection: BallotRejection;
}

export const PHASE_TRANSITIONS = {
  [Events.Admin.OPEN_PROPOSAL_SUBMISSION]: {
    from: WorkflowPhases.ADMITTING_PARTICIPANTS,
    to: WorkflowPhases.PROPOSAL_SUBMISSION_OPEN,
    rejection: 'PROPOSAL_SUBMISSION_NOT_OPEN',
  },
  [Events.Admin.CLOSE_PROPOSAL_SUBMISSION]: {
    from: WorkflowPhases.PROPOSAL_SUBMISSION_OPEN,
    to: WorkflowPhases.PROPOSAL_SUBMISSION_CLOSED,
    rejection: 'PROPOSAL_SUBMISSION_NOT_OPEN',
  },
  [Events.Admin.OPEN_VOTING]: {
    from: WorkflowPhases.PROPOSAL_SUBMISSION_CLOSED,
    to: WorkflowPhases.VOTING_OPEN,
    rejection: 'PROPOSAL_SUBMISSION_NOT_CLOSED',
  },
  [Events.Admin.CLOSE_VOTING]: {
    from: WorkflowPhases.VOTING_OPEN,
    to: WorkflowPhases.VOTING_CLOSED,
    rejection: 'VOTING_NOT_OPEN',
  },
  [Events.Admin.TALLY]: {
    from: WorkflowPhases.VOTING_CLOSED,
    to: WorkflowPhases.TALLIED,
    rejection: 'VOTING_NOT_CLOSED',
  },
} as const satisfies Record<string, PhaseTransition>;

export type TransitionEventType = keyof typeof PHASE_TRANSITIONS;

/** Position of a phase in the workflow (0 = ADMITTING_PARTICIPANTS). */
export function phaseRank(phase: WorkflowPhase): number {
  return PHASE_ORDER.indexOf(phase);
}
