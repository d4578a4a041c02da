/**
 * Precondition checks for round events.
 *
 * Pure functions shared by the round machine guards and the Ballot facade:
 * the facade turns a non-null result into a typed rejection, the machine
 * uses `=== null` as its guard.
 */
import type { BallotRejection, Participant } from '@quorum/shared-types';
import { EMPTY_PARTICIPANT, PHASE_TRANSITIONS, WorkflowPhases, type TransitionEventType } from '@quorum/shared-types';
import type { RoundContext } from '../_contract';

export function findParticipant(
  participants: Record<string, Participant>,
  identity: string,
): Participant {
  return Object.hasOwn(participants, identity) ? participants[identity] : EMPTY_PARTICIPANT;
}

export function admissionRejection(context: RoundContext, identity: string): BallotRejection | null {
  if (context.phase !== WorkflowPhases.ADMITTING_PARTICIPANTS) return 'ADMISSION_NOT_OPEN';
  if (findParticipant(context.participants, identity).admitted) return 'ALREADY_ADMITTED';
  return null;
}

export function submissionRejection(
  context: RoundContext,
  senderId: string,
  text: string,
): BallotRejection | null {
  if (!findParticipant(context.participants, senderId).admitted) return 'NOT_A_PARTICIPANT';
  if (context.phase !== WorkflowPhases.PROPOSAL_SUBMISSION_OPEN) return 'PROPOSAL_SUBMISSION_NOT_OPEN';
  if (text.length === 0) return 'EMPTY_PROPOSAL_TEXT';
  if (text.length > context.limits.maxProposalLength) return 'PROPOSAL_TEXT_TOO_LONG';
  if (context.proposals.length >= context.limits.maxProposals) return 'TOO_MANY_PROPOSALS';
  return null;
}

export function voteRejection(
  context: RoundContext,
  senderId: string,
  proposalIndex: number,
): BallotRejection | null {
  const participant = findParticipant(context.participants, senderId);
  if (!participant.admitted) return 'NOT_A_PARTICIPANT';
  if (context.phase !== WorkflowPhases.VOTING_OPEN) return 'VOTING_NOT_OPEN';
  if (participant.hasVoted) return 'ALREADY_VOTED';
  if (!isProposalIndex(context, proposalIndex)) return 'PROPOSAL_NOT_FOUND';
  return null;
}

export function transitionRejection(
  context: RoundContext,
  type: TransitionEventType,
): BallotRejection | null {
  const transition = PHASE_TRANSITIONS[type];
  return context.phase === transition.from ? null : transition.rejection;
}

export function isProposalIndex(context: RoundContext, index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < context.proposals.length;
}
