/**
 * Read-only projections of round state. Pure functions — callers get copies,
 * never references into actor context.
 */
import type { Participant, Proposal, RoundView } from '@quorum/shared-types';
import type { RoundContext } from './machines/_contract';
import { findParticipant } from './machines/actions/round-rules';

export function projectRound(context: RoundContext): RoundView {
  return {
    id: context.roundId,
    name: context.name,
    phase: context.phase,
    proposalCount: context.proposals.length,
    winningProposalIndex: context.winningProposalIndex,
  };
}

export function projectParticipant(context: RoundContext, identity: string): Participant {
  return { ...findParticipant(context.participants, identity) };
}

export function projectProposal(proposal: Proposal): Proposal {
  return { ...proposal };
}
