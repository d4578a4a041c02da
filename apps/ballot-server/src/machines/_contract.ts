/**
 * Round Machine Contract
 *
 * One actor per round. The actor owns the round's phase, its participant
 * registry and its proposal registry. Authorization is not its concern:
 * ADMIN.* events are only sent after the authority check has passed.
 *
 * Participant events carry the caller identity as `senderId`, injected by
 * the host (same as every client event).
 */
import type { Events, Participant, Proposal, RoundLimits, WorkflowPhase } from '@quorum/shared-types';

export interface RoundInput {
  roundId: number;
  name: string;
  limits: RoundLimits;
}

export interface RoundContext {
  roundId: number;
  name: string;
  phase: WorkflowPhase;
  limits: RoundLimits;
  /** Keyed by identity. Only admitted identities have an entry. */
  participants: Record<string, Participant>;
  proposals: Proposal[];
  /** Set by ADMIN.TALLY */
  winningProposalIndex: number | null;
}

export type TransitionEvent =
  | { type: typeof Events.Admin.OPEN_PROPOSAL_SUBMISSION }
  | { type: typeof Events.Admin.CLOSE_PROPOSAL_SUBMISSION }
  | { type: typeof Events.Admin.OPEN_VOTING }
  | { type: typeof Events.Admin.CLOSE_VOTING }
  | { type: typeof Events.Admin.TALLY };

export type RoundEvent =
  | TransitionEvent
  | { type: typeof Events.Admin.ADMIT_PARTICIPANT; identity: string }
  | { type: typeof Events.Participant.SUBMIT_PROPOSAL; senderId: string; text: string }
  | { type: typeof Events.Participant.VOTE; senderId: string; proposalIndex: number };
