/**
 * Round Machine
 *
 * Strict linear lifecycle for a single voting round:
 *
 *   admittingParticipants -> proposalSubmissionOpen -> proposalSubmissionClosed
 *     -> votingOpen -> votingClosed -> tallied (final)
 *
 * Each ADMIN.* phase event is only handled in its predecessor state, so a
 * phase can never be skipped or revisited. Registry events (admit, submit,
 * vote) are guarded by the same precondition checks the Ballot facade uses
 * to build its rejections; an event that fails its guard changes nothing.
 */
import { setup, assign } from 'xstate';
import type { WorkflowPhase } from '@quorum/shared-types';
import { Config, Events, WorkflowPhases } from '@quorum/shared-types';
import type { RoundContext, RoundEvent, RoundInput } from './_contract';
import { admissionRejection, submissionRejection, voteRejection } from './actions/round-rules';
import { computeWinner } from './actions/round-tally';

export const roundMachine = setup({
  types: {
    context: {} as RoundContext,
    events: {} as RoundEvent,
    input: {} as RoundInput,
  },
  guards: {
    canAdmit: ({ context, event }) =>
      event.type === Events.Admin.ADMIT_PARTICIPANT && admissionRejection(context, event.identity) === null,
    canSubmit: ({ context, event }) =>
      event.type === Events.Participant.SUBMIT_PROPOSAL &&
      submissionRejection(context, event.senderId, event.text) === null,
    canVote: ({ context, event }) =>
      event.type === Events.Participant.VOTE && voteRejection(context, event.senderId, event.proposalIndex) === null,
  },
  actions: {
    enterPhase: assign((_, params: { phase: WorkflowPhase }) => ({ phase: params.phase })),

    admitParticipant: assign(({ context, event }) => {
      if (event.type !== Events.Admin.ADMIT_PARTICIPANT) return {};
      return {
        participants: {
          ...context.participants,
          [event.identity]: { admitted: true, hasVoted: false, votedProposalIndex: null },
        },
      };
    }),

    seedSentinel: assign(({ context }) => ({
      proposals: [...context.proposals, { text: Config.round.sentinelText, voteCount: 0 }],
    })),

    appendProposal: assign(({ context, event }) => {
      if (event.type !== Events.Participant.SUBMIT_PROPOSAL) return {};
      return { proposals: [...context.proposals, { text: event.text, voteCount: 0 }] };
    }),

    recordVote: assign(({ context, event }) => {
      if (event.type !== Events.Participant.VOTE) return {};
      const { senderId, proposalIndex } = event;
      return {
        participants: {
          ...context.participants,
          [senderId]: { admitted: true, hasVoted: true, votedProposalIndex: proposalIndex },
        },
        proposals: context.proposals.map((proposal, index) =>
          index === proposalIndex ? { ...proposal, voteCount: proposal.voteCount + 1 } : proposal,
        ),
      };
    }),

    tallyVotes: assign(({ context }) => ({
      winningProposalIndex: computeWinner(context.proposals),
    })),
  },
}).createMachine({
  id: 'round',
  context: ({ input }) => ({
    roundId: input.roundId,
    name: input.name,
    phase: WorkflowPhases.ADMITTING_PARTICIPANTS,
    limits: input.limits,
    participants: {},
    proposals: [],
    winningProposalIndex: null,
  }),
  initial: 'admittingParticipants',
  states: {
    admittingParticipants: {
      on: {
        [Events.Admin.ADMIT_PARTICIPANT]: { guard: 'canAdmit', actions: 'admitParticipant' },
        [Events.Admin.OPEN_PROPOSAL_SUBMISSION]: { target: 'proposalSubmissionOpen', actions: 'seedSentinel' },
      },
    },
    proposalSubmissionOpen: {
      entry: { type: 'enterPhase', params: { phase: WorkflowPhases.PROPOSAL_SUBMISSION_OPEN } },
      on: {
        [Events.Participant.SUBMIT_PROPOSAL]: { guard: 'canSubmit', actions: 'appendProposal' },
        [Events.Admin.CLOSE_PROPOSAL_SUBMISSION]: { target: 'proposalSubmissionClosed' },
      },
    },
    proposalSubmissionClosed: {
      entry: { type: 'enterPhase', params: { phase: WorkflowPhases.PROPOSAL_SUBMISSION_CLOSED } },
      on: {
        [Events.Admin.OPEN_VOTING]: { target: 'votingOpen' },
      },
    },
    votingOpen: {
      entry: { type: 'enterPhase', params: { phase: WorkflowPhases.VOTING_OPEN } },
      on: {
        [Events.Participant.VOTE]: { guard: 'canVote', actions: 'recordVote' },
        [Events.Admin.CLOSE_VOTING]: { target: 'votingClosed' },
      },
    },
    votingClosed: {
      entry: { type: 'enterPhase', params: { phase: WorkflowPhases.VOTING_CLOSED } },
      on: {
        [Events.Admin.TALLY]: { target: 'tallied', actions: 'tallyVotes' },
      },
    },
    tallied: {
      entry: { type: 'enterPhase', params: { phase: WorkflowPhases.TALLIED } },
      type: 'final',
    },
  },
});
