import { describe, test, expect } from 'vitest';
import { createActor } from 'xstate';
import { Config, Events, WorkflowPhases } from '@quorum/shared-types';
import { roundMachine } from '../round-machine';

const LIMITS = { maxProposals: 4, maxProposalLength: 10 };

function startRound() {
  const actor = createActor(roundMachine, { input: { roundId: 3, name: 'Test', limits: LIMITS } });
  actor.start();
  return actor;
}

function toVotingOpen(actor: ReturnType<typeof startRound>) {
  actor.send({ type: Events.Admin.ADMIT_PARTICIPANT, identity: 'alice' });
  actor.send({ type: Events.Admin.ADMIT_PARTICIPANT, identity: 'bob' });
  actor.send({ type: Events.Admin.OPEN_PROPOSAL_SUBMISSION });
  actor.send({ type: Events.Participant.SUBMIT_PROPOSAL, senderId: 'alice', text: 'tea' });
  actor.send({ type: Events.Admin.CLOSE_PROPOSAL_SUBMISSION });
  actor.send({ type: Events.Admin.OPEN_VOTING });
}

describe('roundMachine', () => {
  test('starts admitting participants with empty registries', () => {
    const { context, value } = startRound().getSnapshot();

    expect(value).toBe('admittingParticipants');
    expect(context).toEqual({
      roundId: 3,
      name: 'Test',
      phase: WorkflowPhases.ADMITTING_PARTICIPANTS,
      limits: LIMITS,
      participants: {},
      proposals: [],
      winningProposalIndex: null,
    });
  });

  test('opening submission seeds the sentinel at index 0', () => {
    const actor = startRound();
    actor.send({ type: Events.Admin.OPEN_PROPOSAL_SUBMISSION });

    const { context } = actor.getSnapshot();
    expect(context.phase).toBe(WorkflowPhases.PROPOSAL_SUBMISSION_OPEN);
    expect(context.proposals).toEqual([{ text: Config.round.sentinelText, voteCount: 0 }]);
  });

  test('phase events outside their predecessor phase are ignored', () => {
    const actor = startRound();
    actor.send({ type: Events.Admin.OPEN_VOTING });
    actor.send({ type: Events.Admin.TALLY });

    expect(actor.getSnapshot().context.phase).toBe(WorkflowPhases.ADMITTING_PARTICIPANTS);
  });

  test('a second admission of the same identity changes nothing', () => {
    const actor = startRound();
    actor.send({ type: Events.Admin.ADMIT_PARTICIPANT, identity: 'alice' });
    const before = actor.getSnapshot().context.participants;

    expect(actor.getSnapshot().can({ type: Events.Admin.ADMIT_PARTICIPANT, identity: 'alice' })).toBe(false);
    actor.send({ type: Events.Admin.ADMIT_PARTICIPANT, identity: 'alice' });
    expect(actor.getSnapshot().context.participants).toBe(before);
  });

  test('submissions from strangers and over-long texts are ignored', () => {
    const actor = startRound();
    actor.send({ type: Events.Admin.ADMIT_PARTICIPANT, identity: 'alice' });
    actor.send({ type: Events.Admin.OPEN_PROPOSAL_SUBMISSION });

    actor.send({ type: Events.Participant.SUBMIT_PROPOSAL, senderId: 'mallory', text: 'tea' });
    actor.send({ type: Events.Participant.SUBMIT_PROPOSAL, senderId: 'alice', text: 'x'.repeat(11) });
    actor.send({ type: Events.Participant.SUBMIT_PROPOSAL, senderId: 'alice', text: '' });
    expect(actor.getSnapshot().context.proposals).toHaveLength(1);

    actor.send({ type: Events.Participant.SUBMIT_PROPOSAL, senderId: 'alice', text: 'x'.repeat(10) });
    expect(actor.getSnapshot().context.proposals).toHaveLength(2);
  });

  test('the proposal limit includes the sentinel', () => {
    const actor = startRound();
    actor.send({ type: Events.Admin.ADMIT_PARTICIPANT, identity: 'alice' });
    actor.send({ type: Events.Admin.OPEN_PROPOSAL_SUBMISSION });
    for (const text of ['a', 'b', 'c', 'd']) {
      actor.send({ type: Events.Participant.SUBMIT_PROPOSAL, senderId: 'alice', text });
    }

    expect(actor.getSnapshot().context.proposals.map((p) => p.text)).toEqual([
      Config.round.sentinelText,
      'a',
      'b',
      'c',
    ]);
  });

  test('a vote is recorded once and counted on its proposal', () => {
    const actor = startRound();
    toVotingOpen(actor);

    actor.send({ type: Events.Participant.VOTE, senderId: 'alice', proposalIndex: 1 });
    actor.send({ type: Events.Participant.VOTE, senderId: 'alice', proposalIndex: 0 });
    actor.send({ type: Events.Participant.VOTE, senderId: 'bob', proposalIndex: 5 });

    const { context } = actor.getSnapshot();
    expect(context.participants.alice).toEqual({ admitted: true, hasVoted: true, votedProposalIndex: 1 });
    expect(context.participants.bob).toEqual({ admitted: true, hasVoted: false, votedProposalIndex: null });
    expect(context.proposals.map((p) => p.voteCount)).toEqual([0, 1]);
  });

  test('tally stores the winner and reaches the final state', () => {
    const actor = startRound();
    toVotingOpen(actor);
    actor.send({ type: Events.Participant.VOTE, senderId: 'bob', proposalIndex: 1 });
    actor.send({ type: Events.Admin.CLOSE_VOTING });
    actor.send({ type: Events.Admin.TALLY });

    const snapshot = actor.getSnapshot();
    expect(snapshot.status).toBe('done');
    expect(snapshot.context.phase).toBe(WorkflowPhases.TALLIED);
    expect(snapshot.context.winningProposalIndex).toBe(1);
  });

  test('a persisted snapshot restores to the same context', () => {
    const actor = startRound();
    toVotingOpen(actor);
    const persisted = actor.getPersistedSnapshot();

    const restored = createActor(roundMachine, { snapshot: persisted });
    restored.start();

    expect(restored.getSnapshot().value).toBe('votingOpen');
    expect(restored.getSnapshot().context).toEqual(actor.getSnapshot().context);
  });
});
