/**
 * Ballot
 *
 * Public operation surface of the engine. Every mutating call runs, in
 * order: the authority gate (where the operation is gated), the input and
 * phase checks against the active round, the event to the round actor, and
 * finally the notification. A call that throws has changed nothing.
 */
import type {
  BallotRejection,
  Notification,
  Participant,
  Proposal,
  RoundLimits,
  RoundView,
  WorkflowPhase,
} from '@quorum/shared-types';
import {
  Components,
  Events,
  IdentitySchema,
  NotificationTypes,
  PHASE_TRANSITIONS,
  RoundNameSchema,
  type TransitionEventType,
} from '@quorum/shared-types';
import { log } from '@quorum/logger';
import { AuthorityGate } from './authority';
import { BallotError, isBallotError } from './errors';
import { NotificationHub, type NotificationListener } from './notifications';
import { PersistedBallotSchema, type PersistedBallot } from './persistence';
import { BallotOptionsSchema, type BallotOptionsInput } from './options';
import { projectParticipant, projectProposal, projectRound } from './projections';
import { RoundRegistry } from './registry';
import {
  admissionRejection,
  isProposalIndex,
  submissionRejection,
  transitionRejection,
  voteRejection,
} from './machines/actions/round-rules';

export class Ballot {
  private readonly hub = new NotificationHub();

  private constructor(
    private readonly gate: AuthorityGate,
    private readonly registry: RoundRegistry,
    private readonly limits: RoundLimits,
  ) {}

  /**
   * Validate options and create round 0. A listener passed here is
   * subscribed before round 0 exists, so it sees the first ROUND_CREATED.
   */
  static create(options: BallotOptionsInput, listener?: NotificationListener): Ballot {
    const { authority, firstRoundName, limits } = BallotOptionsSchema.parse(options);
    const ballot = new Ballot(new AuthorityGate(authority), new RoundRegistry(limits), limits);
    if (listener) ballot.subscribe(listener);

    const round = ballot.registry.createInitialRound(firstRoundName);
    log('info', Components.BALLOT, 'ballot.created', { authority, limits });
    ballot.publish({ type: NotificationTypes.ROUND_CREATED, roundId: round.roundId, name: round.name });
    return ballot;
  }

  /**
   * Rebuild a ballot from `getPersistedState()`, also after a trip through
   * JSON. A malformed state fails with a ZodError. Emits nothing.
   */
  static restore(state: PersistedBallot, listener?: NotificationListener): Ballot {
    const { authority, limits, activeRoundId, rounds } = PersistedBallotSchema.parse(state);
    const registry = RoundRegistry.restore(limits, { activeRoundId, rounds });
    const ballot = new Ballot(new AuthorityGate(authority), registry, limits);
    if (listener) ballot.subscribe(listener);
    return ballot;
  }

  subscribe(listener: NotificationListener): () => void {
    return this.hub.subscribe(listener);
  }

  // --- Rounds ---

  createNextRound(caller: string, name?: string): RoundView {
    return this.run('createNextRound', caller, () => {
      this.gate.require(caller);
      const round = this.registry.createNextRound(RoundNameSchema.parse(name));
      this.publish({ type: NotificationTypes.ROUND_CREATED, roundId: round.roundId, name: round.name });
      return projectRound(round);
    });
  }

  currentRoundView(): RoundView {
    return projectRound(this.registry.activeContext());
  }

  roundView(roundId: number): RoundView {
    return this.read('roundView', () => projectRound(this.registry.context(roundId)));
  }

  get currentRoundId(): number {
    return this.registry.currentRoundId;
  }

  get totalRounds(): number {
    return this.registry.totalRounds;
  }

  currentPhase(): WorkflowPhase {
    return this.registry.activeContext().phase;
  }

  /** `null` until the active round is tallied. */
  winningProposalIndex(): number | null {
    return this.registry.activeContext().winningProposalIndex;
  }

  // --- Participants ---

  admit(caller: string, identity: string): void {
    this.run('admit', caller, () => {
      this.gate.require(caller);
      if (!IdentitySchema.safeParse(identity).success) {
        throw new BallotError('INVALID_IDENTITY', { identity });
      }
      const round = this.registry.activeContext();
      this.reject(admissionRejection(round, identity), { roundId: round.roundId, identity });

      this.registry.send({ type: Events.Admin.ADMIT_PARTICIPANT, identity });
      this.publish({ type: NotificationTypes.PARTICIPANT_ADMITTED, roundId: round.roundId, identity });
    });
  }

  lookup(identity: string): Participant {
    return projectParticipant(this.registry.activeContext(), identity);
  }

  // --- Proposals ---

  submit(caller: string, text: string): number {
    return this.run('submit', caller, () => {
      const round = this.registry.activeContext();
      this.reject(submissionRejection(round, caller, text), {
        roundId: round.roundId,
        length: text.length,
        proposalCount: round.proposals.length,
      });

      const after = this.registry.send({ type: Events.Participant.SUBMIT_PROPOSAL, senderId: caller, text });
      const index = after.proposals.length - 1;
      this.publish({ type: NotificationTypes.PROPOSAL_SUBMITTED, roundId: round.roundId, index });
      return index;
    });
  }

  get(index: number): Proposal {
    return this.read('get', () => {
      const round = this.registry.activeContext();
      if (!isProposalIndex(round, index)) {
        throw new BallotError('PROPOSAL_INDEX_OUT_OF_RANGE', { index, proposalCount: round.proposals.length });
      }
      return projectProposal(round.proposals[index]);
    });
  }

  // --- Votes ---

  vote(caller: string, proposalIndex: number): void {
    this.run('vote', caller, () => {
      const round = this.registry.activeContext();
      this.reject(voteRejection(round, caller, proposalIndex), { roundId: round.roundId, proposalIndex });

      this.registry.send({ type: Events.Participant.VOTE, senderId: caller, proposalIndex });
      this.publish({
        type: NotificationTypes.VOTE_CAST,
        roundId: round.roundId,
        identity: caller,
        index: proposalIndex,
      });
    });
  }

  // --- Phase transitions ---

  openProposalSubmission(caller: string): void {
    this.advance(caller, Events.Admin.OPEN_PROPOSAL_SUBMISSION);
  }

  closeProposalSubmission(caller: string): void {
    this.advance(caller, Events.Admin.CLOSE_PROPOSAL_SUBMISSION);
  }

  openVoting(caller: string): void {
    this.advance(caller, Events.Admin.OPEN_VOTING);
  }

  closeVoting(caller: string): void {
    this.advance(caller, Events.Admin.CLOSE_VOTING);
  }

  tally(caller: string): number {
    this.advance(caller, Events.Admin.TALLY);
    const winner = this.registry.activeContext().winningProposalIndex;
    if (winner === null) {
      throw new Error('Tallied round has no winner');
    }
    return winner;
  }

  // --- Authority ---

  get authority(): string | null {
    return this.gate.authority;
  }

  transferAuthority(caller: string, next: string): void {
    this.run('transferAuthority', caller, () => {
      const change = this.gate.transfer(caller, next);
      this.publish({ type: NotificationTypes.AUTHORITY_TRANSFERRED, ...change });
    });
  }

  renounceAuthority(caller: string): void {
    this.run('renounceAuthority', caller, () => {
      const change = this.gate.renounce(caller);
      this.publish({ type: NotificationTypes.AUTHORITY_TRANSFERRED, ...change });
    });
  }

  // --- Persistence ---

  getPersistedState(): PersistedBallot {
    const { activeRoundId, rounds } = this.registry.getPersistedState();
    return { authority: this.gate.authority, limits: { ...this.limits }, activeRoundId, rounds };
  }

  // --- Internals ---

  private advance(caller: string, type: TransitionEventType): void {
    this.run(type, caller, () => {
      this.gate.require(caller);
      const round = this.registry.activeContext();
      this.reject(transitionRejection(round, type), { roundId: round.roundId, phase: round.phase });

      const after = this.registry.send({ type });
      this.publish({
        type: NotificationTypes.PHASE_CHANGED,
        roundId: round.roundId,
        from: PHASE_TRANSITIONS[type].from,
        to: after.phase,
      });
    });
  }

  private reject(code: BallotRejection | null, details: Record<string, unknown>): void {
    if (code !== null) {
      throw new BallotError(code, details);
    }
  }

  private publish(notification: Notification): void {
    this.hub.publish(notification);
  }

  private run<T>(operation: string, caller: string, fn: () => T): T {
    try {
      const result = fn();
      log('info', Components.BALLOT, operation, { caller, roundId: this.registry.currentRoundId });
      return result;
    } catch (err) {
      this.logRejection(operation, err, { caller });
      throw err;
    }
  }

  // Reads log only their rejections
  private read<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      this.logRejection(operation, err, {});
      throw err;
    }
  }

  private logRejection(operation: string, err: unknown, data: Record<string, unknown>): void {
    if (isBallotError(err)) {
      log('warn', Components.BALLOT, `${operation}.rejected`, { ...data, code: err.code, ...err.details });
    }
  }
}
