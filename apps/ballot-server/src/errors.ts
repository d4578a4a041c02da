import type { BallotRejection } from '@quorum/shared-types';

const MESSAGES: Record<BallotRejection, string> = {
  UNAUTHORIZED: 'Caller is not the authority',
  INVALID_AUTHORITY: 'Authority identity must not be empty',
  ADMISSION_NOT_OPEN: 'Participant admission is closed for this round',
  PROPOSAL_SUBMISSION_NOT_OPEN: 'Proposal submission is not open',
  PROPOSAL_SUBMISSION_NOT_CLOSED: 'Proposal submission has not been closed',
  VOTING_NOT_OPEN: 'Voting is not open',
  VOTING_NOT_CLOSED: 'Voting has not been closed',
  ROUND_NOT_FINISHED: 'The active round has not been tallied',
  ALREADY_ADMITTED: 'Identity is already admitted to this round',
  ALREADY_VOTED: 'Participant has already voted in this round',
  NOT_A_PARTICIPANT: 'Caller is not an admitted participant of this round',
  INVALID_IDENTITY: 'Identity must not be empty',
  EMPTY_PROPOSAL_TEXT: 'Proposal text must not be empty',
  PROPOSAL_TEXT_TOO_LONG: 'Proposal text exceeds the maximum length',
  TOO_MANY_PROPOSALS: 'The round already holds the maximum number of proposals',
  PROPOSAL_NOT_FOUND: 'No proposal at that index',
  PROPOSAL_INDEX_OUT_OF_RANGE: 'Proposal index is out of range',
  ROUND_NOT_FOUND: 'No round with that id',
};

/**
 * Typed rejection of a ballot operation. Thrown before any state changes;
 * the caller must fix the precondition and call again.
 */
export class BallotError extends Error {
  readonly code: BallotRejection;
  readonly details: Record<string, unknown>;

  constructor(code: BallotRejection, details: Record<string, unknown> = {}) {
    super(MESSAGES[code]);
    this.name = 'BallotError';
    this.code = code;
    this.details = details;
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

export function isBallotError(err: unknown): err is BallotError {
  return err instanceof BallotError;
}
