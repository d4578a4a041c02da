/**
 * Names used across the ballot engine: round actor events (ADMIN.* from the
 * authority, PARTICIPANT.* from admitted callers), notification types, the
 * six workflow phases and the log components.
 *
 * Phases are also fed to `z.enum`, so they stay plain string literals.
 */

// --- EVENT TYPE CONSTANTS ---

export const Events = {
  Admin: {
    ADMIT_PARTICIPANT: 'ADMIN.ADMIT_PARTICIPANT',
    OPEN_PROPOSAL_SUBMISSION: 'ADMIN.OPEN_PROPOSAL_SUBMISSION',
    CLOSE_PROPOSAL_SUBMISSION: 'ADMIN.CLOSE_PROPOSAL_SUBMISSION',
    OPEN_VOTING: 'ADMIN.OPEN_VOTING',
    CLOSE_VOTING: 'ADMIN.CLOSE_VOTING',
    TALLY: 'ADMIN.TALLY',
  },
  Participant: {
    SUBMIT_PROPOSAL: 'PARTICIPANT.SUBMIT_PROPOSAL',
    VOTE: 'PARTICIPANT.VOTE',
  },
} as const;

// --- NOTIFICATION TYPE CONSTANTS ---

export const NotificationTypes = {
  ROUND_CREATED: 'ROUND_CREATED',
  PARTICIPANT_ADMITTED: 'PARTICIPANT_ADMITTED',
  PHASE_CHANGED: 'PHASE_CHANGED',
  PROPOSAL_SUBMITTED: 'PROPOSAL_SUBMITTED',
  VOTE_CAST: 'VOTE_CAST',
  AUTHORITY_TRANSFERRED: 'AUTHORITY_TRANSFERRED',
} as const;

// --- PHASE CONSTANTS ---

export const WorkflowPhases = {
  ADMITTING_PARTICIPANTS: 'ADMITTING_PARTICIPANTS',
  PROPOSAL_SUBMISSION_OPEN: 'PROPOSAL_SUBMISSION_OPEN',
  PROPOSAL_SUBMISSION_CLOSED: 'PROPOSAL_SUBMISSION_CLOSED',
  VOTING_OPEN: 'VOTING_OPEN',
  VOTING_CLOSED: 'VOTING_CLOSED',
  TALLIED: 'TALLIED',
} as const;

/** Phases in workflow order. A round only ever moves one step to the right. */
export const PHASE_ORDER = [
  WorkflowPhases.ADMITTING_PARTICIPANTS,
  WorkflowPhases.PROPOSAL_SUBMISSION_OPEN,
  WorkflowPhases.PROPOSAL_SUBMISSION_CLOSED,
  WorkflowPhases.VOTING_OPEN,
  WorkflowPhases.VOTING_CLOSED,
  WorkflowPhases.TALLIED,
] as const;

// --- COMPONENT NAMES (log `component` field) ---

export const Components = {
  BALLOT: 'BALLOT',
  REGISTRY: 'REGISTRY',
  SIMULATOR: 'SIMULATOR',
} as const;
