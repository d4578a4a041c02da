import { z } from "zod";
import { NotificationTypes, PHASE_ORDER } from "./events";

export * from "./events";
export * from "./config";
export * from "./workflow";

// --- Workflow ---

export const WorkflowPhaseSchema = z.enum(PHASE_ORDER);
export type WorkflowPhase = z.infer<typeof WorkflowPhaseSchema>;

// --- Identities & Inputs ---

export const IdentitySchema = z.string().min(1);

export const RoundNameSchema = z.string().trim().optional();

export const ProposalIndexSchema = z.number().int().nonnegative();

// --- Round State (Engine Layer) ---

export const ParticipantSchema = z.object({
  admitted: z.boolean(),
  hasVoted: z.boolean(),
  votedProposalIndex: ProposalIndexSchema.nullable(),
});

export const ProposalSchema = z.object({
  text: z.string().min(1),
  voteCount: z.number().int().nonnegative(),
});

export const RoundLimitsSchema = z.object({
  maxProposals: z.number().int().positive(),
  maxProposalLength: z.number().int().positive(),
});

export const RoundViewSchema = z.object({
  id: z.number().int().nonnegative(),
  name: z.string(),
  phase: WorkflowPhaseSchema,
  proposalCount: z.number().int().nonnegative(),
  winningProposalIndex: ProposalIndexSchema.nullable(),
});

export type Participant = z.infer<typeof ParticipantSchema>;
export type Proposal = z.infer<typeof ProposalSchema>;
export type RoundLimits = z.infer<typeof RoundLimitsSchema>;
export type RoundView = z.infer<typeof RoundViewSchema>;

export const EMPTY_PARTICIPANT: Participant = {
  admitted: false,
  hasVoted: false,
  votedProposalIndex: null,
};

// --- Rejections ---

export const BallotRejectionSchema = z.enum([
  // Authorization
  "UNAUTHORIZED",
  "INVALID_AUTHORITY",
  // Phase sequencing
  "ADMISSION_NOT_OPEN",
  "PROPOSAL_SUBMISSION_NOT_OPEN",
  "PROPOSAL_SUBMISSION_NOT_CLOSED",
  "VOTING_NOT_OPEN",
  "VOTING_NOT_CLOSED",
  "ROUND_NOT_FINISHED",
  // Identity / state conflicts
  "ALREADY_ADMITTED",
  "ALREADY_VOTED",
  "NOT_A_PARTICIPANT",
  // Input validation
  "INVALID_IDENTITY",
  "EMPTY_PROPOSAL_TEXT",
  "PROPOSAL_TEXT_TOO_LONG",
  "TOO_MANY_PROPOSALS",
  // Lookups
  "PROPOSAL_NOT_FOUND",
  "PROPOSAL_INDEX_OUT_OF_RANGE",
  "ROUND_NOT_FOUND",
]);
export type BallotRejection = z.infer<typeof BallotRejectionSchema>;

// --- Notifications ---

export const NotificationSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal(NotificationTypes.ROUND_CREATED),
    roundId: z.number().int(),
    name: z.string(),
  }),
  z.object({
    type: z.literal(NotificationTypes.PARTICIPANT_ADMITTED),
    roundId: z.number().int(),
    identity: z.string(),
  }),
  z.object({
    type: z.literal(NotificationTypes.PHASE_CHANGED),
    roundId: z.number().int(),
    from: WorkflowPhaseSchema,
    to: WorkflowPhaseSchema,
  }),
  z.object({
    type: z.literal(NotificationTypes.PROPOSAL_SUBMITTED),
    roundId: z.number().int(),
    index: ProposalIndexSchema,
  }),
  z.object({
    type: z.literal(NotificationTypes.VOTE_CAST),
    roundId: z.number().int(),
    identity: z.string(),
    index: ProposalIndexSchema,
  }),
  z.object({
    type: z.literal(NotificationTypes.AUTHORITY_TRANSFERRED),
    previous: z.string().nullable(),
    next: z.string().nullable(),
  }),
]);

export type Notification = z.infer<typeof NotificationSchema>;

// --- Logging ---

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;
