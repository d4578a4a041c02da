import { z } from 'zod';
import type { Snapshot } from 'xstate';
import { IdentitySchema, RoundLimitsSchema } from '@quorum/shared-types';

const SNAPSHOT_STATUSES = ['active', 'done', 'error', 'stopped'];

// Contents are checked by xstate when the actor is restored
const RoundSnapshotSchema = z.custom<Snapshot<unknown>>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    'status' in value &&
    SNAPSHOT_STATUSES.includes(String(value.status)),
  { message: 'Expected a persisted round snapshot' },
);

/**
 * Shape of `Ballot.getPersistedState()`. Round 0 always exists, so a
 * persisted ballot has at least one round and a non-negative active pointer.
 */
export const PersistedBallotSchema = z.object({
  authority: IdentitySchema.nullable(),
  limits: RoundLimitsSchema,
  activeRoundId: z.number().int().nonnegative(),
  rounds: z.array(RoundSnapshotSchema).min(1),
});

export type PersistedBallot = z.infer<typeof PersistedBallotSchema>;
