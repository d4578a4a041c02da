import { z } from 'zod';
import { Config, IdentitySchema, RoundNameSchema } from '@quorum/shared-types';

export const BallotOptionsSchema = z.object({
  authority: IdentitySchema,
  firstRoundName: RoundNameSchema,
  limits: z
    .object({
      maxProposals: z.number().int().positive().default(Config.round.maxProposals),
      maxProposalLength: z.number().int().positive().default(Config.round.maxProposalLength),
    })
    .default({}),
});

export type BallotOptionsInput = z.input<typeof BallotOptionsSchema>;
export type BallotOptions = z.output<typeof BallotOptionsSchema>;
