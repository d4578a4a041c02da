import { z } from 'zod';
import { Config, IdentitySchema, LogLevelSchema } from '@quorum/shared-types';

export const EnvSchema = z.object({
  BALLOT_AUTHORITY: IdentitySchema,
  AUTH_SECRET: z.string().min(1),
  LOG_LEVEL: LogLevelSchema.default(Config.log.defaultLevel),
  AXIOM_TOKEN: z.string().optional(),
  AXIOM_ORG_ID: z.string().optional(),
  AXIOM_DATASET: z.string().default(Config.log.defaultDataset),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  return EnvSchema.parse(source);
}
