export { Ballot } from './ballot';
export { PersistedBallotSchema, type PersistedBallot } from './persistence';
export { BallotError, isBallotError } from './errors';
export { AuthorityGate, type AuthorityChange } from './authority';
export { NotificationHub, type NotificationListener } from './notifications';
export { RoundRegistry, type PersistedRounds, type RoundActor } from './registry';
export { BallotOptionsSchema, type BallotOptions, type BallotOptionsInput } from './options';
export { EnvSchema, loadEnv, type Env } from './env';
export { authenticateCaller } from './authenticate';
export { roundMachine } from './machines/round-machine';
export { computeWinner } from './machines/actions/round-tally';
export type { RoundContext, RoundEvent, RoundInput } from './machines/_contract';
