export const Config = {
  round: {
    /** Includes the sentinel at index 0 */
    maxProposals: 1000,
    maxProposalLength: 999,
    sentinelText: 'GENESIS',
    defaultNamePrefix: 'Session',
  },
  auth: {
    tokenExpiry: '30d',
  },
  log: {
    defaultLevel: 'info',
    defaultDataset: 'quorum',
  },
} as const;

/** "Session 1" for round 0, "Session 2" for round 1, ... */
export function defaultRoundName(roundId: number): string {
  return `${Config.round.defaultNamePrefix} ${roundId + 1}`;
}
