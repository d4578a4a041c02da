import type { Notification } from '@quorum/shared-types';
import { Components } from '@quorum/shared-types';
import { log } from '@quorum/logger';
import { signCallerToken } from '@quorum/auth';
import { Ballot, authenticateCaller } from '@quorum/ballot-server';

export interface ScenarioOptions {
  authority: string;
  secret: string;
  participants: string[];
  proposals: string[];
  /** participant -> proposal index */
  votes: Record<string, number>;
}

export interface ScenarioResult {
  winner: number;
  winningText: string;
  notifications: Notification[];
}

export const DEFAULT_SCENARIO: Omit<ScenarioOptions, 'authority' | 'secret'> = {
  participants: ['alice', 'bob', 'carol'],
  proposals: ['Tea', 'Coffee', 'Water'],
  votes: { alice: 1, bob: 1, carol: 2 },
};

/**
 * Drive one full round end to end. Every caller goes through a signed token,
 * the way a host would hand identities to the engine.
 */
export async function runScenario(options: ScenarioOptions): Promise<ScenarioResult> {
  const notifications: Notification[] = [];
  const signIn = async (identity: string) =>
    authenticateCaller(await signCallerToken(identity, options.secret), options.secret);

  const chair = await signIn(options.authority);
  const ballot = Ballot.create({ authority: chair }, (n) => notifications.push(n));

  for (const identity of options.participants) {
    ballot.admit(chair, identity);
  }
  ballot.openProposalSubmission(chair);

  for (const [i, text] of options.proposals.entries()) {
    const author = options.participants[i % options.participants.length];
    ballot.submit(await signIn(author), text);
  }
  ballot.closeProposalSubmission(chair);
  ballot.openVoting(chair);

  for (const [identity, index] of Object.entries(options.votes)) {
    ballot.vote(await signIn(identity), index);
  }
  ballot.closeVoting(chair);

  const winner = ballot.tally(chair);
  const winningText = ballot.get(winner).text;
  log('info', Components.SIMULATOR, 'scenario.complete', {
    winner,
    winningText,
    notifications: notifications.length,
  });
  return { winner, winningText, notifications };
}
