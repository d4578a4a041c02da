import type { Proposal } from '@quorum/shared-types';

/**
 * Index of the most-voted proposal.
 *
 * Single pass in index order; a proposal only takes the lead with strictly
 * more votes, so ties stay with the lowest index. With no votes at all the
 * sentinel at index 0 wins.
 */
export function computeWinner(proposals: readonly Proposal[]): number {
  let winner = 0;
  let maxVotes = 0;
  proposals.forEach((proposal, index) => {
    if (proposal.voteCount > maxVotes) {
      maxVotes = proposal.voteCount;
      winner = index;
    }
  });
  return winner;
}

