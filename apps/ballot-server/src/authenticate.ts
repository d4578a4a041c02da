import { verifyCallerToken } from '@quorum/auth';
import { BallotError } from './errors';

/** Resolve a caller token to the identity every ballot operation takes. */
export async function authenticateCaller(token: string, secret: string): Promise<string> {
  try {
    const { sub } = await verifyCallerToken(token, secret);
    return sub;
  } catch (err) {
    throw new BallotError('UNAUTHORIZED', {
      caller: null,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
}
