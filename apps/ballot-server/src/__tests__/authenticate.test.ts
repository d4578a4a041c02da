import { describe, test, expect } from 'vitest';
import { signCallerToken } from '@quorum/auth';
import { authenticateCaller } from '../authenticate';
import { BallotError } from '../errors';

const SECRET = 'test-secret';

describe('authenticateCaller', () => {
  test('resolves a valid token to its identity', async () => {
    const token = await signCallerToken('alice', SECRET);
    await expect(authenticateCaller(token, SECRET)).resolves.toBe('alice');
  });

  test('rejects a forged token as UNAUTHORIZED', async () => {
    const token = await signCallerToken('alice', 'other-secret');
    await expect(authenticateCaller(token, SECRET)).rejects.toBeInstanceOf(BallotError);
    await expect(authenticateCaller(token, SECRET)).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
  });

  test('rejects garbage as UNAUTHORIZED', async () => {
    await expect(authenticateCaller('not-a-token', SECRET)).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
  });
});
