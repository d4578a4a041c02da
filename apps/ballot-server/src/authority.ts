import { IdentitySchema } from '@quorum/shared-types';
import { BallotError } from './errors';

export interface AuthorityChange {
  previous: string | null;
  next: string | null;
}

/**
 * Holds the single authority identity. `null` once renounced, after which
 * every gated operation is rejected.
 */
export class AuthorityGate {
  private current: string | null;

  constructor(authority: string | null) {
    this.current = authority;
  }

  get authority(): string | null {
    return this.current;
  }

  isAuthority(caller: string): boolean {
    return this.current !== null && caller === this.current;
  }

  require(caller: string): void {
    if (!this.isAuthority(caller)) {
      throw new BallotError('UNAUTHORIZED', { caller });
    }
  }

  transfer(caller: string, next: string): AuthorityChange {
    this.require(caller);
    if (!IdentitySchema.safeParse(next).success) {
      throw new BallotError('INVALID_AUTHORITY', { next });
    }
    const previous = this.current;
    this.current = next;
    return { previous, next };
  }

  renounce(caller: string): AuthorityChange {
    this.require(caller);
    const previous = this.current;
    this.current = null;
    return { previous, next: null };
  }
}
