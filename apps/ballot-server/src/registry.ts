import { createActor, type Actor, type Snapshot } from 'xstate';
import type { RoundLimits } from '@quorum/shared-types';
import { Components, WorkflowPhases, defaultRoundName } from '@quorum/shared-types';
import { log } from '@quorum/logger';
import { roundMachine } from './machines/round-machine';
import type { RoundContext, RoundEvent } from './machines/_contract';
import { BallotError } from './errors';

export type RoundActor = Actor<typeof roundMachine>;

export interface PersistedRounds {
  activeRoundId: number;
  rounds: Snapshot<unknown>[];
}

/**
 * Owns every round actor, indexed by round id, and the active-round pointer.
 * Rounds are never removed; only the active round receives events.
 */
export class RoundRegistry {
  private rounds: RoundActor[] = [];
  private activeRoundId = -1;

  constructor(private readonly limits: RoundLimits) {}

  static restore(limits: RoundLimits, persisted: PersistedRounds): RoundRegistry {
    if (persisted.rounds.length === 0) {
      throw new Error('Persisted state has no rounds');
    }
    const registry = new RoundRegistry(limits);
    persisted.rounds.forEach((snapshot, position) => {
      const actor = createActor(roundMachine, { snapshot });
      actor.start();
      if (actor.getSnapshot().context.roundId !== position) {
        throw new Error(`Persisted round at position ${position} has id ${actor.getSnapshot().context.roundId}`);
      }
      registry.rounds.push(actor);
    });
    if (persisted.activeRoundId !== registry.rounds.length - 1) {
      throw new Error(`Persisted active round ${persisted.activeRoundId} is not the latest round`);
    }
    registry.activeRoundId = persisted.activeRoundId;
    log('info', Components.REGISTRY, 'rounds.restored', { totalRounds: registry.totalRounds });
    return registry;
  }

  get currentRoundId(): number {
    return this.activeRoundId;
  }

  get totalRounds(): number {
    return this.rounds.length;
  }

  createInitialRound(name?: string): RoundContext {
    if (this.rounds.length > 0) {
      throw new Error('Initial round already exists');
    }
    return this.spawnRound(name);
  }

  createNextRound(name?: string): RoundContext {
    const active = this.activeContext();
    if (active.phase !== WorkflowPhases.TALLIED) {
      throw new BallotError('ROUND_NOT_FINISHED', { roundId: active.roundId, phase: active.phase });
    }
    return this.spawnRound(name);
  }

  activeContext(): RoundContext {
    return this.activeActor().getSnapshot().context;
  }

  context(roundId: number): RoundContext {
    const actor = Number.isInteger(roundId) ? this.rounds[roundId] : undefined;
    if (!actor) {
      throw new BallotError('ROUND_NOT_FOUND', { roundId });
    }
    return actor.getSnapshot().context;
  }

  /**
   * Apply an event to the active round. Callers check preconditions first;
   * an event the machine refuses here means those checks and the machine
   * guards disagree.
   */
  send(event: RoundEvent): RoundContext {
    const actor = this.activeActor();
    const snapshot = actor.getSnapshot();
    if (!snapshot.can(event)) {
      throw new Error(`Round ${snapshot.context.roundId} refused ${event.type} in ${snapshot.context.phase}`);
    }
    actor.send(event);
    return actor.getSnapshot().context;
  }

  getPersistedState(): PersistedRounds {
    return {
      activeRoundId: this.activeRoundId,
      rounds: this.rounds.map((actor) => actor.getPersistedSnapshot()),
    };
  }

  private activeActor(): RoundActor {
    const actor = this.rounds[this.activeRoundId];
    if (!actor) {
      throw new Error('No active round');
    }
    return actor;
  }

  private spawnRound(name?: string): RoundContext {
    const roundId = this.rounds.length;
    const actor = createActor(roundMachine, {
      input: { roundId, name: name || defaultRoundName(roundId), limits: this.limits },
    });
    actor.start();
    this.rounds.push(actor);
    this.activeRoundId = roundId;

    const context = actor.getSnapshot().context;
    log('info', Components.REGISTRY, 'round.created', { roundId, name: context.name });
    return context;
  }
}
