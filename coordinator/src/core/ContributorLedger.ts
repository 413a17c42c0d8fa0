import type { Contributor, Identity } from '../types';
import { InvalidAmountError, NotAuthorizedError, UnknownContributorError } from '../utils/errors';
import { LogicalClock } from '../utils/LogicalClock';
import type { AuthorityPolicy } from './AuthorityPolicy';

export interface RegisterResult {
  contributor: Contributor;
  created: boolean;
}

export class ContributorLedger {
  private contributors = new Map<Identity, Contributor>();
  private registrations = 0;

  constructor(
    private readonly clock: LogicalClock,
    private readonly policy: AuthorityPolicy
  ) {}

  /** Idempotent. */
  register(identity: Identity): RegisterResult {
    const existing = this.contributors.get(identity);
    if (existing) {
      return { contributor: { ...existing }, created: false };
    }

    this.registrations += 1;
    const contributor: Contributor = {
      identity,
      reputation: 0,
      contributions: 0,
      registeredAt: this.clock.tick(),
      registrationOrder: this.registrations
    };
    this.contributors.set(identity, contributor);

    return { contributor: { ...contributor }, created: true };
  }

  /**
   * Credits one accepted contribution. Reached from finalize or from an
   * admin-checked coordinator call; unregistered identities are refused.
   */
  recordContribution(identity: Identity, rewardAmount: number): Contributor {
    const contributor = this.contributors.get(identity);
    if (!contributor) {
      throw new UnknownContributorError(identity);
    }
    if (!Number.isInteger(rewardAmount) || rewardAmount < 0) {
      throw new InvalidAmountError(rewardAmount);
    }

    contributor.contributions += 1;
    contributor.lastContributionAt = this.clock.tick();
    contributor.reputation += rewardAmount;

    return { ...contributor };
  }

  /** Additive only; there is no slashing path. */
  awardReputation(admin: Identity, identity: Identity, amount: number): Contributor {
    if (!this.policy.isAdmin(admin)) {
      throw new NotAuthorizedError(`'${admin}' may not award reputation`);
    }
    if (!Number.isInteger(amount) || amount <= 0) {
      throw new InvalidAmountError(amount);
    }

    this.register(identity);
    const contributor = this.contributors.get(identity);
    if (!contributor) {
      throw new UnknownContributorError(identity);
    }
    contributor.reputation += amount;

    return { ...contributor };
  }

  get(identity: Identity): Contributor | undefined {
    const contributor = this.contributors.get(identity);
    return contributor ? { ...contributor } : undefined;
  }

  has(identity: Identity): boolean {
    return this.contributors.has(identity);
  }

  /** Reputation descending, ties by earliest registration. */
  leaderboard(limit?: number): Contributor[] {
    const ranked = [...this.contributors.values()]
      .sort((a, b) => b.reputation - a.reputation || a.registrationOrder - b.registrationOrder)
      .map((contributor) => ({ ...contributor }));
    return limit === undefined ? ranked : ranked.slice(0, limit);
  }

  rankOf(identity: Identity): number {
    return this.leaderboard().findIndex((contributor) => contributor.identity === identity) + 1;
  }

  get size(): number {
    return this.contributors.size;
  }

  snapshot(): Contributor[] {
    return [...this.contributors.values()]
      .sort((a, b) => a.registrationOrder - b.registrationOrder)
      .map((contributor) => ({ ...contributor }));
  }

  restore(contributors: Contributor[]): void {
    this.contributors.clear();
    this.registrations = 0;
    for (const contributor of contributors) {
      this.contributors.set(contributor.identity, { ...contributor });
      this.registrations = Math.max(this.registrations, contributor.registrationOrder);
    }
  }
}
