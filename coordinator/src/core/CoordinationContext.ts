import type { CoordinatorSnapshot, Identity } from '../types';
import { KeyedMutex } from '../utils/KeyedMutex';
import { LogicalClock } from '../utils/LogicalClock';
import { ContributionJournal } from '../journal/ContributionJournal';
import { OwnerAuthorityPolicy, type AuthorityPolicy } from './AuthorityPolicy';
import { ContributorLedger } from './ContributorLedger';
import { DatasetRegistry } from './DatasetRegistry';
import { ModelVersionLedger } from './ModelVersionLedger';
import { PendingGradientLedger } from './PendingGradientLedger';
import { SessionStateMachine } from './SessionStateMachine';

export interface ContextOptions {
  adminIdentity: Identity;
  contributionReward: number;
  policy?: AuthorityPolicy;
}

/**
 * Process-owned coordination state. Everything that mutates ledgers receives
 * this object explicitly; there are no module-level registries.
 */
export class CoordinationContext {
  readonly clock = new LogicalClock();
  readonly locks = new KeyedMutex();
  readonly journal = new ContributionJournal();
  readonly policy: AuthorityPolicy;
  readonly models: ModelVersionLedger;
  readonly pending: PendingGradientLedger;
  readonly contributors: ContributorLedger;
  readonly sessions: SessionStateMachine;
  readonly datasets: DatasetRegistry;
  readonly contributionReward: number;

  constructor(options: ContextOptions) {
    this.policy = options.policy ?? new OwnerAuthorityPolicy(options.adminIdentity);
    this.contributionReward = options.contributionReward;
    this.models = new ModelVersionLedger();
    this.pending = new PendingGradientLedger(this.models, this.clock);
    this.contributors = new ContributorLedger(this.clock, this.policy);
    this.datasets = new DatasetRegistry();
    this.sessions = new SessionStateMachine(this.models, this.clock, this.datasets);
  }

  snapshot(): CoordinatorSnapshot {
    return {
      clock: this.clock.now(),
      models: this.models.snapshot(),
      pending: this.pending.snapshot(),
      contributors: this.contributors.snapshot(),
      sessions: this.sessions.snapshot(),
      datasets: this.datasets.snapshot(),
      journal: this.journal.snapshot()
    };
  }

  restore(snapshot: CoordinatorSnapshot): void {
    this.journal.restore(snapshot.journal);
    this.models.restore(snapshot.models);
    this.pending.restore(snapshot.pending);
    this.contributors.restore(snapshot.contributors);
    this.sessions.restore(snapshot.sessions);
    this.datasets.restore(snapshot.datasets ?? []);
    this.clock.restore(snapshot.clock);
  }
}
