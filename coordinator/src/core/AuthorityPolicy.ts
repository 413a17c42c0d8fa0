import type { Identity, ModelVersion } from '../types';

/**
 * Capability checks used by the ledgers. Swap the implementation to move
 * from plain identity equality to multi-sig or vote-based authority without
 * touching ledger logic.
 */
export interface AuthorityPolicy {
  canFinalize(caller: Identity, model: ModelVersion): boolean;
  canAdvance(caller: Identity, model: ModelVersion): boolean;
  isAdmin(caller: Identity): boolean;
}

export class OwnerAuthorityPolicy implements AuthorityPolicy {
  constructor(private readonly adminIdentity: Identity) {}

  canFinalize(caller: Identity, model: ModelVersion): boolean {
    return caller === model.owner;
  }

  canAdvance(caller: Identity, model: ModelVersion): boolean {
    return caller === model.owner;
  }

  isAdmin(caller: Identity): boolean {
    return caller === this.adminIdentity;
  }
}
