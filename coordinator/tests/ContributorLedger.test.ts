import { describe, it, expect, beforeEach } from 'vitest';
import { ContributorLedger } from '../src/core/ContributorLedger';
import { OwnerAuthorityPolicy } from '../src/core/AuthorityPolicy';
import { LogicalClock } from '../src/utils/LogicalClock';
import { InvalidAmountError, NotAuthorizedError, UnknownContributorError } from '../src/utils/errors';

describe('ContributorLedger', () => {
  let ledger: ContributorLedger;

  beforeEach(() => {
    ledger = new ContributorLedger(new LogicalClock(), new OwnerAuthorityPolicy('admin'));
  });

  describe('register', () => {
    it('should be idempotent', () => {
      const first = ledger.register('alice');
      const second = ledger.register('alice');

      expect(first.created).toBe(true);
      expect(first.contributor).toEqual({
        identity: 'alice',
        reputation: 0,
        contributions: 0,
        registeredAt: 1,
        registrationOrder: 1
      });
      expect(second.created).toBe(false);
      expect(second.contributor.registeredAt).toBe(1);
      expect(ledger.size).toBe(1);
    });
  });

  describe('awardReputation', () => {
    it('should add reputation and register unknown identities', () => {
      const alice = ledger.awardReputation('admin', 'alice', 5);

      expect(alice).toMatchObject({ identity: 'alice', reputation: 5, contributions: 0 });
      expect(ledger.awardReputation('admin', 'alice', 3).reputation).toBe(8);
    });

    it('should reject callers other than the admin', () => {
      expect(() => ledger.awardReputation('alice', 'bob', 5)).toThrow(NotAuthorizedError);
      expect(ledger.has('bob')).toBe(false);
    });

    it.each([0, -3, 1.5])('should reject an amount of %s', (amount) => {
      expect(() => ledger.awardReputation('admin', 'alice', amount)).toThrow(InvalidAmountError);
      expect(ledger.has('alice')).toBe(false);
    });
  });

  describe('recordContribution', () => {
    it('should refuse unregistered identities', () => {
      expect(() => ledger.recordContribution('ghost', 10)).toThrow(UnknownContributorError);
    });

    it('should count the contribution and add the reward', () => {
      ledger.register('alice');

      const alice = ledger.recordContribution('alice', 10);

      expect(alice.contributions).toBe(1);
      expect(alice.reputation).toBe(10);
      expect(alice.lastContributionAt).toBe(2);
    });

    it('should reject a negative reward', () => {
      ledger.register('alice');

      expect(() => ledger.recordContribution('alice', -1)).toThrow(InvalidAmountError);
      expect(ledger.get('alice')?.contributions).toBe(0);
    });
  });

  describe('leaderboard', () => {
    it('should order by reputation and break ties by registration order', () => {
      ledger.register('carol');
      ledger.register('dave');
      ledger.register('erin');
      ledger.awardReputation('admin', 'erin', 5);
      ledger.awardReputation('admin', 'dave', 5);
      ledger.awardReputation('admin', 'carol', 3);

      expect(ledger.leaderboard().map((c) => c.identity)).toEqual(['dave', 'erin', 'carol']);
      expect(ledger.leaderboard(2).map((c) => c.identity)).toEqual(['dave', 'erin']);
      expect(ledger.rankOf('carol')).toBe(3);
      expect(ledger.rankOf('nobody')).toBe(0);
    });
  });

  describe('snapshot', () => {
    it('should keep registration order after restore', () => {
      ledger.register('alice');
      ledger.register('bob');
      const restored = new ContributorLedger(new LogicalClock(), new OwnerAuthorityPolicy('admin'));
      restored.restore(ledger.snapshot());

      expect(restored.register('carol').contributor.registrationOrder).toBe(3);
      expect(restored.leaderboard().map((c) => c.identity)).toEqual(['alice', 'bob', 'carol']);
    });
  });
});
