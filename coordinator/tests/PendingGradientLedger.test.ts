import { describe, it, expect, beforeEach } from 'vitest';
import { CoordinationContext } from '../src/core/CoordinationContext';
import { StaleVersionError, UnknownModelVersionError } from '../src/utils/errors';
import { createContext, seedModel } from './helpers';

describe('PendingGradientLedger', () => {
  let context: CoordinationContext;

  beforeEach(() => {
    context = createContext();
    seedModel(context);
  });

  describe('submit', () => {
    it('should accept a new gradient and stamp it with the next logical time', () => {
      const result = context.pending.submit('alice', 1, 'g-a');

      expect(result.status).toBe('accepted');
      expect(result.submission).toEqual({
        contributor: 'alice',
        modelVersion: 1,
        gradientRef: 'g-a',
        timestamp: 2
      });
      expect(context.models.get(1)?.gradientCount).toBe(1);
    });

    it('should treat a resubmission as a no-op', () => {
      context.pending.submit('alice', 1, 'g-a');
      const again = context.pending.submit('alice', 1, 'g-a');

      expect(again.status).toBe('duplicate');
      expect(again.submission.timestamp).toBe(2);
      expect(context.clock.now()).toBe(2);
      expect(context.models.get(1)?.gradientCount).toBe(1);
      expect(context.pending.listPending(1)).toHaveLength(1);
    });

    it('should accept the same blob from a different contributor', () => {
      context.pending.submit('alice', 1, 'g-a');
      const result = context.pending.submit('bob', 1, 'g-a');

      expect(result.status).toBe('accepted');
      expect(context.pending.pendingCount(1)).toBe(2);
    });

    it('should reject an unknown version', () => {
      expect(() => context.pending.submit('alice', 99, 'g-a')).toThrow(UnknownModelVersionError);
      expect(() => context.pending.submit('alice', 99, 'g-a')).toThrow('Model version 99 does not exist');
    });

    it('should reject a finalized version as stale', () => {
      context.pending.submit('alice', 1, 'g-a');
      context.models.markFinalized(1, 'w2', context.clock.tick());

      expect(() => context.pending.submit('bob', 1, 'g-b')).toThrow(StaleVersionError);
      expect(context.pending.pendingCount(1)).toBe(1);
      expect(context.models.get(1)?.gradientCount).toBe(1);
    });
  });

  describe('reads', () => {
    it('should return copies from listPending', () => {
      context.pending.submit('alice', 1, 'g-a');
      const [first] = context.pending.listPending(1);
      first.gradientRef = 'tampered';

      expect(context.pending.listPending(1)[0].gradientRef).toBe('g-a');
    });

    it('should fail listPending for an unknown version', () => {
      expect(() => context.pending.listPending(7)).toThrow(UnknownModelVersionError);
    });

    it('should count pending submissions per version for a contributor', () => {
      seedModel(context, 'other');
      context.pending.submit('alice', 1, 'g-a');
      context.pending.submit('alice', 1, 'g-b');
      context.pending.submit('alice', 2, 'g-c');
      context.pending.submit('bob', 2, 'g-d');

      expect(context.pending.countsFor('alice')).toEqual({ 1: 2, 2: 1 });
      expect(context.pending.countsFor('carol')).toEqual({});
    });
  });

  describe('drain', () => {
    it('should hand back the whole set in submission order and clear it', () => {
      context.pending.submit('alice', 1, 'g-a');
      context.pending.submit('bob', 1, 'g-b');

      const drained = context.pending.drain(1);

      expect(drained.map((s) => s.contributor)).toEqual(['alice', 'bob']);
      expect(context.pending.listPending(1)).toEqual([]);
    });
  });

  describe('snapshot', () => {
    it('should restore pending sets including duplicate detection', () => {
      context.pending.submit('alice', 1, 'g-a');
      const restored = createContext();
      restored.models.restore(context.models.snapshot());
      restored.pending.restore(context.pending.snapshot());

      expect(restored.pending.listPending(1)).toEqual(context.pending.listPending(1));
      expect(restored.pending.submit('alice', 1, 'g-a').status).toBe('duplicate');
    });
  });
});
