import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AggregationEngine } from '../src/core/AggregationEngine';
import { CoordinationContext } from '../src/core/CoordinationContext';
import {
  AlreadyFinalizedError,
  InvalidTransitionError,
  ModelNotFoundError,
  NotAuthorizedError,
  PendingSetChangedError,
  StaleVersionError
} from '../src/utils/errors';
import { createContext, seedModel, validConfig } from './helpers';

describe('AggregationEngine', () => {
  let context: CoordinationContext;
  let engine: AggregationEngine;

  beforeEach(() => {
    context = createContext();
    engine = new AggregationEngine(context);
    seedModel(context);
  });

  describe('finalize', () => {
    it('should drain pending gradients and credit each contributor once', async () => {
      context.pending.submit('A', 1, 'g-a1');
      context.pending.submit('A', 1, 'g-a1');
      context.pending.submit('B', 1, 'g-b1');
      expect(context.models.get(1)?.gradientCount).toBe(2);

      const result = await engine.finalize(1, 'w2', 'owner');

      expect(result.drained).toBe(2);
      expect(result.credited).toEqual(['A', 'B']);
      expect(result.model).toMatchObject({ version: 1, weightsRef: 'w2', finalized: true, gradientCount: 2 });
      expect(context.pending.listPending(1)).toEqual([]);
      expect(context.contributors.get('A')).toMatchObject({ contributions: 1, reputation: 10 });
      expect(context.contributors.get('B')).toMatchObject({ contributions: 1, reputation: 10 });
    });

    it('should credit a contributor with several gradients only once', async () => {
      context.pending.submit('A', 1, 'g-a1');
      context.pending.submit('A', 1, 'g-a2');

      const result = await engine.finalize(1, 'w2', 'owner');

      expect(result.drained).toBe(2);
      expect(result.credited).toEqual(['A']);
      expect(context.contributors.get('A')?.contributions).toBe(1);
    });

    it('should refuse further gradients once finalized', async () => {
      await engine.finalize(1, 'w2', 'owner');

      expect(() => context.pending.submit('C', 1, 'g-c1')).toThrow(StaleVersionError);
    });

    it('should let exactly one of two concurrent finalizes win', async () => {
      context.pending.submit('A', 1, 'g-a1');

      const [first, second] = await Promise.allSettled([
        engine.finalize(1, 'w2', 'owner'),
        engine.finalize(1, 'w3', 'owner')
      ]);

      expect(first.status).toBe('fulfilled');
      expect(second.status).toBe('rejected');
      if (second.status === 'rejected') {
        expect(second.reason).toBeInstanceOf(AlreadyFinalizedError);
      }
      expect(context.models.get(1)?.weightsRef).toBe('w2');
      expect(context.contributors.get('A')?.contributions).toBe(1);
    });

    it('should reject a non-owner without changing any state', async () => {
      context.pending.submit('A', 1, 'g-a1');
      const journalLength = context.journal.length;

      await expect(engine.finalize(1, 'w2', 'mallory')).rejects.toThrow(NotAuthorizedError);

      expect(context.models.get(1)).toMatchObject({ weightsRef: 'w1', finalized: false });
      expect(context.pending.pendingCount(1)).toBe(1);
      expect(context.contributors.size).toBe(0);
      expect(context.journal.length).toBe(journalLength);
    });

    it('should reject an unknown version', async () => {
      await expect(engine.finalize(42, 'w2', 'owner')).rejects.toThrow(ModelNotFoundError);
    });

    it('should finalize an empty pending set without crediting anyone', async () => {
      const result = await engine.finalize(1, 'w2', 'owner');

      expect(result).toMatchObject({ drained: 0, credited: [] });
      expect(context.contributors.size).toBe(0);
    });

    it('should cancel when the bound session has ended', async () => {
      context.pending.submit('A', 1, 'g-a1');
      const session = context.sessions.start('lm', validConfig, 'owner');
      context.sessions.stop(session.sessionId);

      await expect(engine.finalize(1, 'w2', 'owner', { sessionId: session.sessionId })).rejects.toThrow(
        InvalidTransitionError
      );
      expect(context.models.get(1)?.finalized).toBe(false);
      expect(context.pending.pendingCount(1)).toBe(1);
    });

    it('should proceed while the bound session is running', async () => {
      const session = context.sessions.start('lm', validConfig, 'owner');

      const result = await engine.finalize(1, 'w2', 'owner', { sessionId: session.sessionId });

      expect(result.model.finalized).toBe(true);
    });

    it('should refuse when gradients arrived after the weights were composed', async () => {
      context.pending.submit('A', 1, 'g-a1');
      const basedOn = context.pending.listPending(1);
      context.pending.submit('B', 1, 'g-b1');

      const error = await engine.finalize(1, 'w2', 'owner', { expectedPending: basedOn }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PendingSetChangedError);
      expect(error).toMatchObject({ code: 'PENDING_CHANGED', status: 409, retryable: true });
      expect(context.models.get(1)?.finalized).toBe(false);
      expect(context.pending.listPending(1).map((s) => s.contributor)).toEqual(['A', 'B']);
      expect(context.contributors.get('B')).toBeUndefined();
    });

    it('should finalize when the pending set matches the composed one', async () => {
      context.pending.submit('A', 1, 'g-a1');
      context.pending.submit('B', 1, 'g-b1');

      const result = await engine.finalize(1, 'w2', 'owner', { expectedPending: context.pending.listPending(1) });

      expect(result.credited).toEqual(['A', 'B']);
    });

    it('should journal the finalize after the contributor registrations', async () => {
      context.pending.submit('A', 1, 'g-a1');
      context.pending.submit('B', 1, 'g-b1');

      await engine.finalize(1, 'w2', 'owner');

      expect(context.journal.list().map((entry) => entry.type)).toEqual([
        'contributor.registered',
        'contributor.registered',
        'version.finalized'
      ]);
      const [finalized] = context.journal.list({ type: 'version.finalized' });
      expect(finalized.payload).toMatchObject({
        version: 1,
        lineage: 'lm',
        previousWeightsRef: 'w1',
        weightsRef: 'w2',
        credited: ['A', 'B'],
        reward: 10
      });
      expect(context.journal.verify().valid).toBe(true);
    });

    it('should emit finalized once', async () => {
      const listener = vi.fn();
      engine.on('finalized', listener);

      await engine.finalize(1, 'w2', 'owner');

      expect(listener).toHaveBeenCalledTimes(1);
    });
  });

  describe('advanceVersion', () => {
    it('should require the frontier to be finalized', async () => {
      await expect(engine.advanceVersion('lm', 'owner')).rejects.toThrow(InvalidTransitionError);
    });

    it('should open the next version from the finalized weights', async () => {
      await engine.finalize(1, 'w2', 'owner');

      const next = await engine.advanceVersion('lm', 'owner');

      expect(next).toMatchObject({
        version: 2,
        lineage: 'lm',
        weightsRef: 'w2',
        owner: 'owner',
        parentVersion: 1,
        finalized: false,
        gradientCount: 0
      });
      expect(context.models.frontier('lm')?.version).toBe(2);
      expect(context.pending.submit('A', 2, 'g-a2').status).toBe('accepted');
    });

    it('should number versions globally across lineages', async () => {
      seedModel(context, 'other');
      await engine.finalize(1, 'w2', 'owner');

      const next = await engine.advanceVersion('lm', 'owner');

      expect(next.version).toBe(3);
      expect(context.models.history('lm').map((model) => model.version)).toEqual([1, 3]);
    });

    it('should reject a non-owner', async () => {
      await engine.finalize(1, 'w2', 'owner');

      await expect(engine.advanceVersion('lm', 'mallory')).rejects.toThrow(NotAuthorizedError);
      expect(context.models.size).toBe(1);
    });

    it('should reject an unknown lineage', async () => {
      await expect(engine.advanceVersion('missing', 'owner')).rejects.toThrow(InvalidTransitionError);
    });
  });
});
