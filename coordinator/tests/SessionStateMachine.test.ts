import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CoordinationContext } from '../src/core/CoordinationContext';
import type { TransitionEvent } from '../src/core/SessionStateMachine';
import { validateTrainingConfig } from '../src/core/SessionStateMachine';
import {
  DatasetNotFoundError,
  InvalidConfigError,
  InvalidTransitionError,
  ModelNotFoundError,
  SessionConflictError,
  SessionNotFoundError,
  ValidationError
} from '../src/utils/errors';
import { createContext, seedModel, validConfig } from './helpers';

describe('SessionStateMachine', () => {
  let context: CoordinationContext;

  beforeEach(() => {
    context = createContext();
    seedModel(context);
  });

  describe('config validation', () => {
    it('should accept a well-formed config', () => {
      expect(validateTrainingConfig(validConfig)).toEqual(validConfig);
    });

    it('should reject zero epochs and create no session', () => {
      let caught: unknown;
      try {
        context.sessions.start('lm', { ...validConfig, epochs: 0 }, 'owner');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidConfigError);
      if (caught instanceof InvalidConfigError) {
        expect(caught.issues).toEqual(['epochs: epochs must be > 0']);
      }
      expect(context.sessions.list()).toEqual([]);
    });

    it('should reject a validation split of 1', () => {
      expect(() => validateTrainingConfig({ ...validConfig, validationSplit: 1 })).toThrow(
        'validationSplit: validationSplit must be < 1'
      );
    });

    it('should reject an unknown optimizer', () => {
      expect(() => validateTrainingConfig({ ...validConfig, optimizer: 'lbfgs' })).toThrow(InvalidConfigError);
    });
  });

  describe('start', () => {
    it('should create the session and move it to running', () => {
      const session = context.sessions.start('lm', validConfig, 'owner');

      expect(session.state).toBe('running');
      expect(session.currentEpoch).toBe(0);
      expect(session.transitions.map(({ from, to }) => [from, to])).toEqual([
        [null, 'created'],
        ['created', 'running']
      ]);
    });

    it('should leave the session in created when autoRun is off', () => {
      const session = context.sessions.start('lm', validConfig, 'owner', { autoRun: false });

      expect(session.state).toBe('created');
      expect(context.sessions.run(session.sessionId).state).toBe('running');
    });

    it('should reject an unknown lineage', () => {
      expect(() => context.sessions.start('missing', validConfig, 'owner')).toThrow(ModelNotFoundError);
    });

    it('should bind a registered dataset to the session', () => {
      const dataset = context.datasets.register(
        {
          filename: 'train.csv',
          size: 12,
          contentRef: 'd1',
          validation: {
            isValid: true,
            format: 'csv',
            rowCount: 1,
            columnCount: 2,
            columns: ['x', 'y'],
            errors: [],
            warnings: []
          },
          uploadedBy: 'owner'
        },
        context.clock.tick()
      );

      const session = context.sessions.start('lm', validConfig, 'owner', { datasetRef: dataset.datasetId });

      expect(session.datasetRef).toBe(dataset.datasetId);
    });

    it('should reject an unknown dataset and create no session', () => {
      expect(() => context.sessions.start('lm', validConfig, 'owner', { datasetRef: 'missing' })).toThrow(
        DatasetNotFoundError
      );
      expect(context.sessions.list()).toEqual([]);
    });

    it('should allow only one active session per lineage', () => {
      const first = context.sessions.start('lm', validConfig, 'owner');

      expect(() => context.sessions.start('lm', validConfig, 'owner')).toThrow(SessionConflictError);

      context.sessions.stop(first.sessionId);
      expect(context.sessions.start('lm', validConfig, 'owner').state).toBe('running');
    });
  });

  describe('transitions', () => {
    it('should pause and resume a running session', () => {
      const { sessionId } = context.sessions.start('lm', validConfig, 'owner');

      expect(context.sessions.pause(sessionId).state).toBe('paused');
      expect(context.sessions.resume(sessionId).state).toBe('running');
    });

    it('should refuse to pause from created or any terminal state', () => {
      const created = context.sessions.start('lm', validConfig, 'owner', { autoRun: false });
      expect(() => context.sessions.pause(created.sessionId)).toThrow(InvalidTransitionError);

      context.sessions.fail(created.sessionId, 'bad data');
      expect(() => context.sessions.pause(created.sessionId)).toThrow(InvalidTransitionError);

      const stopped = context.sessions.start('lm', validConfig, 'owner');
      context.sessions.stop(stopped.sessionId);
      expect(() => context.sessions.pause(stopped.sessionId)).toThrow(InvalidTransitionError);

      const completed = context.sessions.start('lm', { ...validConfig, epochs: 1 }, 'owner');
      context.sessions.advanceEpoch(completed.sessionId, { loss: 0.4, accuracy: 0.8 });
      expect(() => context.sessions.pause(completed.sessionId)).toThrow(InvalidTransitionError);
    });

    it('should complete once the configured epochs are reached', () => {
      const { sessionId } = context.sessions.start('lm', validConfig, 'owner');

      const afterFirst = context.sessions.advanceEpoch(sessionId, { loss: 0.9, accuracy: 0.5 });
      expect(afterFirst).toMatchObject({ state: 'running', currentEpoch: 1 });

      const afterSecond = context.sessions.advanceEpoch(sessionId, { loss: 0.6, accuracy: 0.7 });
      expect(afterSecond.state).toBe('completed');
      expect(afterSecond.currentEpoch).toBe(2);
      expect(afterSecond.metricsHistory).toEqual([
        { epoch: 1, loss: 0.9, accuracy: 0.5 },
        { epoch: 2, loss: 0.6, accuracy: 0.7 }
      ]);
    });

    it('should not advance an epoch while paused', () => {
      const { sessionId } = context.sessions.start('lm', validConfig, 'owner');
      context.sessions.pause(sessionId);

      expect(() => context.sessions.advanceEpoch(sessionId, { loss: 1, accuracy: 0 })).toThrow(
        InvalidTransitionError
      );
    });

    it('should reject malformed metrics', () => {
      const { sessionId } = context.sessions.start('lm', validConfig, 'owner');

      expect(() => context.sessions.advanceEpoch(sessionId, { loss: 'high' })).toThrow(ValidationError);
      expect(context.sessions.status(sessionId).currentEpoch).toBe(0);
    });

    it('should record the failure reason', () => {
      const { sessionId } = context.sessions.start('lm', validConfig, 'owner');
      context.sessions.pause(sessionId);

      const failed = context.sessions.fail(sessionId, 'worker lost');

      expect(failed.state).toBe('failed');
      expect(failed.failureReason).toBe('worker lost');
      expect(failed.transitions[failed.transitions.length - 1]).toMatchObject({
        from: 'paused',
        to: 'failed',
        reason: 'worker lost'
      });
      expect(() => context.sessions.fail(sessionId, 'again')).toThrow(InvalidTransitionError);
    });

    it('should emit a transition event per state change', () => {
      const listener = vi.fn<(event: TransitionEvent) => void>();
      context.sessions.on('transition', listener);

      const { sessionId } = context.sessions.start('lm', validConfig, 'owner');
      context.sessions.stop(sessionId);

      const targets = listener.mock.calls.map(([event]) => event.transition.to);
      expect(targets).toEqual(['created', 'running', 'stopped']);
    });
  });

  describe('reads', () => {
    it('should report unknown sessions', () => {
      expect(() => context.sessions.status('nope')).toThrow(SessionNotFoundError);
    });

    it('should hand out copies', () => {
      const session = context.sessions.start('lm', validConfig, 'owner');
      session.state = 'completed';
      session.config.epochs = 99;

      const status = context.sessions.status(session.sessionId);
      expect(status.state).toBe('running');
      expect(status.config.epochs).toBe(2);
    });

    it('should filter by lineage and state', () => {
      seedModel(context, 'other');
      const first = context.sessions.start('lm', validConfig, 'owner');
      context.sessions.start('other', validConfig, 'owner');
      context.sessions.pause(first.sessionId);

      expect(context.sessions.list({ modelRef: 'other' })).toHaveLength(1);
      expect(context.sessions.list({ state: 'paused' }).map((s) => s.sessionId)).toEqual([first.sessionId]);
      expect(context.sessions.activeCount).toBe(2);
    });
  });
});
