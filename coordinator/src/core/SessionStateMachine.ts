import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  OPTIMIZER_KINDS,
  TERMINAL_STATES,
  type EpochMetrics,
  type Identity,
  type SessionState,
  type SessionTransition,
  type TrainingConfig,
  type TrainingSession
} from '../types';
import {
  InvalidConfigError,
  InvalidTransitionError,
  ModelNotFoundError,
  SessionConflictError,
  SessionNotFoundError,
  ValidationError
} from '../utils/errors';
import { LogicalClock } from '../utils/LogicalClock';
import { Logger } from '../utils/Logger';
import type { DatasetRegistry } from './DatasetRegistry';
import { ModelVersionLedger } from './ModelVersionLedger';

export const TrainingConfigSchema = z.object({
  epochs: z.number().int('epochs must be an integer').positive('epochs must be > 0'),
  batchSize: z.number().int('batchSize must be an integer').positive('batchSize must be > 0'),
  learningRate: z.number().positive('learningRate must be > 0'),
  optimizer: z.enum(OPTIMIZER_KINDS, {
    errorMap: () => ({ message: `optimizer must be one of ${OPTIMIZER_KINDS.join(', ')}` })
  }),
  validationSplit: z
    .number()
    .min(0, 'validationSplit must be >= 0')
    .lt(1, 'validationSplit must be < 1')
});

const MetricsSchema = z.object({
  loss: z.number().finite(),
  accuracy: z.number().finite()
});

export function validateTrainingConfig(input: unknown): TrainingConfig {
  const result = TrainingConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}

export function isTerminal(state: SessionState): boolean {
  return TERMINAL_STATES.includes(state);
}

export interface StartOptions {
  /** Move the session to `running` on start (default true). */
  autoRun?: boolean;
  /** Id of a registered dataset to train on. */
  datasetRef?: string;
}

export interface SessionFilter {
  modelRef?: string;
  state?: SessionState;
}

export interface TransitionEvent {
  session: TrainingSession;
  transition: SessionTransition;
}

const ALLOWED: Record<SessionState, readonly SessionState[]> = {
  created: ['running', 'failed'],
  running: ['paused', 'completed', 'stopped', 'failed'],
  paused: ['running', 'stopped', 'failed'],
  completed: [],
  stopped: [],
  failed: []
};

/**
 * Lifecycle of training runs:
 *
 *   created -> running <-> paused -> { completed, stopped, failed }
 *
 * Transitions are the only way `state`, `currentEpoch` and `metricsHistory`
 * change; callers receive copies. Every transition emits `transition`.
 */
export class SessionStateMachine extends EventEmitter {
  private sessions = new Map<string, TrainingSession>();
  private logger: Logger;

  constructor(
    private readonly models: ModelVersionLedger,
    private readonly clock: LogicalClock,
    private readonly datasets: DatasetRegistry
  ) {
    super();
    this.logger = new Logger('SessionStateMachine');
  }

  start(modelRef: string, config: unknown, createdBy: Identity, options: StartOptions = {}): TrainingSession {
    const validConfig = validateTrainingConfig(config);

    if (!this.models.hasLineage(modelRef)) {
      throw new ModelNotFoundError(modelRef);
    }
    if (options.datasetRef !== undefined) {
      this.datasets.require(options.datasetRef);
    }

    const active = this.activeFor(modelRef);
    if (active) {
      throw new SessionConflictError(modelRef, active.sessionId);
    }

    const at = this.clock.tick();
    const session: TrainingSession = {
      sessionId: randomUUID(),
      modelRef,
      config: validConfig,
      state: 'created',
      currentEpoch: 0,
      metricsHistory: [],
      transitions: [],
      datasetRef: options.datasetRef,
      createdBy,
      createdAt: at,
      updatedAt: at
    };
    this.sessions.set(session.sessionId, session);
    this.record(session, null, 'created', at);

    if (options.autoRun ?? true) {
      this.transition(session, 'running');
    }

    return this.copy(session);
  }

  run(sessionId: string): TrainingSession {
    return this.apply(sessionId, 'created', 'running');
  }

  pause(sessionId: string): TrainingSession {
    return this.apply(sessionId, 'running', 'paused');
  }

  resume(sessionId: string): TrainingSession {
    return this.apply(sessionId, 'paused', 'running');
  }

  stop(sessionId: string): TrainingSession {
    const session = this.require(sessionId);
    if (session.state !== 'running' && session.state !== 'paused') {
      throw new InvalidTransitionError(`Cannot stop session '${sessionId}' from '${session.state}'`);
    }
    this.transition(session, 'stopped', 'stopped by user');
    return this.copy(session);
  }

  advanceEpoch(sessionId: string, metrics: unknown): TrainingSession {
    const session = this.require(sessionId);
    if (session.state !== 'running') {
      throw new InvalidTransitionError(
        `Cannot advance epoch of session '${sessionId}' from '${session.state}'`
      );
    }

    const parsed = MetricsSchema.safeParse(metrics);
    if (!parsed.success) {
      throw new ValidationError('Epoch metrics require finite numeric loss and accuracy');
    }

    session.currentEpoch += 1;
    const point: EpochMetrics = {
      epoch: session.currentEpoch,
      loss: parsed.data.loss,
      accuracy: parsed.data.accuracy
    };
    session.metricsHistory.push(point);
    session.updatedAt = this.clock.tick();

    this.logger.debug(`Session ${sessionId} epoch ${point.epoch}/${session.config.epochs}`, {
      loss: point.loss,
      accuracy: point.accuracy
    });
    this.emit('epoch', { session: this.copy(session), metrics: point });

    if (session.currentEpoch >= session.config.epochs) {
      this.transition(session, 'completed');
    }

    return this.copy(session);
  }

  fail(sessionId: string, reason: string): TrainingSession {
    const session = this.require(sessionId);
    if (isTerminal(session.state)) {
      throw new InvalidTransitionError(`Cannot fail session '${sessionId}' from '${session.state}'`);
    }
    session.failureReason = reason;
    this.transition(session, 'failed', reason);
    return this.copy(session);
  }

  status(sessionId: string): TrainingSession {
    return this.copy(this.require(sessionId));
  }

  get(sessionId: string): TrainingSession | undefined {
    const session = this.sessions.get(sessionId);
    return session ? this.copy(session) : undefined;
  }

  list(filter: SessionFilter = {}): TrainingSession[] {
    return [...this.sessions.values()]
      .filter((session) => !filter.modelRef || session.modelRef === filter.modelRef)
      .filter((session) => !filter.state || session.state === filter.state)
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((session) => this.copy(session));
  }

  /** The non-terminal session of a lineage, if any. */
  activeFor(modelRef: string): TrainingSession | undefined {
    for (const session of this.sessions.values()) {
      if (session.modelRef === modelRef && !isTerminal(session.state)) {
        return this.copy(session);
      }
    }
    return undefined;
  }

  get activeCount(): number {
    return [...this.sessions.values()].filter((session) => !isTerminal(session.state)).length;
  }

  snapshot(): TrainingSession[] {
    return this.list();
  }

  restore(sessions: TrainingSession[]): void {
    this.sessions.clear();
    for (const session of sessions) {
      this.sessions.set(session.sessionId, this.copy(session));
    }
  }

  private apply(sessionId: string, from: SessionState, to: SessionState): TrainingSession {
    const session = this.require(sessionId);
    if (session.state !== from) {
      throw new InvalidTransitionError(
        `Cannot move session '${sessionId}' to '${to}' from '${session.state}'`
      );
    }
    this.transition(session, to);
    return this.copy(session);
  }

  private transition(session: TrainingSession, to: SessionState, reason?: string): void {
    const from = session.state;
    if (!ALLOWED[from].includes(to)) {
      throw new InvalidTransitionError(`Illegal transition '${from}' -> '${to}'`);
    }
    session.state = to;
    session.updatedAt = this.clock.tick();
    this.record(session, from, to, session.updatedAt, reason);
  }

  private record(
    session: TrainingSession,
    from: SessionState | null,
    to: SessionState,
    at: number,
    reason?: string
  ): void {
    const transition: SessionTransition = reason ? { from, to, at, reason } : { from, to, at };
    session.transitions.push(transition);

    this.logger.info(`Session ${session.sessionId}: ${from ?? '-'} -> ${to}`, {
      modelRef: session.modelRef,
      at,
      reason
    });
    const event: TransitionEvent = { session: this.copy(session), transition };
    this.emit('transition', event);
  }

  private require(sessionId: string): TrainingSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  private copy(session: TrainingSession): TrainingSession {
    return {
      ...session,
      config: { ...session.config },
      metricsHistory: session.metricsHistory.map((point) => ({ ...point })),
      transitions: session.transitions.map((transition) => ({ ...transition }))
    };
  }
}
