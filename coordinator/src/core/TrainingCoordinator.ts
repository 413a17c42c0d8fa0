import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type {
  ContentID,
  Contributor,
  ContributorStats,
  DatasetRecord,
  DatasetValidation,
  FinalizeResult,
  GradientSubmission,
  Identity,
  JournalEntry,
  JournalEventType,
  JournalVerification,
  ModelVersion,
  SubmitResult,
  TrainingSession
} from '../types';
import type { AnchorRecord, ContributionAnchor } from '../blockchain/ContributionAnchor';
import type { ContentStore } from '../storage/ContentStore';
import { SnapshotWriter, type StateStore } from '../storage/StateStore';
import {
  InvalidDatasetError,
  NotAuthorizedError,
  PendingSetChangedError,
  StaleVersionError,
  UnknownContributorError,
  UnknownModelVersionError,
  ValidationError
} from '../utils/errors';
import { Logger } from '../utils/Logger';
import { AggregationEngine, type FinalizeOptions } from './AggregationEngine';
import { AggregationRunner, type ComposeOptions } from './AggregationRunner';
import { CoordinationContext } from './CoordinationContext';
import { validateDataset } from './DatasetRegistry';
import { FederatedAverageAggregator, type GradientAggregator } from './GradientAggregator';
import type { SessionFilter, StartOptions, TransitionEvent } from './SessionStateMachine';

export interface TrainingCoordinatorOptions {
  context: CoordinationContext;
  contentStore: ContentStore;
  stateStore?: StateStore;
  anchor?: ContributionAnchor;
  aggregator?: GradientAggregator;
}

export interface CreateModelInput {
  weightsRef: ContentID;
  lineage?: string;
  name?: string;
}

/** Compose attempts before a pending set that keeps changing is reported. */
const MAX_COMPOSE_ATTEMPTS = 3;
/** Unanchored finalizes held before each new one is logged as a backlog. */
const UNANCHORED_WARN_LIMIT = 100;

interface UnanchoredFinalize {
  result: FinalizeResult;
  journalHead: string;
}

export interface AggregateResult extends FinalizeResult {
  learningRate: number;
  aggregatedGradients: number;
}

/**
 * The boundary external callers (HTTP, sockets, chain watchers) go through.
 * Translates requests into ledger and state-machine operations, persists a
 * snapshot after each mutation and forwards domain events.
 *
 * Events: `session-transition`, `gradient-accepted`, `version-finalized`,
 * `version-advanced`, `model-created`, `dataset-registered`.
 */
export class TrainingCoordinator extends EventEmitter {
  readonly context: CoordinationContext;
  private engine: AggregationEngine;
  private runner: AggregationRunner;
  readonly contentStore: ContentStore;
  private anchor?: ContributionAnchor;
  private writer?: SnapshotWriter;
  private stateStore?: StateStore;
  private unanchored: UnanchoredFinalize[] = [];
  private anchoring: Promise<void> = Promise.resolve();
  private logger: Logger;

  constructor(options: TrainingCoordinatorOptions) {
    super();
    this.context = options.context;
    this.contentStore = options.contentStore;
    this.anchor = options.anchor;
    this.stateStore = options.stateStore;
    this.logger = new Logger('TrainingCoordinator');

    this.engine = new AggregationEngine(this.context);
    this.runner = new AggregationRunner(
      this.context,
      this.contentStore,
      options.aggregator ?? new FederatedAverageAggregator()
    );

    if (options.stateStore) {
      this.writer = new SnapshotWriter(options.stateStore, () => this.context.snapshot());
    }

    this.context.sessions.on('transition', (event: TransitionEvent) => {
      this.context.journal.append('session.transition', event.transition.at, {
        sessionId: event.session.sessionId,
        modelRef: event.session.modelRef,
        from: event.transition.from,
        to: event.transition.to,
        reason: event.transition.reason ?? null
      });
      this.emit('session-transition', event);
    });
    this.engine.on('finalized', (result: FinalizeResult) => this.emit('version-finalized', result));
    this.engine.on('advanced', (model: ModelVersion) => this.emit('version-advanced', model));
  }

  /** Restores the last persisted snapshot, if any. */
  async initialize(): Promise<void> {
    if (!this.stateStore) {
      return;
    }
    const snapshot = await this.stateStore.load();
    if (snapshot) {
      this.context.restore(snapshot);
      this.logger.info('Coordinator state restored', {
        models: snapshot.models.length,
        sessions: snapshot.sessions.length,
        contributors: snapshot.contributors.length
      });
    }
  }

  // Models

  async createModel(owner: Identity, input: CreateModelInput): Promise<ModelVersion> {
    const { models, clock, journal } = this.context;
    const lineage = input.lineage ?? randomUUID();
    if (models.hasLineage(lineage)) {
      throw new ValidationError(`Lineage '${lineage}' already exists`);
    }

    const at = clock.tick();
    const model = models.create({ lineage, owner, weightsRef: input.weightsRef, name: input.name }, at);
    journal.append('model.created', at, {
      lineage,
      version: model.version,
      owner,
      weightsRef: model.weightsRef
    });

    this.logger.info(`Created model lineage ${lineage} at version ${model.version}`, { owner });
    this.emit('model-created', model);
    await this.persist();
    return model;
  }

  getModel(version: number): ModelVersion {
    return this.context.models.require(version);
  }

  latestModel(): ModelVersion | undefined {
    return this.context.models.latest();
  }

  lineageHistory(lineage: string): ModelVersion[] {
    return this.context.models.history(lineage);
  }

  async advanceVersion(lineage: string, caller: Identity): Promise<ModelVersion> {
    const model = await this.engine.advanceVersion(lineage, caller);
    await this.persist();
    return model;
  }

  // Gradients

  async submitGradient(contributor: Identity, modelVersion: number, gradientRef: ContentID): Promise<SubmitResult> {
    const { pending, contributors, journal } = this.context;
    const result = pending.submit(contributor, modelVersion, gradientRef);
    if (result.status === 'duplicate') {
      this.logger.debug(`Duplicate gradient ${gradientRef} from ${contributor} for version ${modelVersion}`);
      return result;
    }

    const registration = contributors.register(contributor);
    if (registration.created) {
      journal.append('contributor.registered', registration.contributor.registeredAt, { identity: contributor });
    }
    journal.append('gradient.accepted', result.submission.timestamp, {
      contributor,
      version: modelVersion,
      gradientRef
    });

    this.emit('gradient-accepted', result.submission);
    await this.persist();
    return result;
  }

  /** Stores the blob first; only a reference to durably stored bytes is admitted. */
  async uploadGradient(contributor: Identity, modelVersion: number, bytes: Uint8Array): Promise<SubmitResult> {
    const model = this.context.models.get(modelVersion);
    if (!model) {
      throw new UnknownModelVersionError(modelVersion);
    }
    if (model.finalized) {
      throw new StaleVersionError(modelVersion);
    }
    const gradientRef = await this.contentStore.put(bytes);
    return this.submitGradient(contributor, modelVersion, gradientRef);
  }

  listPending(modelVersion: number): GradientSubmission[] {
    return this.context.pending.listPending(modelVersion);
  }

  // Finalize

  async finalize(
    modelVersion: number,
    newWeightsRef: ContentID,
    caller: Identity,
    options: FinalizeOptions = {}
  ): Promise<FinalizeResult> {
    const result = await this.engine.finalize(modelVersion, newWeightsRef, caller, options);
    await this.persist();
    this.scheduleAnchor(result);
    return result;
  }

  /**
   * Fetch pending gradients, aggregate them into new weights, then finalize.
   * Gradients admitted while the weights were being composed cause the
   * weights to be composed again, so every credited gradient is folded in.
   */
  async aggregateAndFinalize(
    modelVersion: number,
    caller: Identity,
    options: Omit<FinalizeOptions, 'expectedPending'> & ComposeOptions = {}
  ): Promise<AggregateResult> {
    for (let attempt = 1; ; attempt++) {
      const composed = await this.runner.compose(modelVersion, caller, options);
      try {
        const result = await this.finalize(modelVersion, composed.weightsRef, caller, {
          sessionId: options.sessionId,
          expectedPending: composed.basedOn
        });
        return { ...result, learningRate: composed.learningRate, aggregatedGradients: composed.basedOn.length };
      } catch (error) {
        if (!(error instanceof PendingSetChangedError) || attempt >= MAX_COMPOSE_ATTEMPTS) {
          throw error;
        }
        this.logger.info(`Pending gradients for version ${modelVersion} changed during aggregation; composing again`, {
          attempt
        });
      }
    }
  }

  // Datasets

  validateDataset(filename: string, bytes: Uint8Array): DatasetValidation {
    return validateDataset(filename, bytes);
  }

  /** Validates, stores and registers a training dataset. Invalid datasets are never stored. */
  async uploadDataset(uploader: Identity, filename: string, bytes: Uint8Array): Promise<DatasetRecord> {
    const validation = validateDataset(filename, bytes);
    if (!validation.isValid) {
      throw new InvalidDatasetError(validation.errors);
    }

    const contentRef = await this.contentStore.put(bytes);
    const { clock, datasets, journal } = this.context;
    const at = clock.tick();
    const record = datasets.register(
      { filename, size: bytes.byteLength, contentRef, validation, uploadedBy: uploader },
      at
    );
    journal.append('dataset.registered', at, {
      datasetId: record.datasetId,
      contentRef,
      uploadedBy: uploader,
      rowCount: validation.rowCount
    });

    this.logger.info(`Registered dataset ${record.datasetId}`, { filename, rows: validation.rowCount });
    this.emit('dataset-registered', record);
    await this.persist();
    return record;
  }

  getDataset(datasetId: string): DatasetRecord {
    return this.context.datasets.require(datasetId);
  }

  listDatasets(filter: { uploadedBy?: Identity } = {}): DatasetRecord[] {
    return this.context.datasets.list(filter);
  }

  // Sessions

  async startSession(
    modelRef: string,
    config: unknown,
    createdBy: Identity,
    options: StartOptions = {}
  ): Promise<TrainingSession> {
    const session = this.context.sessions.start(modelRef, config, createdBy, options);
    await this.persist();
    return session;
  }

  async runSession(sessionId: string): Promise<TrainingSession> {
    return this.mutateSession(() => this.context.sessions.run(sessionId));
  }

  async pauseSession(sessionId: string): Promise<TrainingSession> {
    return this.mutateSession(() => this.context.sessions.pause(sessionId));
  }

  async resumeSession(sessionId: string): Promise<TrainingSession> {
    return this.mutateSession(() => this.context.sessions.resume(sessionId));
  }

  async stopSession(sessionId: string): Promise<TrainingSession> {
    return this.mutateSession(() => this.context.sessions.stop(sessionId));
  }

  async advanceEpoch(sessionId: string, metrics: unknown): Promise<TrainingSession> {
    return this.mutateSession(() => this.context.sessions.advanceEpoch(sessionId, metrics));
  }

  async failSession(sessionId: string, reason: string): Promise<TrainingSession> {
    return this.mutateSession(() => this.context.sessions.fail(sessionId, reason));
  }

  sessionStatus(sessionId: string): TrainingSession {
    return this.context.sessions.status(sessionId);
  }

  listSessions(filter: SessionFilter = {}): TrainingSession[] {
    return this.context.sessions.list(filter);
  }

  // Contributors

  async registerContributor(identity: Identity): Promise<Contributor> {
    const { contributors, journal } = this.context;
    const registration = contributors.register(identity);
    if (registration.created) {
      journal.append('contributor.registered', registration.contributor.registeredAt, { identity });
      await this.persist();
    }
    return registration.contributor;
  }

  getContributor(identity: Identity): ContributorStats {
    const { contributors, pending } = this.context;
    const contributor = contributors.get(identity);
    if (!contributor) {
      throw new UnknownContributorError(identity);
    }
    return {
      contributor,
      pendingByVersion: pending.countsFor(identity),
      rank: contributors.rankOf(identity)
    };
  }

  leaderboard(limit?: number): Contributor[] {
    return this.context.contributors.leaderboard(limit);
  }

  async awardReputation(admin: Identity, identity: Identity, amount: number): Promise<Contributor> {
    const { contributors, journal, clock } = this.context;
    const existed = contributors.has(identity);
    const contributor = contributors.awardReputation(admin, identity, amount);
    if (!existed) {
      journal.append('contributor.registered', contributor.registeredAt, { identity });
    }
    journal.append('reputation.awarded', clock.tick(), { admin, identity, amount });
    await this.persist();
    return contributor;
  }

  /** Admin-credited contribution outside of a finalize. */
  async recordContribution(admin: Identity, identity: Identity, rewardAmount: number): Promise<Contributor> {
    const { contributors, journal, policy, clock } = this.context;
    if (!policy.isAdmin(admin)) {
      throw new NotAuthorizedError(`'${admin}' may not record contributions`);
    }
    const contributor = contributors.recordContribution(identity, rewardAmount);
    journal.append('reputation.awarded', clock.tick(), {
      admin,
      identity,
      amount: rewardAmount,
      contribution: true
    });
    await this.persist();
    return contributor;
  }

  // Journal and health

  journalEntries(options: { type?: JournalEventType; since?: number; limit?: number } = {}): JournalEntry[] {
    return this.context.journal.list(options);
  }

  verifyJournal(): JournalVerification {
    return this.context.journal.verify();
  }

  anchors(): AnchorRecord[] {
    return this.anchor ? this.anchor.records() : [];
  }

  async componentHealth(): Promise<Record<string, boolean>> {
    const [contentStore, chain] = await Promise.all([
      this.contentStore.isHealthy(),
      this.anchor ? this.anchor.isHealthy() : Promise.resolve(true)
    ]);
    return { contentStore, chain, journal: this.verifyJournal().valid };
  }

  /** Waits for pending snapshot writes and anchoring to settle. */
  async flush(): Promise<void> {
    await this.anchoring;
    if (this.writer) {
      await this.writer.flush();
    }
  }

  dispose(): void {
    this.anchor?.dispose();
    this.removeAllListeners();
  }

  private async mutateSession(operation: () => TrainingSession): Promise<TrainingSession> {
    const session = operation();
    await this.persist();
    return session;
  }

  private async persist(): Promise<void> {
    if (this.writer) {
      await this.writer.schedule();
    }
  }

  /**
   * Anchoring runs after the finalize has committed and never blocks it.
   * Records that fail to anchor are retried ahead of the next one, each with
   * the journal head captured when it committed.
   */
  private scheduleAnchor(result: FinalizeResult): void {
    const anchor = this.anchor;
    if (!anchor) {
      return;
    }
    this.unanchored.push({ result, journalHead: this.context.journal.head() });
    if (this.unanchored.length > UNANCHORED_WARN_LIMIT) {
      this.logger.warn(`${this.unanchored.length} finalizes are waiting to be anchored`, {
        oldest: this.unanchored[0].result.model.version
      });
    }

    this.anchoring = this.anchoring.then(async () => {
      while (this.unanchored.length > 0) {
        const next = this.unanchored[0];
        try {
          await anchor.anchorFinalize(next.result, next.journalHead);
          this.unanchored.shift();
        } catch (error) {
          this.logger.error(`Anchoring finalize of version ${next.result.model.version} failed; will retry`, error);
          return;
        }
      }
    });
  }

  /** Finalizes committed locally but not yet anchored on chain. */
  unanchoredCount(): number {
    return this.unanchored.length;
  }
}
