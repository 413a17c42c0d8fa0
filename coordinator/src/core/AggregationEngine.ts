import { EventEmitter } from 'events';
import type { ContentID, FinalizeResult, GradientSubmission, Identity, ModelVersion } from '../types';
import {
  AlreadyFinalizedError,
  InvalidTransitionError,
  NotAuthorizedError,
  PendingSetChangedError
} from '../utils/errors';
import { Logger } from '../utils/Logger';
import { CoordinationContext } from './CoordinationContext';
import { isTerminal } from './SessionStateMachine';

export interface FinalizeOptions {
  /** When set, finalize is refused once this session has ended. */
  sessionId?: string;
  /**
   * The submissions the new weights were built from. When set, finalize is
   * refused if the pending set no longer matches it.
   */
  expectedPending?: GradientSubmission[];
}

function sameSubmissions(expected: GradientSubmission[], actual: GradientSubmission[]): boolean {
  if (expected.length !== actual.length) {
    return false;
  }
  return expected.every(
    (submission, index) =>
      submission.contributor === actual[index].contributor &&
      submission.gradientRef === actual[index].gradientRef
  );
}

/**
 * The finalize protocol. All checks and mutations for one call run inside
 * the lineage lock and, once the lock is held, without awaiting, so no
 * reader can observe new weights next to an undrained pending set.
 *
 * Emits `finalized` (FinalizeResult) and `advanced` (ModelVersion).
 */
export class AggregationEngine extends EventEmitter {
  private logger: Logger;

  constructor(private readonly context: CoordinationContext) {
    super();
    this.logger = new Logger('AggregationEngine');
  }

  async finalize(
    modelVersion: number,
    newWeightsRef: ContentID,
    caller: Identity,
    options: FinalizeOptions = {}
  ): Promise<FinalizeResult> {
    const { models } = this.context;
    const lineage = models.require(modelVersion).lineage;

    const result = await this.context.locks.runExclusive(lineage, () =>
      this.finalizeLocked(modelVersion, newWeightsRef, caller, options)
    );

    this.logger.info(`Finalized model version ${modelVersion}`, {
      lineage,
      weightsRef: newWeightsRef,
      drained: result.drained,
      credited: result.credited.length
    });
    this.emit('finalized', result);
    return result;
  }

  /**
   * Opens the next version of a lineage once its frontier is finalized.
   * Version numbers are global, so the new version is `latest + 1`.
   */
  async advanceVersion(lineage: string, caller: Identity): Promise<ModelVersion> {
    const next = await this.context.locks.runExclusive(lineage, () => {
      const { models, policy, clock, journal } = this.context;
      const frontier = models.frontier(lineage);
      if (!frontier) {
        throw new InvalidTransitionError(`Lineage '${lineage}' has no versions`);
      }
      if (!policy.canAdvance(caller, frontier)) {
        throw new NotAuthorizedError(`'${caller}' may not advance lineage '${lineage}'`);
      }
      if (!frontier.finalized) {
        throw new InvalidTransitionError(
          `Version ${frontier.version} of lineage '${lineage}' must be finalized before advancing`
        );
      }

      const at = clock.tick();
      const created = models.create(
        {
          lineage,
          owner: frontier.owner,
          weightsRef: frontier.weightsRef,
          name: frontier.name,
          parentVersion: frontier.version
        },
        at
      );
      journal.append('model.advanced', at, {
        lineage,
        version: created.version,
        parentVersion: frontier.version,
        weightsRef: created.weightsRef
      });
      return created;
    });

    this.logger.info(`Advanced lineage ${lineage} to version ${next.version}`);
    this.emit('advanced', next);
    return next;
  }

  private finalizeLocked(
    modelVersion: number,
    newWeightsRef: ContentID,
    caller: Identity,
    options: FinalizeOptions
  ): FinalizeResult {
    const { models, pending, contributors, sessions, policy, clock, journal } = this.context;

    const model = models.require(modelVersion);
    if (!policy.canFinalize(caller, model)) {
      throw new NotAuthorizedError(`'${caller}' is not the owner of model version ${modelVersion}`);
    }
    if (model.finalized) {
      throw new AlreadyFinalizedError(modelVersion);
    }
    if (options.sessionId !== undefined) {
      const session = sessions.status(options.sessionId);
      if (session.modelRef !== model.lineage) {
        throw new InvalidTransitionError(
          `Session '${session.sessionId}' trains lineage '${session.modelRef}', not '${model.lineage}'`
        );
      }
      if (isTerminal(session.state)) {
        throw new InvalidTransitionError(
          `Session '${session.sessionId}' is ${session.state}; finalize was cancelled`
        );
      }
    }

    if (options.expectedPending !== undefined) {
      const current = pending.listPending(modelVersion);
      if (!sameSubmissions(options.expectedPending, current)) {
        throw new PendingSetChangedError(modelVersion, options.expectedPending.length, current.length);
      }
    }

    const at = clock.tick();
    const updated = models.markFinalized(modelVersion, newWeightsRef, at);
    const drained = pending.drain(modelVersion);

    const credited: Identity[] = [];
    for (const submission of drained) {
      if (!credited.includes(submission.contributor)) {
        credited.push(submission.contributor);
      }
    }
    for (const identity of credited) {
      const registration = contributors.register(identity);
      if (registration.created) {
        journal.append('contributor.registered', registration.contributor.registeredAt, { identity });
      }
      contributors.recordContribution(identity, this.context.contributionReward);
    }

    journal.append('version.finalized', at, {
      version: modelVersion,
      lineage: model.lineage,
      caller,
      previousWeightsRef: model.weightsRef,
      weightsRef: newWeightsRef,
      gradients: drained.map((submission) => ({
        contributor: submission.contributor,
        gradientRef: submission.gradientRef
      })),
      credited,
      reward: this.context.contributionReward
    });

    return { model: updated, credited, drained: drained.length };
  }
}
