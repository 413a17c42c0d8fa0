import type { ContentID, GradientSubmission, Identity } from '../types';
import { AlreadyFinalizedError, InvalidGradientError, NotAuthorizedError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import type { ContentStore } from '../storage/ContentStore';
import { CoordinationContext } from './CoordinationContext';
import type { GradientAggregator } from './GradientAggregator';

export interface ComposeOptions {
  learningRate?: number;
}

export interface ComposedWeights {
  weightsRef: ContentID;
  basedOn: GradientSubmission[];
  learningRate: number;
}

/**
 * Produces the next weights blob for a version from its pending gradients.
 * Runs entirely outside the lineage lock: blob reads, the aggregation
 * itself and the blob write all happen before finalize is attempted.
 */
export class AggregationRunner {
  private logger: Logger;

  constructor(
    private readonly context: CoordinationContext,
    private readonly store: ContentStore,
    private readonly aggregator: GradientAggregator
  ) {
    this.logger = new Logger('AggregationRunner');
  }

  async compose(modelVersion: number, caller: Identity, options: ComposeOptions = {}): Promise<ComposedWeights> {
    const { models, pending, policy, sessions } = this.context;

    const model = models.require(modelVersion);
    if (!policy.canFinalize(caller, model)) {
      throw new NotAuthorizedError(`'${caller}' is not the owner of model version ${modelVersion}`);
    }
    if (model.finalized) {
      throw new AlreadyFinalizedError(modelVersion);
    }

    const basedOn = pending.listPending(modelVersion);
    if (basedOn.length === 0) {
      throw new InvalidGradientError(`Model version ${modelVersion} has no pending gradients`);
    }

    const learningRate =
      options.learningRate ?? sessions.activeFor(model.lineage)?.config.learningRate ?? 1;

    this.logger.info(`Aggregating ${basedOn.length} gradients for version ${modelVersion}`, {
      aggregator: this.aggregator.name,
      learningRate
    });

    const [weights, gradients] = await Promise.all([
      this.store.get(model.weightsRef),
      Promise.all(basedOn.map((submission) => this.store.get(submission.gradientRef)))
    ]);

    const next = await this.aggregator.aggregate({ weights, gradients, learningRate });
    const weightsRef = await this.store.put(next);

    return { weightsRef, basedOn, learningRate };
  }
}
