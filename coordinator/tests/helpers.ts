import { CoordinationContext } from '../src/core/CoordinationContext';
import type { ModelVersion, TrainingConfig } from '../src/types';

export const validConfig: TrainingConfig = {
  epochs: 2,
  batchSize: 32,
  learningRate: 0.5,
  optimizer: 'adam',
  validationSplit: 0.2
};

export function createContext(contributionReward = 10): CoordinationContext {
  return new CoordinationContext({ adminIdentity: 'admin', contributionReward });
}

export function seedModel(
  context: CoordinationContext,
  lineage = 'lm',
  owner = 'owner',
  weightsRef = 'w1'
): ModelVersion {
  return context.models.create({ lineage, owner, weightsRef }, context.clock.tick());
}
