export * from './types';
export * from './utils/errors';
export { loadConfig, type CoordinatorConfig } from './config';
export { Logger } from './utils/Logger';
export { LogicalClock } from './utils/LogicalClock';
export { KeyedMutex, Mutex } from './utils/KeyedMutex';
export { ContributionJournal, GENESIS_HASH } from './journal/ContributionJournal';
export { ModelVersionLedger } from './core/ModelVersionLedger';
export { PendingGradientLedger } from './core/PendingGradientLedger';
export { ContributorLedger } from './core/ContributorLedger';
export { OwnerAuthorityPolicy, type AuthorityPolicy } from './core/AuthorityPolicy';
export {
  SessionStateMachine,
  TrainingConfigSchema,
  validateTrainingConfig,
  isTerminal,
  type TransitionEvent
} from './core/SessionStateMachine';
export { DatasetRegistry, validateDataset, parseCsv, detectFormat } from './core/DatasetRegistry';
export { CoordinationContext } from './core/CoordinationContext';
export { AggregationEngine, type FinalizeOptions } from './core/AggregationEngine';
export { AggregationRunner } from './core/AggregationRunner';
export {
  FederatedAverageAggregator,
  encodeFloat32,
  decodeFloat32,
  type GradientAggregator
} from './core/GradientAggregator';
export { TrainingCoordinator } from './core/TrainingCoordinator';
export { MemoryContentStore, HttpContentStore, contentIdFor, type ContentStore } from './storage/ContentStore';
export { MemoryStateStore, FileStateStore, SnapshotWriter, type StateStore } from './storage/StateStore';
export { Web3ContributionAnchor, type AnchorRecord, type ContributionAnchor } from './blockchain/ContributionAnchor';
export { issueToken } from './middleware/AuthMiddleware';
export { CoordinatorSystem, buildCoordinator, type SystemOverrides } from './CoordinatorSystem';
