/** Opaque reference to a blob in the content-addressed store. */
export type ContentID = string;

/** Verified caller identity supplied by the auth layer (wallet address, user id). */
export type Identity = string;

/** Monotonic logical time, never wall-clock. */
export type LogicalTime = number;

export interface ModelVersion {
  version: number;
  lineage: string;
  name?: string;
  weightsRef: ContentID;
  owner: Identity;
  createdAt: LogicalTime;
  updatedAt: LogicalTime;
  /** Cumulative accepted gradients; survives finalize. */
  gradientCount: number;
  finalized: boolean;
  finalizedAt?: LogicalTime;
  parentVersion?: number;
}

export interface GradientSubmission {
  contributor: Identity;
  modelVersion: number;
  gradientRef: ContentID;
  timestamp: LogicalTime;
}

export type SubmitStatus = 'accepted' | 'duplicate';

export interface SubmitResult {
  status: SubmitStatus;
  submission: GradientSubmission;
}

export interface Contributor {
  identity: Identity;
  reputation: number;
  contributions: number;
  lastContributionAt?: LogicalTime;
  registeredAt: LogicalTime;
  registrationOrder: number;
}

export interface ContributorStats {
  contributor: Contributor;
  pendingByVersion: Record<number, number>;
  rank: number;
}

export const OPTIMIZER_KINDS = ['sgd', 'adam', 'adamw', 'rmsprop', 'fedavg', 'fedprox'] as const;

export type OptimizerKind = (typeof OPTIMIZER_KINDS)[number];

export interface TrainingConfig {
  epochs: number;
  batchSize: number;
  learningRate: number;
  optimizer: OptimizerKind;
  validationSplit: number;
}

export type SessionState = 'created' | 'running' | 'paused' | 'completed' | 'stopped' | 'failed';

export const TERMINAL_STATES: readonly SessionState[] = ['completed', 'stopped', 'failed'];

export interface EpochMetrics {
  epoch: number;
  loss: number;
  accuracy: number;
}

export interface SessionTransition {
  from: SessionState | null;
  to: SessionState;
  at: LogicalTime;
  reason?: string;
}

export interface TrainingSession {
  sessionId: string;
  modelRef: string;
  config: TrainingConfig;
  state: SessionState;
  currentEpoch: number;
  metricsHistory: EpochMetrics[];
  transitions: SessionTransition[];
  failureReason?: string;
  /** Registered dataset the session trains on. */
  datasetRef?: string;
  createdBy: Identity;
  createdAt: LogicalTime;
  updatedAt: LogicalTime;
}

export type DatasetFormat = 'csv' | 'json';

export interface DatasetValidation {
  isValid: boolean;
  format: DatasetFormat | null;
  rowCount: number;
  columnCount: number;
  columns: string[];
  /** Problems that reject the dataset. */
  errors: string[];
  /** Problems reported alongside an accepted dataset. */
  warnings: string[];
}

export interface DatasetRecord {
  datasetId: string;
  filename: string;
  size: number;
  contentRef: ContentID;
  validation: DatasetValidation;
  uploadedBy: Identity;
  uploadedAt: LogicalTime;
}

export interface FinalizeResult {
  model: ModelVersion;
  credited: Identity[];
  drained: number;
}

export type JournalEventType =
  | 'model.created'
  | 'model.advanced'
  | 'gradient.accepted'
  | 'version.finalized'
  | 'contributor.registered'
  | 'reputation.awarded'
  | 'session.transition'
  | 'dataset.registered';

export interface JournalEntry {
  seq: number;
  type: JournalEventType;
  at: LogicalTime;
  payload: Record<string, unknown>;
  prevHash: string;
  hash: string;
}

export interface JournalVerification {
  valid: boolean;
  length: number;
  head: string;
  brokenAt?: number;
}

/** Logical tables as persisted; any serialization preserving these keys is conformant. */
export interface CoordinatorSnapshot {
  clock: LogicalTime;
  models: ModelVersion[];
  pending: GradientSubmission[];
  contributors: Contributor[];
  sessions: TrainingSession[];
  /** Absent in snapshots written before datasets were tracked. */
  datasets?: DatasetRecord[];
  journal: JournalEntry[];
}

export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  timestamp: Date;
  requestId?: string;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded';
  uptime: number;
  components: Record<string, boolean>;
  activeSessions: number;
  latestVersion: number | null;
}
