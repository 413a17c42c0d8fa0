import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { OPTIMIZER_KINDS, type CoordinatorSnapshot } from '../types';
import { Logger } from '../utils/Logger';

const SessionStateSchema = z.enum(['created', 'running', 'paused', 'completed', 'stopped', 'failed']);

const SnapshotSchema: z.ZodType<CoordinatorSnapshot> = z.object({
  clock: z.number().int().nonnegative(),
  models: z.array(
    z.object({
      version: z.number().int().positive(),
      lineage: z.string(),
      name: z.string().optional(),
      weightsRef: z.string(),
      owner: z.string(),
      createdAt: z.number(),
      updatedAt: z.number(),
      gradientCount: z.number().int().nonnegative(),
      finalized: z.boolean(),
      finalizedAt: z.number().optional(),
      parentVersion: z.number().int().optional()
    })
  ),
  pending: z.array(
    z.object({
      contributor: z.string(),
      modelVersion: z.number().int().positive(),
      gradientRef: z.string(),
      timestamp: z.number()
    })
  ),
  contributors: z.array(
    z.object({
      identity: z.string(),
      reputation: z.number().int().nonnegative(),
      contributions: z.number().int().nonnegative(),
      lastContributionAt: z.number().optional(),
      registeredAt: z.number(),
      registrationOrder: z.number().int().positive()
    })
  ),
  sessions: z.array(
    z.object({
      sessionId: z.string(),
      modelRef: z.string(),
      config: z.object({
        epochs: z.number(),
        batchSize: z.number(),
        learningRate: z.number(),
        optimizer: z.enum(OPTIMIZER_KINDS),
        validationSplit: z.number()
      }),
      state: SessionStateSchema,
      currentEpoch: z.number().int().nonnegative(),
      metricsHistory: z.array(z.object({ epoch: z.number(), loss: z.number(), accuracy: z.number() })),
      transitions: z.array(
        z.object({
          from: SessionStateSchema.nullable(),
          to: SessionStateSchema,
          at: z.number(),
          reason: z.string().optional()
        })
      ),
      failureReason: z.string().optional(),
      datasetRef: z.string().optional(),
      createdBy: z.string(),
      createdAt: z.number(),
      updatedAt: z.number()
    })
  ),
  datasets: z
    .array(
      z.object({
        datasetId: z.string(),
        filename: z.string(),
        size: z.number().int().nonnegative(),
        contentRef: z.string(),
        validation: z.object({
          isValid: z.boolean(),
          format: z.enum(['csv', 'json']).nullable(),
          rowCount: z.number().int().nonnegative(),
          columnCount: z.number().int().nonnegative(),
          columns: z.array(z.string()),
          errors: z.array(z.string()),
          warnings: z.array(z.string())
        }),
        uploadedBy: z.string(),
        uploadedAt: z.number()
      })
    )
    .optional(),
  journal: z.array(
    z.object({
      seq: z.number().int().positive(),
      type: z.enum([
        'model.created',
        'model.advanced',
        'gradient.accepted',
        'version.finalized',
        'contributor.registered',
        'reputation.awarded',
        'session.transition',
        'dataset.registered'
      ]),
      at: z.number(),
      payload: z.record(z.unknown()),
      prevHash: z.string(),
      hash: z.string()
    })
  )
});

export interface StateStore {
  load(): Promise<CoordinatorSnapshot | null>;
  save(snapshot: CoordinatorSnapshot): Promise<void>;
}

export class MemoryStateStore implements StateStore {
  private current: string | null = null;

  async load(): Promise<CoordinatorSnapshot | null> {
    return this.current ? SnapshotSchema.parse(JSON.parse(this.current)) : null;
  }

  async save(snapshot: CoordinatorSnapshot): Promise<void> {
    this.current = JSON.stringify(snapshot);
  }
}

/**
 * JSON snapshot on disk. Writes go to a temp file that is then renamed over
 * the target, so a crash leaves either the previous or the next snapshot.
 */
export class FileStateStore implements StateStore {
  private logger = new Logger('FileStateStore');

  constructor(private readonly filePath: string) {}

  async load(): Promise<CoordinatorSnapshot | null> {
    if (!(await fs.pathExists(this.filePath))) {
      this.logger.info(`No snapshot at ${this.filePath}, starting empty`);
      return null;
    }
    const raw: unknown = await fs.readJson(this.filePath);
    const snapshot = SnapshotSchema.parse(raw);
    this.logger.info(`Loaded snapshot from ${this.filePath}`, {
      models: snapshot.models.length,
      sessions: snapshot.sessions.length,
      journal: snapshot.journal.length
    });
    return snapshot;
  }

  async save(snapshot: CoordinatorSnapshot): Promise<void> {
    await fs.ensureDir(path.dirname(this.filePath));
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeJson(tempPath, snapshot, { spaces: 2 });
    await fs.move(tempPath, this.filePath, { overwrite: true });
  }
}

/**
 * Serializes saves and coalesces bursts: while one write is in flight,
 * further requests collapse into a single follow-up write of the latest state.
 */
export class SnapshotWriter {
  private inFlight: Promise<void> | null = null;
  private dirty = false;
  private logger = new Logger('SnapshotWriter');

  constructor(
    private readonly store: StateStore,
    private readonly capture: () => CoordinatorSnapshot
  ) {}

  schedule(): Promise<void> {
    this.dirty = true;
    if (!this.inFlight) {
      this.inFlight = this.drain().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  async flush(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  private async drain(): Promise<void> {
    while (this.dirty) {
      this.dirty = false;
      try {
        await this.store.save(this.capture());
      } catch (error) {
        this.logger.error('Failed to persist coordinator snapshot:', error);
        throw error;
      }
    }
  }
}
