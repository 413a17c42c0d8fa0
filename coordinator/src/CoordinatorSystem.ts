import express from 'express';
import type { Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createServer, Server as HttpServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { z } from 'zod';
import type { CoordinatorConfig } from './config';
import { ContentAPI } from './api/ContentAPI';
import { ContributorsAPI } from './api/ContributorsAPI';
import { DatasetsAPI } from './api/DatasetsAPI';
import { GradientsAPI } from './api/GradientsAPI';
import { ModelsAPI } from './api/ModelsAPI';
import { TrainingAPI } from './api/TrainingAPI';
import { asyncHandler, createErrorHandler, parseBody, sendSuccess } from './api/http';
import { Web3ContributionAnchor, type ContributionAnchor } from './blockchain/ContributionAnchor';
import { CoordinationContext } from './core/CoordinationContext';
import type { TransitionEvent } from './core/SessionStateMachine';
import { TrainingCoordinator } from './core/TrainingCoordinator';
import type { GradientAggregator } from './core/GradientAggregator';
import { HttpContentStore, MemoryContentStore, type ContentStore } from './storage/ContentStore';
import { FileStateStore, type StateStore } from './storage/StateStore';
import { createAuthMiddleware } from './middleware/AuthMiddleware';
import { createRateLimit, type RateLimit } from './middleware/RateLimitMiddleware';
import type { FinalizeResult, GradientSubmission, HealthStatus, ModelVersion } from './types';
import { Logger } from './utils/Logger';

export interface SystemOverrides {
  contentStore?: ContentStore;
  stateStore?: StateStore | null;
  anchor?: ContributionAnchor | null;
  aggregator?: GradientAggregator;
}

const JournalQuerySchema = z.object({
  type: z
    .enum([
      'model.created',
      'model.advanced',
      'gradient.accepted',
      'version.finalized',
      'contributor.registered',
      'reputation.awarded',
      'session.transition',
      'dataset.registered'
    ])
    .optional(),
  since: z.coerce.number().int().nonnegative().optional(),
  limit: z.coerce.number().int().positive().max(1000).optional()
});

export function buildCoordinator(config: CoordinatorConfig, overrides: SystemOverrides = {}): TrainingCoordinator {
  const context = new CoordinationContext({
    adminIdentity: config.adminIdentity,
    contributionReward: config.contributionReward
  });

  const contentStore =
    overrides.contentStore ??
    (config.contentStore.publisherUrl
      ? new HttpContentStore({
          publisherUrl: config.contentStore.publisherUrl,
          aggregatorUrl: config.contentStore.aggregatorUrl,
          timeoutMs: config.contentStore.timeoutMs,
          retries: config.contentStore.retries
        })
      : new MemoryContentStore());

  const stateStore =
    overrides.stateStore === undefined
      ? config.stateFile
        ? new FileStateStore(config.stateFile)
        : undefined
      : overrides.stateStore ?? undefined;

  const anchor =
    overrides.anchor === undefined ? new Web3ContributionAnchor(config.chain) : overrides.anchor ?? undefined;

  return new TrainingCoordinator({
    context,
    contentStore,
    stateStore,
    anchor,
    aggregator: overrides.aggregator
  });
}

/**
 * HTTP + WebSocket host for the coordinator.
 */
export class CoordinatorSystem {
  readonly app: express.Application;
  readonly coordinator: TrainingCoordinator;
  private server: HttpServer;
  private io: SocketIOServer;
  private rateLimit: RateLimit;
  private logger: Logger;
  private startedAt = Date.now();

  constructor(private readonly config: CoordinatorConfig, overrides: SystemOverrides = {}) {
    this.app = express();
    this.server = createServer(this.app);
    this.io = new SocketIOServer(this.server, {
      cors: {
        origin: config.allowedOrigins,
        methods: ['GET', 'POST']
      }
    });
    this.logger = new Logger('CoordinatorSystem');
    this.coordinator = buildCoordinator(config, overrides);
    this.rateLimit = createRateLimit(config.rateLimit);

    this.setupMiddleware();
    this.setupRoutes();
    this.setupWebSocketHandlers();
    this.forwardCoordinatorEvents();
  }

  private setupMiddleware(): void {
    this.app.use(helmet());
    this.app.use(cors({
      origin: this.config.allowedOrigins,
      credentials: true
    }));
    this.app.use(express.json({ limit: '1mb' }));

    this.app.use('/api', createAuthMiddleware(this.config.jwtSecret));
    this.app.use('/api', this.rateLimit.middleware);

    this.app.use((req, res, next) => {
      this.logger.debug(`${req.method} ${req.path}`, {
        ip: req.ip,
        userAgent: req.get('User-Agent'),
        identity: res.locals.identity
      });
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/health', asyncHandler(this.healthCheck.bind(this)));

    this.app.use('/api/models', new ModelsAPI(this.coordinator).getRouter());
    this.app.use('/api/gradients', new GradientsAPI(this.coordinator).getRouter());
    this.app.use('/api/training', new TrainingAPI(this.coordinator).getRouter());
    this.app.use('/api/contributors', new ContributorsAPI(this.coordinator).getRouter());
    this.app.use('/api/datasets', new DatasetsAPI(this.coordinator).getRouter());
    this.app.use('/api/content', new ContentAPI(this.coordinator.contentStore).getRouter());

    this.app.get('/api/journal', asyncHandler(this.getJournal.bind(this)));
    this.app.get('/api/journal/verify', asyncHandler(this.verifyJournal.bind(this)));
    this.app.get('/api/blockchain/anchors', asyncHandler(this.getAnchors.bind(this)));

    this.app.use(createErrorHandler(this.logger));
  }

  private setupWebSocketHandlers(): void {
    this.io.on('connection', (socket) => {
      this.logger.debug(`Client connected: ${socket.id}`);

      socket.on('join-session', (sessionId: unknown) => {
        if (typeof sessionId === 'string') {
          void socket.join(`session-${sessionId}`);
        }
      });

      socket.on('leave-session', (sessionId: unknown) => {
        if (typeof sessionId === 'string') {
          void socket.leave(`session-${sessionId}`);
        }
      });

      socket.on('join-lineage', (lineage: unknown) => {
        if (typeof lineage === 'string') {
          void socket.join(`lineage-${lineage}`);
        }
      });

      socket.on('leave-lineage', (lineage: unknown) => {
        if (typeof lineage === 'string') {
          void socket.leave(`lineage-${lineage}`);
        }
      });

      socket.on('disconnect', () => {
        this.logger.debug(`Client disconnected: ${socket.id}`);
      });
    });
  }

  private forwardCoordinatorEvents(): void {
    this.coordinator.on('session-transition', (event: TransitionEvent) => {
      this.io.to(`session-${event.session.sessionId}`).emit('session-transition', event);
      this.io.to(`lineage-${event.session.modelRef}`).emit('session-transition', event);
    });

    this.coordinator.on('gradient-accepted', (submission: GradientSubmission) => {
      const model = this.coordinator.context.models.get(submission.modelVersion);
      if (model) {
        this.io.to(`lineage-${model.lineage}`).emit('gradient-accepted', submission);
      }
    });

    this.coordinator.on('version-finalized', (result: FinalizeResult) => {
      this.io.to(`lineage-${result.model.lineage}`).emit('version-finalized', result);
    });

    this.coordinator.on('version-advanced', (model: ModelVersion) => {
      this.io.to(`lineage-${model.lineage}`).emit('version-advanced', model);
    });
  }

  private async healthCheck(req: Request, res: Response): Promise<void> {
    const components = await this.coordinator.componentHealth();
    const healthy = Object.values(components).every(Boolean);
    const health: HealthStatus = {
      status: healthy ? 'healthy' : 'degraded',
      uptime: (Date.now() - this.startedAt) / 1000,
      components,
      activeSessions: this.coordinator.context.sessions.activeCount,
      latestVersion: this.coordinator.latestModel()?.version ?? null
    };
    sendSuccess(req, res, health, healthy ? 200 : 503);
  }

  private async getJournal(req: Request, res: Response): Promise<void> {
    const query = parseBody(JournalQuerySchema, req.query);
    sendSuccess(req, res, {
      entries: this.coordinator.journalEntries(query),
      verification: this.coordinator.verifyJournal()
    });
  }

  private async verifyJournal(req: Request, res: Response): Promise<void> {
    sendSuccess(req, res, this.coordinator.verifyJournal());
  }

  private async getAnchors(req: Request, res: Response): Promise<void> {
    sendSuccess(req, res, this.coordinator.anchors());
  }

  /** Resolves with the bound port (useful with port 0). */
  public async start(port: number = this.config.port): Promise<number> {
    await this.coordinator.initialize();

    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, () => {
        const address = this.server.address();
        const boundPort = address && typeof address === 'object' ? address.port : port;
        this.logger.info(`Gradient coordinator started on port ${boundPort}`);
        resolve(boundPort);
      });
    });
  }

  public async stop(): Promise<void> {
    this.logger.info('Shutting down gradient coordinator...');

    await this.coordinator.flush();
    this.coordinator.dispose();
    await this.rateLimit.close();
    await new Promise<void>((resolve) => {
      this.io.close(() => resolve());
    });
    if (this.server.listening) {
      await new Promise<void>((resolve, reject) => {
        this.server.close((error) => (error ? reject(error) : resolve()));
      });
    }

    this.logger.info('Gradient coordinator shut down complete');
  }
}
