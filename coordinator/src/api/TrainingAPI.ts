import express from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { TrainingCoordinator } from '../core/TrainingCoordinator';
import { asyncHandler, identityOf, parseBody, sendSuccess } from './http';

const StartSchema = z.object({
  modelRef: z.string().min(1),
  config: z.unknown(),
  autoRun: z.boolean().optional(),
  datasetRef: z.string().min(1).optional()
});

const FailSchema = z.object({
  reason: z.string().min(1).max(1024)
});

const ListQuerySchema = z.object({
  modelRef: z.string().optional(),
  state: z.enum(['created', 'running', 'paused', 'completed', 'stopped', 'failed']).optional()
});

/**
 * Session control, mounted at `/api/training`. Config validation happens in
 * the state machine so the HTTP and programmatic paths report the same errors.
 */
export class TrainingAPI {
  private router: express.Router;

  constructor(private readonly coordinator: TrainingCoordinator) {
    this.router = express.Router();
    this.setupRoutes();
  }

  getRouter(): express.Router {
    return this.router;
  }

  private setupRoutes(): void {
    this.router.post('/start', asyncHandler(this.start.bind(this)));
    this.router.get('/', asyncHandler(this.list.bind(this)));
    this.router.get('/:sessionId', asyncHandler(this.status.bind(this)));
    this.router.post('/:sessionId/run', asyncHandler(this.run.bind(this)));
    this.router.post('/:sessionId/pause', asyncHandler(this.pause.bind(this)));
    this.router.post('/:sessionId/resume', asyncHandler(this.resume.bind(this)));
    this.router.post('/:sessionId/stop', asyncHandler(this.stop.bind(this)));
    this.router.post('/:sessionId/epoch', asyncHandler(this.epoch.bind(this)));
    this.router.post('/:sessionId/fail', asyncHandler(this.fail.bind(this)));
  }

  private async start(req: Request, res: Response): Promise<void> {
    const { modelRef, config, autoRun, datasetRef } = parseBody(StartSchema, req.body);
    const session = await this.coordinator.startSession(modelRef, config, identityOf(res), { autoRun, datasetRef });
    sendSuccess(req, res, session, 201);
  }

  private async list(req: Request, res: Response): Promise<void> {
    const filter = parseBody(ListQuerySchema, req.query);
    sendSuccess(req, res, this.coordinator.listSessions(filter));
  }

  private async status(req: Request, res: Response): Promise<void> {
    sendSuccess(req, res, this.coordinator.sessionStatus(req.params.sessionId));
  }

  private async run(req: Request, res: Response): Promise<void> {
    sendSuccess(req, res, await this.coordinator.runSession(req.params.sessionId));
  }

  private async pause(req: Request, res: Response): Promise<void> {
    sendSuccess(req, res, await this.coordinator.pauseSession(req.params.sessionId));
  }

  private async resume(req: Request, res: Response): Promise<void> {
    sendSuccess(req, res, await this.coordinator.resumeSession(req.params.sessionId));
  }

  private async stop(req: Request, res: Response): Promise<void> {
    sendSuccess(req, res, await this.coordinator.stopSession(req.params.sessionId));
  }

  private async epoch(req: Request, res: Response): Promise<void> {
    sendSuccess(req, res, await this.coordinator.advanceEpoch(req.params.sessionId, req.body));
  }

  private async fail(req: Request, res: Response): Promise<void> {
    const { reason } = parseBody(FailSchema, req.body);
    sendSuccess(req, res, await this.coordinator.failSession(req.params.sessionId, reason));
  }
}
