import express from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { TrainingCoordinator } from '../core/TrainingCoordinator';
import { ModelNotFoundError } from '../utils/errors';
import { asyncHandler, identityOf, parseBody, parseVersion, sendSuccess } from './http';

const CreateModelSchema = z.object({
  weightsRef: z.string().min(1),
  lineage: z.string().min(1).max(128).optional(),
  name: z.string().min(1).max(256).optional()
});

const FinalizeSchema = z.object({
  weightsRef: z.string().min(1),
  sessionId: z.string().min(1).optional()
});

const AggregateSchema = z.object({
  sessionId: z.string().min(1).optional(),
  learningRate: z.number().positive().optional()
});

/**
 * Model version ledger and finalize endpoints, mounted at `/api/models`.
 */
export class ModelsAPI {
  private router: express.Router;

  constructor(private readonly coordinator: TrainingCoordinator) {
    this.router = express.Router();
    this.setupRoutes();
  }

  getRouter(): express.Router {
    return this.router;
  }

  private setupRoutes(): void {
    this.router.post('/', asyncHandler(this.createModel.bind(this)));
    this.router.get('/latest', asyncHandler(this.getLatest.bind(this)));
    this.router.get('/lineage/:lineage', asyncHandler(this.getLineage.bind(this)));
    this.router.post('/lineage/:lineage/advance', asyncHandler(this.advance.bind(this)));
    this.router.get('/:version', asyncHandler(this.getVersion.bind(this)));
    this.router.post('/:version/finalize', asyncHandler(this.finalize.bind(this)));
    this.router.post('/:version/aggregate', asyncHandler(this.aggregate.bind(this)));
  }

  private async createModel(req: Request, res: Response): Promise<void> {
    const input = parseBody(CreateModelSchema, req.body);
    const model = await this.coordinator.createModel(identityOf(res), input);
    sendSuccess(req, res, model, 201);
  }

  private async getLatest(req: Request, res: Response): Promise<void> {
    const model = this.coordinator.latestModel();
    if (!model) {
      throw new ModelNotFoundError('latest');
    }
    sendSuccess(req, res, model);
  }

  private async getLineage(req: Request, res: Response): Promise<void> {
    const history = this.coordinator.lineageHistory(req.params.lineage);
    if (history.length === 0) {
      throw new ModelNotFoundError(req.params.lineage);
    }
    sendSuccess(req, res, history);
  }

  private async advance(req: Request, res: Response): Promise<void> {
    const model = await this.coordinator.advanceVersion(req.params.lineage, identityOf(res));
    sendSuccess(req, res, model, 201);
  }

  private async getVersion(req: Request, res: Response): Promise<void> {
    sendSuccess(req, res, this.coordinator.getModel(parseVersion(req.params.version)));
  }

  private async finalize(req: Request, res: Response): Promise<void> {
    const version = parseVersion(req.params.version);
    const { weightsRef, sessionId } = parseBody(FinalizeSchema, req.body);
    const result = await this.coordinator.finalize(version, weightsRef, identityOf(res), { sessionId });
    sendSuccess(req, res, result);
  }

  private async aggregate(req: Request, res: Response): Promise<void> {
    const version = parseVersion(req.params.version);
    const options = parseBody(AggregateSchema, req.body ?? {});
    const result = await this.coordinator.aggregateAndFinalize(version, identityOf(res), options);
    sendSuccess(req, res, result);
  }
}
