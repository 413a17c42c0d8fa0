import express from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { TrainingCoordinator } from '../core/TrainingCoordinator';
import { ValidationError } from '../utils/errors';
import { asyncHandler, identityOf, parseBody, parseVersion, sendSuccess } from './http';

const SubmitSchema = z.object({
  modelVersion: z.number().int().positive(),
  gradientRef: z.string().min(1)
});

export class GradientsAPI {
  private router: express.Router;

  constructor(
    private readonly coordinator: TrainingCoordinator,
    private readonly maxUploadBytes: string = '50mb'
  ) {
    this.router = express.Router();
    this.setupRoutes();
  }

  getRouter(): express.Router {
    return this.router;
  }

  private setupRoutes(): void {
    this.router.post('/', asyncHandler(this.submit.bind(this)));
    this.router.post(
      '/:version/upload',
      express.raw({ type: 'application/octet-stream', limit: this.maxUploadBytes }),
      asyncHandler(this.upload.bind(this))
    );
    this.router.get('/:version', asyncHandler(this.listPending.bind(this)));
  }

  /** The contributor is always the authenticated caller. */
  private async submit(req: Request, res: Response): Promise<void> {
    const { modelVersion, gradientRef } = parseBody(SubmitSchema, req.body);
    const result = await this.coordinator.submitGradient(identityOf(res), modelVersion, gradientRef);
    sendSuccess(req, res, result, result.status === 'accepted' ? 201 : 200);
  }

  private async upload(req: Request, res: Response): Promise<void> {
    const version = parseVersion(req.params.version);
    const body: unknown = req.body;
    if (!Buffer.isBuffer(body) || body.length === 0) {
      throw new ValidationError('Gradient upload requires a non-empty application/octet-stream body');
    }
    const result = await this.coordinator.uploadGradient(identityOf(res), version, body);
    sendSuccess(req, res, result, result.status === 'accepted' ? 201 : 200);
  }

  private async listPending(req: Request, res: Response): Promise<void> {
    const version = parseVersion(req.params.version);
    sendSuccess(req, res, this.coordinator.listPending(version));
  }
}
