import express from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { TrainingCoordinator } from '../core/TrainingCoordinator';
import { ValidationError } from '../utils/errors';
import { asyncHandler, identityOf, parseBody, sendSuccess } from './http';

const UPLOAD_TYPES = ['application/octet-stream', 'text/csv', 'text/plain'];

const FilenameQuerySchema = z.object({
  filename: z.string().min(1).max(255)
});

const ListQuerySchema = z.object({
  uploadedBy: z.string().optional()
});

function bodyBytes(req: Request): Buffer {
  const body: unknown = req.body;
  if (!Buffer.isBuffer(body) || body.length === 0) {
    throw new ValidationError(`Dataset upload requires a non-empty body of type ${UPLOAD_TYPES.join(', ')}`);
  }
  return body;
}

/**
 * Training datasets, mounted at `/api/datasets`. The file is sent as the raw
 * request body with its name in `?filename=`.
 */
export class DatasetsAPI {
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
    const raw = express.raw({ type: UPLOAD_TYPES, limit: this.maxUploadBytes });
    this.router.post('/validate', raw, asyncHandler(this.validate.bind(this)));
    this.router.post('/', raw, asyncHandler(this.upload.bind(this)));
    this.router.get('/', asyncHandler(this.list.bind(this)));
    this.router.get('/:datasetId', asyncHandler(this.get.bind(this)));
  }

  private async validate(req: Request, res: Response): Promise<void> {
    const { filename } = parseBody(FilenameQuerySchema, req.query);
    const bytes = bodyBytes(req);
    sendSuccess(req, res, {
      filename,
      size: bytes.length,
      validation: this.coordinator.validateDataset(filename, bytes)
    });
  }

  private async upload(req: Request, res: Response): Promise<void> {
    const { filename } = parseBody(FilenameQuerySchema, req.query);
    const record = await this.coordinator.uploadDataset(identityOf(res), filename, bodyBytes(req));
    sendSuccess(req, res, record, 201);
  }

  private async list(req: Request, res: Response): Promise<void> {
    const filter = parseBody(ListQuerySchema, req.query);
    sendSuccess(req, res, this.coordinator.listDatasets(filter));
  }

  private async get(req: Request, res: Response): Promise<void> {
    sendSuccess(req, res, this.coordinator.getDataset(req.params.datasetId));
  }
}
