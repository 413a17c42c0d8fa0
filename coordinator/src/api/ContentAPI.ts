import express from 'express';
import type { Request, Response } from 'express';
import type { ContentStore } from '../storage/ContentStore';
import { ValidationError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { asyncHandler, sendSuccess } from './http';

/**
 * Thin proxy over the content store for clients that cannot reach it
 * directly. Mounted at `/api/content`.
 */
export class ContentAPI {
  private router: express.Router;
  private logger: Logger;

  constructor(
    private readonly store: ContentStore,
    private readonly maxUploadBytes: string = '50mb'
  ) {
    this.router = express.Router();
    this.logger = new Logger('ContentAPI');
    this.setupRoutes();
  }

  getRouter(): express.Router {
    return this.router;
  }

  private setupRoutes(): void {
    this.router.post(
      '/',
      express.raw({ type: 'application/octet-stream', limit: this.maxUploadBytes }),
      asyncHandler(this.upload.bind(this))
    );
    this.router.get('/:cid', asyncHandler(this.download.bind(this)));
  }

  private async upload(req: Request, res: Response): Promise<void> {
    const body: unknown = req.body;
    if (!Buffer.isBuffer(body) || body.length === 0) {
      throw new ValidationError('Upload requires a non-empty application/octet-stream body');
    }

    const cid = await this.store.put(body);
    this.logger.info(`Stored blob ${cid}`, { size: body.length });
    sendSuccess(req, res, { cid, size: body.length }, 201);
  }

  private async download(req: Request, res: Response): Promise<void> {
    const bytes = await this.store.get(req.params.cid);
    res.set('Content-Type', 'application/octet-stream');
    res.set('Content-Length', String(bytes.byteLength));
    res.status(200).send(Buffer.from(bytes));
  }
}
