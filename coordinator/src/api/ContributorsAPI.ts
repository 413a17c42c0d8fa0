import express from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { TrainingCoordinator } from '../core/TrainingCoordinator';
import { asyncHandler, identityOf, parseBody, sendSuccess } from './http';

const LeaderboardQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).optional()
});

const AwardSchema = z.object({
  amount: z.number().int().positive()
});

const ContributionSchema = z.object({
  reward: z.number().int().nonnegative()
});

export class ContributorsAPI {
  private router: express.Router;

  constructor(private readonly coordinator: TrainingCoordinator) {
    this.router = express.Router();
    this.setupRoutes();
  }

  getRouter(): express.Router {
    return this.router;
  }

  private setupRoutes(): void {
    this.router.post('/register', asyncHandler(this.register.bind(this)));
    this.router.get('/leaderboard', asyncHandler(this.leaderboard.bind(this)));
    this.router.get('/:identity', asyncHandler(this.get.bind(this)));
    this.router.post('/:identity/award', asyncHandler(this.award.bind(this)));
    this.router.post('/:identity/contributions', asyncHandler(this.recordContribution.bind(this)));
  }

  private async register(req: Request, res: Response): Promise<void> {
    sendSuccess(req, res, await this.coordinator.registerContributor(identityOf(res)));
  }

  private async leaderboard(req: Request, res: Response): Promise<void> {
    const { limit } = parseBody(LeaderboardQuerySchema, req.query);
    const ranked = this.coordinator.leaderboard(limit).map((contributor, index) => ({
      rank: index + 1,
      ...contributor
    }));
    sendSuccess(req, res, ranked);
  }

  private async get(req: Request, res: Response): Promise<void> {
    sendSuccess(req, res, this.coordinator.getContributor(req.params.identity));
  }

  private async award(req: Request, res: Response): Promise<void> {
    const { amount } = parseBody(AwardSchema, req.body);
    const contributor = await this.coordinator.awardReputation(identityOf(res), req.params.identity, amount);
    sendSuccess(req, res, contributor);
  }

  private async recordContribution(req: Request, res: Response): Promise<void> {
    const { reward } = parseBody(ContributionSchema, req.body);
    const contributor = await this.coordinator.recordContribution(identityOf(res), req.params.identity, reward);
    sendSuccess(req, res, contributor);
  }
}
