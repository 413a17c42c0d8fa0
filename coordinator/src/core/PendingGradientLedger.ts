import type { ContentID, GradientSubmission, Identity, SubmitResult } from '../types';
import { StaleVersionError, UnknownModelVersionError } from '../utils/errors';
import { LogicalClock } from '../utils/LogicalClock';
import { ModelVersionLedger } from './ModelVersionLedger';

function submissionKey(contributor: Identity, gradientRef: ContentID): string {
  return JSON.stringify([contributor, gradientRef]);
}

/**
 * Per-version pending sets, kept apart from the version table and keyed by
 * version number. Admission is a synchronous append, so it cannot interleave
 * with the synchronous body of a finalize.
 */
export class PendingGradientLedger {
  private sets = new Map<number, GradientSubmission[]>();
  private keys = new Map<number, Set<string>>();

  constructor(
    private readonly models: ModelVersionLedger,
    private readonly clock: LogicalClock
  ) {}

  submit(contributor: Identity, modelVersion: number, gradientRef: ContentID): SubmitResult {
    const model = this.models.get(modelVersion);
    if (!model) {
      throw new UnknownModelVersionError(modelVersion);
    }
    if (model.finalized) {
      throw new StaleVersionError(modelVersion);
    }

    const key = submissionKey(contributor, gradientRef);
    if (this.keys.get(modelVersion)?.has(key)) {
      const existing = this.sets.get(modelVersion)?.find(
        (submission) => submission.contributor === contributor && submission.gradientRef === gradientRef
      );
      if (existing) {
        return { status: 'duplicate', submission: { ...existing } };
      }
    }

    const submission: GradientSubmission = {
      contributor,
      modelVersion,
      gradientRef,
      timestamp: this.clock.tick()
    };

    this.append(submission);
    this.models.incrementGradientCount(modelVersion);

    return { status: 'accepted', submission: { ...submission } };
  }

  listPending(modelVersion: number): GradientSubmission[] {
    if (!this.models.has(modelVersion)) {
      throw new UnknownModelVersionError(modelVersion);
    }
    return (this.sets.get(modelVersion) ?? []).map((submission) => ({ ...submission }));
  }

  pendingCount(modelVersion: number): number {
    return this.sets.get(modelVersion)?.length ?? 0;
  }

  /** Pending submissions per version for one contributor. */
  countsFor(contributor: Identity): Record<number, number> {
    const counts: Record<number, number> = {};
    for (const [version, submissions] of this.sets) {
      const count = submissions.filter((submission) => submission.contributor === contributor).length;
      if (count > 0) {
        counts[version] = count;
      }
    }
    return counts;
  }

  /** Removes and returns the whole pending set. Finalize only. */
  drain(modelVersion: number): GradientSubmission[] {
    const drained = this.sets.get(modelVersion) ?? [];
    this.sets.delete(modelVersion);
    this.keys.delete(modelVersion);
    return drained;
  }

  snapshot(): GradientSubmission[] {
    return [...this.sets.values()]
      .flat()
      .sort((a, b) => a.timestamp - b.timestamp)
      .map((submission) => ({ ...submission }));
  }

  restore(submissions: GradientSubmission[]): void {
    this.sets.clear();
    this.keys.clear();
    for (const submission of [...submissions].sort((a, b) => a.timestamp - b.timestamp)) {
      this.append({ ...submission });
    }
  }

  private append(submission: GradientSubmission): void {
    const set = this.sets.get(submission.modelVersion) ?? [];
    set.push(submission);
    this.sets.set(submission.modelVersion, set);

    const keys = this.keys.get(submission.modelVersion) ?? new Set<string>();
    keys.add(submissionKey(submission.contributor, submission.gradientRef));
    this.keys.set(submission.modelVersion, keys);
  }
}
