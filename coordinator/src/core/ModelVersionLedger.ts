import type { ContentID, Identity, LogicalTime, ModelVersion } from '../types';
import { ModelNotFoundError } from '../utils/errors';

export interface CreateVersionInput {
  lineage: string;
  owner: Identity;
  weightsRef: ContentID;
  name?: string;
  parentVersion?: number;
}

/**
 * Ordered, append-only sequence of model versions. Version numbers are
 * global and strictly increasing; each version belongs to one lineage.
 *
 * Reads return copies. Only the aggregation engine and the coordinator's
 * create/advance operations call the mutating methods.
 */
export class ModelVersionLedger {
  private models = new Map<number, ModelVersion>();
  private lineages = new Map<string, number[]>();
  private lastVersion = 0;

  create(input: CreateVersionInput, at: LogicalTime): ModelVersion {
    const version = this.lastVersion + 1;
    const model: ModelVersion = {
      version,
      lineage: input.lineage,
      name: input.name,
      weightsRef: input.weightsRef,
      owner: input.owner,
      createdAt: at,
      updatedAt: at,
      gradientCount: 0,
      finalized: false,
      parentVersion: input.parentVersion
    };

    this.models.set(version, model);
    const history = this.lineages.get(input.lineage) ?? [];
    history.push(version);
    this.lineages.set(input.lineage, history);
    this.lastVersion = version;

    return { ...model };
  }

  get(version: number): ModelVersion | undefined {
    const model = this.models.get(version);
    return model ? { ...model } : undefined;
  }

  require(version: number): ModelVersion {
    const model = this.models.get(version);
    if (!model) {
      throw new ModelNotFoundError(version);
    }
    return { ...model };
  }

  has(version: number): boolean {
    return this.models.has(version);
  }

  latest(): ModelVersion | undefined {
    return this.get(this.lastVersion);
  }

  hasLineage(lineage: string): boolean {
    return this.lineages.has(lineage);
  }

  /** The newest version of a lineage; the only one that may be un-finalized. */
  frontier(lineage: string): ModelVersion | undefined {
    const history = this.lineages.get(lineage);
    if (!history || history.length === 0) {
      return undefined;
    }
    return this.get(history[history.length - 1]);
  }

  history(lineage: string): ModelVersion[] {
    const history = this.lineages.get(lineage) ?? [];
    return history.flatMap((version) => {
      const model = this.get(version);
      return model ? [model] : [];
    });
  }

  list(): ModelVersion[] {
    return [...this.models.values()].map((model) => ({ ...model }));
  }

  lineageIds(): string[] {
    return [...this.lineages.keys()];
  }

  get size(): number {
    return this.models.size;
  }

  incrementGradientCount(version: number): number {
    const model = this.models.get(version);
    if (!model) {
      throw new ModelNotFoundError(version);
    }
    model.gradientCount += 1;
    return model.gradientCount;
  }

  markFinalized(version: number, weightsRef: ContentID, at: LogicalTime): ModelVersion {
    const model = this.models.get(version);
    if (!model) {
      throw new ModelNotFoundError(version);
    }
    model.weightsRef = weightsRef;
    model.updatedAt = at;
    model.finalized = true;
    model.finalizedAt = at;
    return { ...model };
  }

  snapshot(): ModelVersion[] {
    return [...this.models.values()]
      .sort((a, b) => a.version - b.version)
      .map((model) => ({ ...model }));
  }

  restore(models: ModelVersion[]): void {
    this.models.clear();
    this.lineages.clear();
    this.lastVersion = 0;

    for (const model of [...models].sort((a, b) => a.version - b.version)) {
      this.models.set(model.version, { ...model });
      const history = this.lineages.get(model.lineage) ?? [];
      history.push(model.version);
      this.lineages.set(model.lineage, history);
      this.lastVersion = Math.max(this.lastVersion, model.version);
    }
  }
}
