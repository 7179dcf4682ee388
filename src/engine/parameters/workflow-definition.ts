import { ConfigurationError } from '../../lib/errors.js';
import type { ComplexityLevel, ResourceType, TagRegistry } from '../registry.js';

export interface StageDefinitionInput {
  name: string;
  /** Effort in hours when no complexity override applies. */
  defaultHours: number;
  /** Effort by complexity level. */
  overrides?: Record<string, number>;
  resourceType: string;
  review?: boolean;
  approvalRequired?: boolean;
}

export interface StageDefinition {
  readonly name: string;
  readonly defaultHours: number;
  readonly overrides: ReadonlyMap<ComplexityLevel, number>;
  readonly resourceType: ResourceType;
  /** Carried onto events for reporting; the engine does not gate on these. */
  readonly review: boolean;
  readonly approvalRequired: boolean;
}

function assertEffort(workflow: string, stage: string, hours: number): number {
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new ConfigurationError(
      `Stage '${stage}' of workflow '${workflow}' needs a positive effort, got ${hours}`,
      { workflow, stage },
    );
  }
  return hours;
}

/**
 * Ordered list of stages. The order is the state machine: an item moves
 * from each stage to the next one declared, and completes after the last.
 */
export class WorkflowDefinition {
  readonly name: string;
  readonly stageOrder: readonly string[];
  private readonly stages: ReadonlyMap<string, StageDefinition>;

  constructor(
    name: string,
    stages: readonly StageDefinitionInput[],
    registries: {
      resourceTypes: TagRegistry<ResourceType>;
      complexityLevels: TagRegistry<ComplexityLevel>;
    },
  ) {
    if (stages.length === 0) {
      throw new ConfigurationError(`Workflow '${name}' must have at least one stage`);
    }

    const byName = new Map<string, StageDefinition>();
    for (const input of stages) {
      if (byName.has(input.name)) {
        throw new ConfigurationError(`Workflow '${name}' declares stage '${input.name}' twice`);
      }

      const overrides = new Map<ComplexityLevel, number>();
      for (const [level, hours] of Object.entries(input.overrides ?? {})) {
        overrides.set(
          registries.complexityLevels.resolve(level),
          assertEffort(name, input.name, hours),
        );
      }

      byName.set(input.name, {
        name: input.name,
        defaultHours: assertEffort(name, input.name, input.defaultHours),
        overrides,
        resourceType: registries.resourceTypes.resolve(input.resourceType),
        review: input.review ?? false,
        approvalRequired: input.approvalRequired ?? false,
      });
    }

    this.name = name;
    this.stages = byName;
    this.stageOrder = Object.freeze(stages.map((s) => s.name));
  }

  get firstStage(): string {
    return this.stageOrder[0];
  }

  hasStage(stage: string): boolean {
    return this.stages.has(stage);
  }

  getStage(stage: string): StageDefinition {
    const def = this.stages.get(stage);
    if (!def) {
      throw new ConfigurationError(`Workflow '${this.name}' has no stage '${stage}'`);
    }
    return def;
  }

  getStages(): StageDefinition[] {
    return this.stageOrder.map((s) => this.getStage(s));
  }

  /** Stage after `stage`, or null when `stage` is the last one. */
  getNextStage(stage: string): string | null {
    const idx = this.stageOrder.indexOf(stage);
    if (idx === -1) {
      throw new ConfigurationError(`Workflow '${this.name}' has no stage '${stage}'`);
    }
    return idx < this.stageOrder.length - 1 ? this.stageOrder[idx + 1] : null;
  }

  /** Complexity override when the level has one, else the stage default. */
  bidHours(stage: string, level: ComplexityLevel | null): number {
    const def = this.getStage(stage);
    if (level !== null) {
      const override = def.overrides.get(level);
      if (override !== undefined) return override;
    }
    return def.defaultHours;
  }

  resourceTypes(): ResourceType[] {
    return [...new Set(this.getStages().map((s) => s.resourceType))];
  }
}
