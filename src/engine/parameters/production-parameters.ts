import { ConfigurationError, DuplicateIdError } from '../../lib/errors.js';
import type { BusinessCalendar } from '../calendar/business-calendar.js';
import { type DateKey, assertDateKey } from '../calendar/date-key.js';
import {
  type ComplexityLevel,
  type ResourceType,
  type TagRegistry,
  createComplexityRegistry,
  createResourceTypeRegistry,
} from '../registry.js';
import { type StageDefinitionInput, WorkflowDefinition } from './workflow-definition.js';

export interface ComplexityEntry {
  readonly level: ComplexityLevel;
  /** Per-stage effort notes recorded with the classification. */
  readonly details: Readonly<Record<string, number>>;
}

export const DEFAULT_WORKFLOW = 'asset_workflow';

/**
 * Static production configuration: calendars, creative-input dates,
 * delivery deadlines, complexity classifications and workflows.
 * Built by the caller; the simulator only reads it.
 */
export class ProductionParameters {
  readonly resourceTypes: TagRegistry<ResourceType>;
  readonly complexityLevels: TagRegistry<ComplexityLevel>;
  private readonly calendars = new Map<string, BusinessCalendar>();
  private readonly creativeInputs = new Map<string, DateKey>();
  private readonly deliveryDeadlines = new Map<string, DateKey>();
  private readonly complexity = new Map<string, ComplexityEntry>();
  private readonly workflows = new Map<string, WorkflowDefinition>();

  constructor(
    registries: {
      resourceTypes?: TagRegistry<ResourceType>;
      complexityLevels?: TagRegistry<ComplexityLevel>;
    } = {},
  ) {
    this.resourceTypes = registries.resourceTypes ?? createResourceTypeRegistry();
    this.complexityLevels = registries.complexityLevels ?? createComplexityRegistry();
  }

  // ── Calendars ───────────────────────────────────────────────────────────

  addResourceCalendar(name: string, calendar: BusinessCalendar): void {
    this.calendars.set(name, calendar);
  }

  getCalendar(name: string): BusinessCalendar {
    const calendar = this.calendars.get(name);
    if (!calendar) {
      throw new ConfigurationError(`Calendar '${name}' is not defined`);
    }
    return calendar;
  }

  // ── Dates ───────────────────────────────────────────────────────────────

  addCreativeInput(itemId: string, date: DateKey): void {
    this.creativeInputs.set(itemId, assertDateKey(date, 'creative input date'));
  }

  getCreativeInput(itemId: string): DateKey {
    const date = this.creativeInputs.get(itemId);
    if (date === undefined) {
      throw new ConfigurationError(`No creative input date registered for item '${itemId}'`, {
        itemId,
      });
    }
    return date;
  }

  setDeliveryDeadline(projectId: string, date: DateKey): void {
    this.deliveryDeadlines.set(projectId, assertDateKey(date, 'delivery deadline'));
  }

  getDeliveryDeadline(projectId: string): DateKey | null {
    return this.deliveryDeadlines.get(projectId) ?? null;
  }

  // ── Complexity ──────────────────────────────────────────────────────────

  defineComplexity(itemId: string, level: string, details: Record<string, number> = {}): void {
    this.complexity.set(itemId, {
      level: this.complexityLevels.resolve(level),
      details: Object.freeze({ ...details }),
    });
  }

  getComplexity(itemId: string): ComplexityEntry {
    const entry = this.complexity.get(itemId);
    if (!entry) {
      throw new ConfigurationError(`No complexity defined for item '${itemId}'`, { itemId });
    }
    return entry;
  }

  // ── Workflows ───────────────────────────────────────────────────────────

  createWorkflow(name: string, stages: readonly StageDefinitionInput[]): WorkflowDefinition {
    if (this.workflows.has(name)) {
      throw new DuplicateIdError('Workflow', name);
    }
    const workflow = new WorkflowDefinition(name, stages, {
      resourceTypes: this.resourceTypes,
      complexityLevels: this.complexityLevels,
    });
    this.workflows.set(name, workflow);
    return workflow;
  }

  getWorkflow(name: string): WorkflowDefinition {
    const workflow = this.workflows.get(name);
    if (!workflow) {
      throw new ConfigurationError(`Workflow '${name}' is not defined`, { workflow: name });
    }
    return workflow;
  }

  /** Bid for a stage at a complexity level; 0 when the workflow or stage is unknown. */
  getStageBid(workflowName: string, stage: string, level: string): number {
    const workflow = this.workflows.get(workflowName);
    if (!workflow || !workflow.hasStage(stage)) return 0;
    const resolved = this.complexityLevels.has(level) ? this.complexityLevels.resolve(level) : null;
    return workflow.bidHours(stage, resolved);
  }
}
