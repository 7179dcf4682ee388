import { type AppConfig, getAppConfig } from '../lib/config/simulation.js';
import { ValidationError } from '../lib/errors.js';
import type { EngineLogger } from '../lib/logger.js';
import { BusinessCalendar } from '../engine/calendar/business-calendar.js';
import { ProductionParameters, DEFAULT_WORKFLOW } from '../engine/parameters/production-parameters.js';
import type { StageDefinitionInput } from '../engine/parameters/workflow-definition.js';
import { DEFAULT_ASSET_WORKFLOW, DEFAULT_STUDIO_TEAMS, type TeamPreset } from '../engine/presets.js';
import { createComplexityRegistry, createResourceTypeRegistry } from '../engine/registry.js';
import { ResourcePool } from '../engine/resources/resource-pool.js';
import type { ProductionEvent } from '../engine/simulation/production-event.js';
import {
  type PendingItem,
  ProductionSimulator,
  type StallRecord,
} from '../engine/simulation/production-simulator.js';
import { type RunSummary, summarizeRun } from '../engine/simulation/run-summary.js';
import type { RunSimulationInput } from '../schemas/simulation.schema.js';

export type SimulationLimits = Pick<
  AppConfig,
  'defaultHorizonDays' | 'maxHorizonDays' | 'calendarScanLimitDays'
>;

export interface SimulationRunOutput {
  projectId: string;
  horizonDays: number;
  events: readonly ProductionEvent[];
  summary: RunSummary;
  stalls: readonly StallRecord[];
  pendingItems: readonly PendingItem[];
}

export interface SimulationDefaults {
  teams: readonly TeamPreset[];
  workflow: { name: string; stages: readonly StageDefinitionInput[] };
}

const STUDIO_CALENDAR = 'studio';

export class SimulationService {
  constructor(private readonly limits: () => SimulationLimits = getAppConfig) {}

  defaults(): SimulationDefaults {
    return {
      teams: DEFAULT_STUDIO_TEAMS,
      workflow: { name: DEFAULT_WORKFLOW, stages: DEFAULT_ASSET_WORKFLOW },
    };
  }

  /**
   * Build parameters and the resource pool described by a validated request.
   * Missing teams/resources and workflows fall back to the studio defaults.
   */
  buildScenario(input: RunSimulationInput): { params: ProductionParameters; pool: ResourcePool } {
    const { calendarScanLimitDays } = this.limits();
    const resourceTypes = createResourceTypeRegistry(input.resourceTypes);
    const complexityLevels = createComplexityRegistry(input.complexityLevels);

    const calendarName = input.calendar?.name ?? STUDIO_CALENDAR;
    const calendar = new BusinessCalendar(calendarName, {
      workDays: input.calendar?.workDays,
      holidays: input.calendar?.holidays,
      vacations: input.calendar?.vacations,
      scanLimitDays: calendarScanLimitDays,
    });

    const params = new ProductionParameters({ resourceTypes, complexityLevels });
    params.addResourceCalendar(calendarName, calendar);
    if (input.deliveryDeadline) {
      params.setDeliveryDeadline(input.projectId, input.deliveryDeadline);
    }

    const workflows = input.workflows ?? [{ name: DEFAULT_WORKFLOW, stages: [...DEFAULT_ASSET_WORKFLOW] }];
    for (const workflow of workflows) {
      params.createWorkflow(workflow.name, workflow.stages);
    }

    for (const item of input.items) {
      params.addCreativeInput(item.id, item.creativeInputDate);
      params.defineComplexity(item.id, item.complexity, item.details ?? {});
    }

    const pool = new ResourcePool(calendar, resourceTypes);
    const teams = input.teams ?? (input.resources ? [] : DEFAULT_STUDIO_TEAMS);
    for (const team of teams) {
      for (let n = 1; n <= team.size; n++) {
        pool.addResource(`${team.idPrefix}${n}`, team.name, team.resourceType);
      }
    }
    for (const r of input.resources ?? []) {
      const resource = pool.addResource(r.id, r.name, r.resourceType);
      for (const vacation of r.vacations ?? []) {
        resource.addVacation(vacation.start, vacation.end);
      }
    }

    return { params, pool };
  }

  run(input: RunSimulationInput, log?: EngineLogger): SimulationRunOutput {
    const { defaultHorizonDays, maxHorizonDays } = this.limits();
    const horizonDays = input.horizonDays ?? defaultHorizonDays;
    if (horizonDays > maxHorizonDays) {
      throw new ValidationError(`horizonDays must not exceed ${maxHorizonDays}`, {
        horizonDays,
        maxHorizonDays,
      });
    }

    const { params, pool } = this.buildScenario(input);
    const simulator = new ProductionSimulator(params, pool, {
      startDate: input.startDate,
      effortModel: input.effortModel,
      conflictPolicy: input.conflictPolicy,
      logger: log,
    });

    // One call per item keeps registration order equal to request order
    for (const item of input.items) {
      simulator.scheduleProduction(input.projectId, [item.id], item.workflow ?? DEFAULT_WORKFLOW);
    }

    const result = simulator.run(horizonDays);

    return {
      projectId: input.projectId,
      horizonDays,
      events: result.events,
      summary: summarizeRun(result, pool, params),
      stalls: result.stalls,
      pendingItems: result.pendingItems,
    };
  }
}

export const simulationService = new SimulationService();
