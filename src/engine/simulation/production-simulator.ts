import { ConfigurationError, ValidationError } from '../../lib/errors.js';
import { type EngineLogger, logger as rootLogger } from '../../lib/logger.js';
import { type DateKey, assertDateKey } from '../calendar/date-key.js';
import {
  type ConflictPolicy,
  type ConflictResolver,
  createConflictResolver,
} from '../conflicts/conflict-resolver.js';
import {
  DEFAULT_WORKFLOW,
  type ProductionParameters,
} from '../parameters/production-parameters.js';
import type { ResourceType } from '../registry.js';
import { DAILY_CAPACITY_HOURS } from '../resources/resource.js';
import type { ResourcePool } from '../resources/resource-pool.js';
import { type EffortMode, type EffortModel, createEffortModel } from './effort-model.js';
import { ItemProcess, type ProcessContext, type ProcessState } from './item-process.js';
import type { ProductionEvent } from './production-event.js';
import { SimulationClock } from './simulation-clock.js';
import { WakeQueue } from './wake-queue.js';

export interface SimulatorOptions {
  /** Calendar date of simulated day 0. */
  startDate: DateKey;
  effortModel?: EffortMode;
  conflictPolicy?: ConflictPolicy;
  logger?: EngineLogger;
}

export interface StallRecord {
  readonly projectId: string;
  readonly itemId: string;
  readonly stage: string;
  readonly resourceType: ResourceType;
  readonly day: number;
  readonly date: DateKey;
}

export interface PendingItem {
  readonly projectId: string;
  readonly itemId: string;
  readonly stage: string;
  readonly state: ProcessState;
  readonly stalls: number;
}

export interface SimulationResult {
  readonly startDate: DateKey;
  /** Simulated day the run stopped at. */
  readonly now: number;
  readonly events: readonly ProductionEvent[];
  readonly stalls: readonly StallRecord[];
  readonly completedItems: readonly string[];
  readonly pendingItems: readonly PendingItem[];
}

interface QueuedWake {
  readonly process: ItemProcess;
  readonly generation: number;
}

/**
 * Discrete-event production simulator.
 *
 * Each scheduled item is an ItemProcess driven from a single wake queue
 * keyed by (simulated time, registration order): everything due at a time
 * runs, earliest-registered item first, before the clock moves on. Pool bookings happen inside one process step,
 * so capacity checks and the bookings that follow them cannot interleave.
 */
export class ProductionSimulator {
  readonly params: ProductionParameters;
  readonly pool: ResourcePool;
  readonly clock: SimulationClock;
  readonly effort: EffortModel;
  readonly resolver: ConflictResolver;

  private readonly log: EngineLogger;
  private readonly queue = new WakeQueue<QueuedWake>();
  private readonly processes: ItemProcess[] = [];
  private readonly scheduledItems = new Set<string>();
  private readonly producedEvents: ProductionEvent[] = [];
  private readonly stallRecords: StallRecord[] = [];
  private requestCounter = 0;

  constructor(params: ProductionParameters, pool: ResourcePool, options: SimulatorOptions) {
    this.params = params;
    this.pool = pool;
    this.clock = new SimulationClock(assertDateKey(options.startDate, 'start date'));
    this.effort = createEffortModel(options.effortModel ?? 'WORKDAY');
    this.resolver = createConflictResolver(
      options.conflictPolicy ?? 'PRIORITY_MATCHING',
      pool,
      this.effort,
    );
    this.log = options.logger ?? rootLogger;
  }

  get now(): number {
    return this.clock.now;
  }

  get events(): readonly ProductionEvent[] {
    return [...this.producedEvents];
  }

  /**
   * Registers one process per item, starting at the current simulated time.
   * All items are validated before any is registered.
   */
  scheduleProduction(
    projectId: string,
    itemIds: readonly string[],
    workflowName: string = DEFAULT_WORKFLOW,
  ): void {
    const workflow = this.params.getWorkflow(workflowName);
    for (const type of workflow.resourceTypes()) {
      if (!this.pool.resourceTypes.has(type)) {
        throw new ConfigurationError(
          `Workflow '${workflow.name}' needs resource type '${type}', unknown to the pool`,
        );
      }
    }

    const seen = new Set<string>();
    const pending = itemIds.map((itemId, index) => {
      if (this.scheduledItems.has(itemId) || seen.has(itemId)) {
        throw new ConfigurationError(`Item '${itemId}' is already scheduled`, { itemId });
      }
      seen.add(itemId);
      return new ItemProcess({
        projectId,
        itemId,
        workflow,
        level: this.params.getComplexity(itemId).level,
        creativeInputDate: this.params.getCreativeInput(itemId),
        registration: this.processes.length + index,
      });
    });

    for (const process of pending) {
      if (this.effort.mode === 'LEGACY') {
        for (const stage of workflow.stageOrder) {
          const bid = workflow.bidHours(stage, process.level);
          if (bid > DAILY_CAPACITY_HOURS) {
            this.log.warn(
              { itemId: process.itemId, stage, bidHours: bid },
              'Stage bid exceeds one working day and can never be allocated',
            );
          }
        }
      }
      this.scheduledItems.add(process.itemId);
      this.processes.push(process);
      this.schedule(process, this.clock.now);
    }

    this.log.debug(
      { projectId, workflow: workflow.name, items: pending.length },
      'Production scheduled',
    );
  }

  /**
   * Processes every wake-up strictly before `until` (simulated days), then
   * leaves the clock at `until`. Can be called again with a later horizon.
   */
  run(until = 365): SimulationResult {
    if (!Number.isFinite(until) || until < this.clock.now) {
      throw new ValidationError(
        `Horizon ${until} must be a finite day not earlier than the current day ${this.clock.now}`,
      );
    }

    const ctx = this.context();
    for (;;) {
      const next = this.queue.peekTime();
      if (next === null || next >= until) break;

      const entry = this.queue.pop();
      if (entry === null) break;
      const { process, generation } = entry.value;
      if (generation !== process.generation) continue;

      this.clock.advanceTo(entry.time);
      const wake = process.step(ctx);
      if (wake !== null) this.schedule(process, wake);
    }
    this.clock.advanceTo(until);

    const result = this.snapshot();
    this.log.info(
      {
        days: result.now,
        events: result.events.length,
        completed: result.completedItems.length,
        pending: result.pendingItems.length,
      },
      'Simulation completed',
    );
    return result;
  }

  private schedule(process: ItemProcess, time: number): void {
    process.generation += 1;
    this.queue.push(time, process.registration, { process, generation: process.generation });
  }

  private context(): ProcessContext {
    return {
      clock: this.clock,
      pool: this.pool,
      effort: this.effort,
      nextRequestSeq: () => this.requestCounter++,
      resolveConflict: (process) => this.resolveConflict(process),
      emit: (event) => {
        this.producedEvents.push(event);
      },
      recordStall: (process) => this.recordStall(process),
    };
  }

  private resolveConflict(requester: ItemProcess): boolean {
    const type = requester.resourceType;
    const date = this.clock.dateAt();
    const contenders = this.processes.filter(
      (p) => p.isContending() && p.resourceType === type,
    );

    const resolution = this.resolver.resolve({
      resourceType: type,
      date,
      tasks: contenders.map((p) => ({
        itemId: p.itemId,
        stage: p.stage,
        requestSeq: p.requestSeq,
        bidHours: p.bidHours,
      })),
    });

    for (const assignment of resolution.assignments) {
      const target = contenders.find((p) => p.itemId === assignment.itemId);
      if (!target) continue;
      target.receiveGrant({
        resource: assignment.resource,
        date: assignment.date,
        hours: assignment.hours,
      });
      // Others were parked until a later retry; bring them back now
      if (target !== requester) this.schedule(target, this.clock.now);

      this.log.debug(
        {
          itemId: assignment.itemId,
          resourceId: assignment.resource.id,
          hours: assignment.hours,
          rank: assignment.rank,
        },
        'Conflict resolved',
      );
    }

    return resolution.resolved;
  }

  private recordStall(process: ItemProcess): void {
    const record: StallRecord = {
      projectId: process.projectId,
      itemId: process.itemId,
      stage: process.stage,
      resourceType: process.resourceType,
      day: this.clock.now,
      date: this.clock.dateAt(),
    };
    this.stallRecords.push(record);
    this.log.warn(
      { itemId: record.itemId, stage: record.stage, date: record.date },
      'Item stalled waiting for a resource',
    );
  }

  private snapshot(): SimulationResult {
    const completed = this.processes.filter((p) => p.state === 'complete');
    const pending = this.processes.filter((p) => p.state !== 'complete');

    return {
      startDate: this.clock.startDate,
      now: this.clock.now,
      events: this.events,
      stalls: [...this.stallRecords],
      completedItems: completed.map((p) => p.itemId),
      pendingItems: pending.map((p) => ({
        projectId: p.projectId,
        itemId: p.itemId,
        stage: p.stage,
        state: p.state,
        stalls: p.stallCount,
      })),
    };
  }
}
