import type { DateKey } from '../calendar/date-key.js';
import type { WorkflowDefinition } from '../parameters/workflow-definition.js';
import type { ComplexityLevel, ResourceType } from '../registry.js';
import type { Resource } from '../resources/resource.js';
import type { ResourcePool } from '../resources/resource-pool.js';
import type { EffortModel, StageBooking } from './effort-model.js';
import { type ProductionEvent, createProductionEvent } from './production-event.js';
import type { SimulationClock } from './simulation-clock.js';

export type ProcessState =
  | 'waiting-for-input'
  | 'awaiting-resource'
  | 'in-progress'
  | 'advancing'
  | 'complete';

/** Booking the conflict resolver made on the process's behalf. */
export interface Grant {
  readonly resource: Resource;
  readonly date: DateKey;
  readonly hours: number;
}

/** What a process needs from the simulator while it steps. */
export interface ProcessContext {
  readonly clock: SimulationClock;
  readonly pool: ResourcePool;
  readonly effort: EffortModel;
  nextRequestSeq(): number;
  /** Runs the conflict resolver for the process's stage; true when anything was assigned. */
  resolveConflict(process: ItemProcess): boolean;
  emit(event: ProductionEvent): void;
  recordStall(process: ItemProcess): void;
}

/**
 * One production item walking its workflow.
 *
 * `step` runs the item at the current simulated time and returns when it
 * next wants to wake, or null once the workflow is complete.
 */
export class ItemProcess {
  readonly projectId: string;
  readonly itemId: string;
  readonly workflow: WorkflowDefinition;
  readonly level: ComplexityLevel;
  readonly creativeInputDate: DateKey;
  /** Position among all scheduled items; breaks ties between wake-ups at the same time. */
  readonly registration: number;

  private currentState: ProcessState = 'waiting-for-input';
  private currentStage: string;
  private booking: StageBooking | null = null;
  private pendingGrant: Grant | null = null;
  private stageRequestSeq = -1;
  private stalls = 0;
  /** Bumped on every reschedule so stale queue entries are ignored. */
  generation = 0;

  constructor(fields: {
    projectId: string;
    itemId: string;
    workflow: WorkflowDefinition;
    level: ComplexityLevel;
    creativeInputDate: DateKey;
    registration: number;
  }) {
    this.projectId = fields.projectId;
    this.itemId = fields.itemId;
    this.workflow = fields.workflow;
    this.level = fields.level;
    this.creativeInputDate = fields.creativeInputDate;
    this.registration = fields.registration;
    this.currentStage = fields.workflow.firstStage;
  }

  get state(): ProcessState {
    return this.currentState;
  }

  get stage(): string {
    return this.currentStage;
  }

  get stallCount(): number {
    return this.stalls;
  }

  get requestSeq(): number {
    return this.stageRequestSeq;
  }

  get grant(): Grant | null {
    return this.pendingGrant;
  }

  get resourceType(): ResourceType {
    return this.workflow.getStage(this.currentStage).resourceType;
  }

  get bidHours(): number {
    return this.workflow.bidHours(this.currentStage, this.level);
  }

  /** A stalled process waiting on a resource, with no grant in hand. */
  isContending(): boolean {
    return this.currentState === 'awaiting-resource' && this.pendingGrant === null;
  }

  receiveGrant(grant: Grant): void {
    this.pendingGrant = grant;
  }

  step(ctx: ProcessContext): number | null {
    switch (this.currentState) {
      case 'waiting-for-input': {
        const inputDay = Math.max(0, ctx.clock.dayOf(this.creativeInputDate));
        if (ctx.clock.now < inputDay) return inputDay;
        this.enterStage(this.currentStage, ctx);
        return this.attemptStart(ctx);
      }
      case 'awaiting-resource':
        return this.attemptStart(ctx);
      case 'in-progress':
        return this.finishStage(ctx);
      case 'advancing':
      case 'complete':
        return null;
    }
  }

  private enterStage(stage: string, ctx: ProcessContext): void {
    this.currentStage = stage;
    this.currentState = 'awaiting-resource';
    this.stageRequestSeq = ctx.nextRequestSeq();
  }

  private attemptStart(ctx: ProcessContext): number {
    const now = ctx.clock.now;
    const date = ctx.clock.dateAt(now);

    let claimed = this.claim(ctx, date);
    if (claimed === null && ctx.resolveConflict(this)) {
      claimed = this.claim(ctx, date);
    }

    if (claimed === null) {
      this.stalls += 1;
      ctx.recordStall(this);
      return now + 1;
    }

    this.booking = ctx.effort.completeBooking(
      claimed.resource,
      ctx.clock,
      now,
      this.bidHours,
      claimed.hours,
    );
    this.currentState = 'in-progress';
    return this.booking.endDay;
  }

  /** Uses a grant for `date` when one is held, otherwise tries first fit. */
  private claim(ctx: ProcessContext, date: DateKey): { resource: Resource; hours: number } | null {
    const grant = this.pendingGrant;
    this.pendingGrant = null;
    if (grant !== null && grant.date === date) {
      return { resource: grant.resource, hours: grant.hours };
    }

    const bid = this.bidHours;
    const hours = ctx.effort.startHours(bid);
    const resource = ctx.pool.allocateResource(this.resourceType, date, hours, (candidate) =>
      ctx.effort.canComplete(candidate, date, bid, hours),
    );
    return resource === null ? null : { resource, hours };
  }

  private finishStage(ctx: ProcessContext): number | null {
    const booking = this.booking;
    if (booking === null) {
      throw new Error(`Item '${this.itemId}' finished stage '${this.currentStage}' without a booking`);
    }
    const stage = this.workflow.getStage(this.currentStage);

    ctx.emit(
      createProductionEvent({
        projectId: this.projectId,
        itemId: this.itemId,
        stage: stage.name,
        startTime: ctx.clock.timestampAt(booking.startDay),
        endTime: ctx.clock.timestampAt(booking.endDay),
        startDay: booking.startDay,
        endDay: booking.endDay,
        resourceId: booking.resource.id,
        resourceName: booking.resource.name,
        resourceType: booking.resource.type,
        effortHours: booking.hours,
        review: stage.review,
        approvalRequired: stage.approvalRequired,
      }),
    );

    this.booking = null;
    this.currentState = 'advancing';
    const next = this.workflow.getNextStage(this.currentStage);
    if (next === null) {
      this.currentState = 'complete';
      return null;
    }
    this.enterStage(next, ctx);
    return this.attemptStart(ctx);
  }
}
