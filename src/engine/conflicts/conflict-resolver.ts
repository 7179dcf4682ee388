import type { DateKey } from '../calendar/date-key.js';
import type { ResourceType } from '../registry.js';
import type { Resource } from '../resources/resource.js';
import type { ResourcePool } from '../resources/resource-pool.js';
import type { EffortModel } from '../simulation/effort-model.js';
import { solveMinCostMatching } from './min-cost-matching.js';

export type ConflictPolicy = 'PRIORITY_MATCHING' | 'FIRST_FIT';

/** An item waiting for a resource of the contested type. */
export interface PendingTask {
  readonly itemId: string;
  readonly stage: string;
  /** Order in which the task first requested its stage; lower wins. */
  readonly requestSeq: number;
  readonly bidHours: number;
}

export interface ConflictRequest {
  readonly resourceType: ResourceType;
  readonly date: DateKey;
  readonly tasks: readonly PendingTask[];
}

export interface ConflictAssignment {
  readonly itemId: string;
  readonly resource: Resource;
  readonly date: DateKey;
  readonly hours: number;
  /** 0 = highest priority among the contenders. */
  readonly rank: number;
}

export interface ConflictResolution {
  readonly resolved: boolean;
  readonly assignments: readonly ConflictAssignment[];
}

export interface ConflictResolver {
  readonly policy: ConflictPolicy;
  resolve(request: ConflictRequest): ConflictResolution;
}

const UNRESOLVED: ConflictResolution = Object.freeze({ resolved: false, assignments: [] });

/** Never intervenes: stalled items simply wait for first-fit to succeed. */
export class FirstFitOnlyResolver implements ConflictResolver {
  readonly policy = 'FIRST_FIT' as const;

  resolve(): ConflictResolution {
    return UNRESOLVED;
  }
}

/**
 * Priority-weighted matching of contending tasks onto the resources of the
 * contested type that still have hours left on the date.
 *
 * Tasks are ranked by arrival (first request wins). A task may take a
 * resource when the effort model lets it start there with that resource's
 * free hours and the rest of its bid still fits the resource's calendar. The matching is booked immediately; each booking becomes the
 * matched task's grant.
 */
export class PriorityMatchingResolver implements ConflictResolver {
  readonly policy = 'PRIORITY_MATCHING' as const;

  constructor(
    private readonly pool: ResourcePool,
    private readonly effort: EffortModel,
  ) {}

  resolve(request: ConflictRequest): ConflictResolution {
    if (request.tasks.length === 0) return UNRESOLVED;

    const tasks = [...request.tasks].sort((a, b) => a.requestSeq - b.requestSeq);
    const candidates = this.pool
      .getResourcesByType(request.resourceType)
      .filter((r) => r.freeHoursOn(request.date) > 0);
    if (candidates.length === 0) return UNRESOLVED;

    const free = candidates.map((r) => r.freeHoursOn(request.date));
    const { pairs } = solveMinCostMatching({
      taskCosts: tasks.map((_, rank) => rank),
      resourceCount: candidates.length,
      feasible: (t, r) => {
        const hours = this.effort.grantHours(tasks[t].bidHours, free[r]);
        return (
          hours !== null &&
          this.effort.canComplete(candidates[r], request.date, tasks[t].bidHours, hours)
        );
      },
    });

    const assignments: ConflictAssignment[] = [];
    for (const { task, resource } of [...pairs].sort((a, b) => a.task - b.task)) {
      const hours = this.effort.grantHours(tasks[task].bidHours, free[resource]);
      if (hours === null) continue;

      const target = candidates[resource];
      target.assignWork(request.date, hours);
      assignments.push({
        itemId: tasks[task].itemId,
        resource: target,
        date: request.date,
        hours,
        rank: task,
      });
    }

    return { resolved: assignments.length > 0, assignments };
  }
}

export function createConflictResolver(
  policy: ConflictPolicy,
  pool: ResourcePool,
  effort: EffortModel,
): ConflictResolver {
  return policy === 'FIRST_FIT'
    ? new FirstFitOnlyResolver()
    : new PriorityMatchingResolver(pool, effort);
}
