import { type DateKey, addDays } from '../calendar/date-key.js';
import type { ProductionParameters } from '../parameters/production-parameters.js';
import type { ResourceType } from '../registry.js';
import type { ResourcePool, ResourceUtilization } from '../resources/resource-pool.js';
import type { SimulationResult } from './production-simulator.js';

export interface Bottleneck {
  readonly resourceType: ResourceType;
  readonly stage: string;
  readonly stalls: number;
  readonly items: readonly string[];
}

export interface DeliveryStatus {
  readonly projectId: string;
  readonly deadline: DateKey | null;
  /** Last day of work on the project; null while items are unfinished. */
  readonly finishDate: DateKey | null;
  readonly complete: boolean;
  /** null when there is no deadline or the outcome is still open. */
  readonly onTime: boolean | null;
}

export interface RunSummary {
  readonly startDate: DateKey;
  readonly simulatedDays: number;
  readonly totalProductionDays: number;
  readonly itemsScheduled: number;
  readonly itemsCompleted: number;
  readonly stagesCompleted: number;
  readonly utilization: number;
  readonly resourceUtilization: readonly ResourceUtilization[];
  readonly bottlenecks: readonly Bottleneck[];
  readonly delivery: readonly DeliveryStatus[];
}

/** Date of the last simulated day touched by time `t`. */
function lastDateBefore(startDate: DateKey, t: number): DateKey {
  return addDays(startDate, Math.max(0, Math.ceil(t) - 1));
}

function groupBottlenecks(result: SimulationResult): Bottleneck[] {
  const groups = new Map<string, { type: ResourceType; stage: string; stalls: number; items: Set<string> }>();
  for (const stall of result.stalls) {
    const key = `${stall.resourceType}\u0000${stall.stage}`;
    const group = groups.get(key) ?? {
      type: stall.resourceType,
      stage: stall.stage,
      stalls: 0,
      items: new Set<string>(),
    };
    group.stalls += 1;
    group.items.add(stall.itemId);
    groups.set(key, group);
  }

  return [...groups.values()]
    .map((g) => ({ resourceType: g.type, stage: g.stage, stalls: g.stalls, items: [...g.items] }))
    .sort((a, b) => b.stalls - a.stalls);
}

function deliveryStatus(result: SimulationResult, params: ProductionParameters): DeliveryStatus[] {
  const projectIds = new Set<string>();
  for (const e of result.events) projectIds.add(e.projectId);
  for (const p of result.pendingItems) projectIds.add(p.projectId);

  const horizonDate = lastDateBefore(result.startDate, result.now);

  return [...projectIds].map((projectId) => {
    const deadline = params.getDeliveryDeadline(projectId);
    const complete = !result.pendingItems.some((p) => p.projectId === projectId);
    const ends = result.events.filter((e) => e.projectId === projectId).map((e) => e.endDay);
    const finishDate =
      complete && ends.length > 0 ? lastDateBefore(result.startDate, Math.max(...ends)) : null;

    let onTime: boolean | null = null;
    if (deadline !== null) {
      if (finishDate !== null) onTime = finishDate <= deadline;
      else if (horizonDate > deadline) onTime = false;
    }

    return { projectId, deadline, finishDate, complete, onTime };
  });
}

/**
 * KPIs for a finished run: production span, completion counts, quota
 * utilization over the simulated range, stall bottlenecks and delivery.
 */
export function summarizeRun(
  result: SimulationResult,
  pool: ResourcePool,
  params: ProductionParameters,
): RunSummary {
  const { events } = result;
  const totalProductionDays =
    events.length > 0
      ? Math.floor(
          Math.max(...events.map((e) => e.endDay)) - Math.min(...events.map((e) => e.startDay)),
        )
      : 0;

  const rangeEnd = lastDateBefore(result.startDate, result.now);

  return {
    startDate: result.startDate,
    simulatedDays: result.now,
    totalProductionDays,
    itemsScheduled: result.completedItems.length + result.pendingItems.length,
    itemsCompleted: result.completedItems.length,
    stagesCompleted: events.length,
    utilization: pool.getUtilization(result.startDate, rangeEnd),
    resourceUtilization: pool
      .getResources()
      .map((r) => pool.getResourceUtilization(r.id, result.startDate, rangeEnd)),
    bottlenecks: groupBottlenecks(result),
    delivery: deliveryStatus(result, params),
  };
}
