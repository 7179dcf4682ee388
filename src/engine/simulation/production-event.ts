import type { ResourceType } from '../registry.js';

/** One completed stage of one item. Immutable once emitted. */
export interface ProductionEvent {
  readonly projectId: string;
  readonly itemId: string;
  readonly stage: string;
  /** ISO-8601 UTC */
  readonly startTime: string;
  readonly endTime: string;
  readonly startDay: number;
  readonly endDay: number;
  readonly resourceId: string;
  readonly resourceName: string;
  readonly resourceType: ResourceType;
  /** Elapsed end − start, in hours. */
  readonly durationHours: number;
  /** Hours actually booked on the resource for this stage. */
  readonly effortHours: number;
  readonly review: boolean;
  readonly approvalRequired: boolean;
}

export function createProductionEvent(
  fields: Omit<ProductionEvent, 'durationHours'>,
): ProductionEvent {
  return Object.freeze({
    ...fields,
    durationHours: (fields.endDay - fields.startDay) * 24,
  });
}
