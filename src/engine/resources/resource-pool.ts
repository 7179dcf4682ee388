import { DuplicateIdError, NotFoundError } from '../../lib/errors.js';
import type { BusinessCalendar } from '../calendar/business-calendar.js';
import type { DateKey } from '../calendar/date-key.js';
import {
  QUOTA,
  type ResourceType,
  type TagRegistry,
  createResourceTypeRegistry,
} from '../registry.js';
import { DAILY_CAPACITY_HOURS, Resource } from './resource.js';

export interface ResourceUtilization {
  readonly resourceId: string;
  readonly name: string;
  readonly type: ResourceType;
  readonly assignedHours: number;
  readonly capacityHours: number;
  readonly utilization: number;
}

/**
 * Resources indexed by id and by type.
 *
 * Both indexes are written together in `addResource` and never edited
 * afterwards, so each resource lives in exactly one type bucket.
 */
export class ResourcePool {
  readonly calendar: BusinessCalendar;
  readonly resourceTypes: TagRegistry<ResourceType>;
  private readonly resources = new Map<string, Resource>();
  private readonly resourcesByType = new Map<ResourceType, Resource[]>();

  constructor(
    calendar: BusinessCalendar,
    resourceTypes: TagRegistry<ResourceType> = createResourceTypeRegistry(),
  ) {
    this.calendar = calendar;
    this.resourceTypes = resourceTypes;
  }

  addResource(id: string, name: string, type: string): Resource {
    if (this.resources.has(id)) {
      throw new DuplicateIdError('Resource', id);
    }
    const resourceType = this.resourceTypes.resolve(type);
    const resource = new Resource(id, name, resourceType, this.calendar);

    this.resources.set(id, resource);
    const bucket = this.resourcesByType.get(resourceType);
    if (bucket) {
      bucket.push(resource);
    } else {
      this.resourcesByType.set(resourceType, [resource]);
    }
    return resource;
  }

  getResource(id: string): Resource {
    const resource = this.resources.get(id);
    if (!resource) {
      throw new NotFoundError('Resource', id);
    }
    return resource;
  }

  getResources(): Resource[] {
    return [...this.resources.values()];
  }

  /** Resources of a type, in registration order. */
  getResourcesByType(type: ResourceType): Resource[] {
    return [...(this.resourcesByType.get(type) ?? [])];
  }

  /**
   * First-fit allocation: books `hours` on the first resource of `type`
   * (registration order) able to take them on `date` and passing `accept`.
   * Returns null when every candidate is off, on vacation, full or refused.
   */
  allocateResource(
    type: ResourceType,
    date: DateKey,
    hours: number = DAILY_CAPACITY_HOURS,
    accept: (resource: Resource) => boolean = () => true,
  ): Resource | null {
    for (const resource of this.resourcesByType.get(type) ?? []) {
      if (resource.isAvailable(date, hours) && accept(resource)) {
        resource.assignWork(date, hours);
        return resource;
      }
    }
    return null;
  }

  /**
   * Assigned / available hours of `type` resources over the pool calendar's
   * workdays in [start, end]. 0 when there is no capacity in the range.
   */
  getUtilization(start: DateKey, end: DateKey, type: string = QUOTA): number {
    const members = this.resourcesByType.get(this.resourceTypes.resolve(type)) ?? [];

    let totalCapacity = 0;
    let totalAssigned = 0;
    for (const day of this.calendar.workdaysBetween(start, end)) {
      totalCapacity += members.length * DAILY_CAPACITY_HOURS;
      for (const resource of members) {
        totalAssigned += resource.hoursOn(day);
      }
    }

    return totalCapacity > 0 ? totalAssigned / totalCapacity : 0;
  }

  /** Per-resource utilization over its own working days in [start, end]. */
  getResourceUtilization(id: string, start: DateKey, end: DateKey): ResourceUtilization {
    const resource = this.getResource(id);

    let capacityHours = 0;
    let assignedHours = 0;
    for (const day of this.calendar.workdaysBetween(start, end)) {
      assignedHours += resource.hoursOn(day);
      if (resource.isWorking(day)) capacityHours += DAILY_CAPACITY_HOURS;
    }

    return {
      resourceId: resource.id,
      name: resource.name,
      type: resource.type,
      assignedHours,
      capacityHours,
      utilization: capacityHours > 0 ? assignedHours / capacityHours : 0,
    };
  }
}
