import { z } from 'zod';
import { isDateKey } from '../engine/calendar/date-key.js';

// ============================================================================
// Shared
// ============================================================================

export const DateKeySchema = z
  .string()
  .refine(isDateKey, { message: 'Expected a calendar date as YYYY-MM-DD' });

export const DateRangeSchema = z
  .object({
    start: DateKeySchema,
    end: DateKeySchema,
  })
  .refine((range) => range.end >= range.start, {
    message: 'Range end must not be before its start',
    path: ['end'],
  });

const WeekdaySchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
]);

const TagSchema = z.string().trim().min(1).max(64);

// ============================================================================
// Scenario parts
// ============================================================================

export const CalendarSchema = z.object({
  name: z.string().min(1).max(255).optional(),
  workDays: z.array(WeekdaySchema).optional(),
  holidays: z.array(DateKeySchema).optional(),
  vacations: z.array(DateRangeSchema).optional(),
});

export type CalendarInput = z.infer<typeof CalendarSchema>;

export const TeamSchema = z.object({
  idPrefix: z.string().min(1).max(32),
  name: z.string().min(1).max(255),
  resourceType: TagSchema,
  size: z.number().int().min(0).max(100),
});

export type TeamInput = z.infer<typeof TeamSchema>;

export const ResourceSchema = z.object({
  id: z.string().min(1).max(64),
  name: z.string().min(1).max(255),
  resourceType: TagSchema,
  vacations: z.array(DateRangeSchema).optional(),
});

export type ResourceInput = z.infer<typeof ResourceSchema>;

export const StageSchema = z.object({
  name: z.string().min(1).max(128),
  defaultHours: z.number().positive(),
  overrides: z.record(z.string(), z.number().positive()).optional(),
  resourceType: TagSchema,
  review: z.boolean().optional(),
  approvalRequired: z.boolean().optional(),
});

export const WorkflowSchema = z.object({
  name: z.string().min(1).max(128),
  stages: z.array(StageSchema).min(1, 'A workflow needs at least one stage'),
});

export type WorkflowInput = z.infer<typeof WorkflowSchema>;

export const ItemSchema = z.object({
  id: z.string().min(1).max(128),
  creativeInputDate: DateKeySchema,
  complexity: TagSchema,
  details: z.record(z.string(), z.number().nonnegative()).optional(),
  workflow: z.string().min(1).max(128).optional(),
});

export type ItemInput = z.infer<typeof ItemSchema>;

// ============================================================================
// Run request
// ============================================================================

export const RunSimulationSchema = z.object({
  projectId: z.string().min(1).max(128).default('project'),
  startDate: DateKeySchema,
  horizonDays: z.number().int().positive().optional(),
  deliveryDeadline: DateKeySchema.optional(),
  effortModel: z.enum(['WORKDAY', 'LEGACY']).default('WORKDAY'),
  conflictPolicy: z.enum(['PRIORITY_MATCHING', 'FIRST_FIT']).default('PRIORITY_MATCHING'),
  calendar: CalendarSchema.optional(),
  resourceTypes: z.array(TagSchema).default([]),
  complexityLevels: z.array(TagSchema).default([]),
  teams: z.array(TeamSchema).optional(),
  resources: z.array(ResourceSchema).optional(),
  workflows: z.array(WorkflowSchema).optional(),
  items: z.array(ItemSchema).min(1, 'At least one item is required'),
});

export type RunSimulationInput = z.infer<typeof RunSimulationSchema>;
