export { BusinessCalendar, MONDAY_TO_FRIDAY, DEFAULT_SCAN_LIMIT_DAYS } from './calendar/business-calendar.js';
export type { Weekday, BusinessCalendarOptions } from './calendar/business-calendar.js';
export { addDays, diffDays, isDateKey, makeRange } from './calendar/date-key.js';
export type { DateKey, DateRange } from './calendar/date-key.js';
export {
  TagRegistry,
  QUOTA,
  SUPPORT,
  REVIEW,
  createResourceTypeRegistry,
  createComplexityRegistry,
} from './registry.js';
export type { ResourceType, ComplexityLevel } from './registry.js';
export { Resource, DAILY_CAPACITY_HOURS } from './resources/resource.js';
export { ResourcePool } from './resources/resource-pool.js';
export type { ResourceUtilization } from './resources/resource-pool.js';
export { WorkflowDefinition } from './parameters/workflow-definition.js';
export type { StageDefinition, StageDefinitionInput } from './parameters/workflow-definition.js';
export { ProductionParameters, DEFAULT_WORKFLOW } from './parameters/production-parameters.js';
export type { ComplexityEntry } from './parameters/production-parameters.js';
export { SimulationClock } from './simulation/simulation-clock.js';
export {
  WorkdayEffortModel,
  LegacyEffortModel,
  createEffortModel,
} from './simulation/effort-model.js';
export type { EffortMode, EffortModel, StageBooking, BookedDay } from './simulation/effort-model.js';
export type { ProductionEvent } from './simulation/production-event.js';
export type { ProcessState } from './simulation/item-process.js';
export { ProductionSimulator } from './simulation/production-simulator.js';
export type {
  SimulatorOptions,
  SimulationResult,
  StallRecord,
  PendingItem,
} from './simulation/production-simulator.js';
export { summarizeRun } from './simulation/run-summary.js';
export type { RunSummary, Bottleneck, DeliveryStatus } from './simulation/run-summary.js';
export {
  PriorityMatchingResolver,
  FirstFitOnlyResolver,
  createConflictResolver,
} from './conflicts/conflict-resolver.js';
export type {
  ConflictPolicy,
  ConflictResolver,
  ConflictRequest,
  ConflictResolution,
  ConflictAssignment,
  PendingTask,
} from './conflicts/conflict-resolver.js';
export { solveMinCostMatching } from './conflicts/min-cost-matching.js';
export type { MatchingProblem, MatchingResult, MatchingPair } from './conflicts/min-cost-matching.js';
export { DEFAULT_STUDIO_TEAMS, DEFAULT_ASSET_WORKFLOW } from './presets.js';
export type { TeamPreset } from './presets.js';
