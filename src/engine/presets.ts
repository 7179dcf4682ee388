import type { StageDefinitionInput } from './parameters/workflow-definition.js';

export interface TeamPreset {
  /** Resource ids are `${idPrefix}${n}`, n from 1. */
  idPrefix: string;
  name: string;
  resourceType: string;
  size: number;
}

/** Studio line-up used when a scenario does not bring its own. */
export const DEFAULT_STUDIO_TEAMS: readonly TeamPreset[] = [
  { idPrefix: 'm', name: 'Modeling Artist', resourceType: 'quota', size: 2 },
  { idPrefix: 'l', name: 'Layout Artist', resourceType: 'quota', size: 2 },
  { idPrefix: 'a', name: 'Animation Artist', resourceType: 'quota', size: 3 },
  { idPrefix: 's', name: 'Support Technician', resourceType: 'support', size: 1 },
];

export const DEFAULT_ASSET_WORKFLOW: readonly StageDefinitionInput[] = [
  { name: 'modeling', defaultHours: 3, overrides: { high: 5, low: 2 }, resourceType: 'quota' },
  { name: 'layout', defaultHours: 2, overrides: { high: 3, low: 1 }, resourceType: 'quota' },
  { name: 'animation', defaultHours: 4, overrides: { high: 8, low: 4 }, resourceType: 'quota' },
];
