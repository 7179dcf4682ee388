import { describe, it, expect } from 'vitest';
import { BusinessCalendar } from '../engine/calendar/business-calendar.js';
import { ProductionParameters } from '../engine/parameters/production-parameters.js';
import {
  TagRegistry,
  createComplexityRegistry,
  createResourceTypeRegistry,
} from '../engine/registry.js';
import { DEFAULT_ASSET_WORKFLOW } from '../engine/presets.js';
import { ConfigurationError, DuplicateIdError, ValidationError } from '../lib/errors.js';

describe('TagRegistry', () => {
  it('starts with the built-in tags', () => {
    expect(createResourceTypeRegistry().list()).toEqual(['quota', 'support', 'review']);
    expect(createComplexityRegistry(['medium']).list()).toEqual(['high', 'low', 'medium']);
  });

  it('registers new tags trimmed and resolves only known ones', () => {
    const registry = new TagRegistry<string>('resource type');
    expect(registry.register('  render ')).toBe('render');
    expect(registry.has('render')).toBe(true);
    expect(registry.resolve('render')).toBe('render');
    expect(() => registry.resolve('lighting')).toThrow("Unknown resource type: 'lighting'");
    expect(() => registry.register('   ')).toThrow(ConfigurationError);
  });
});

describe('ProductionParameters', () => {
  it('stores calendars by name', () => {
    const params = new ProductionParameters();
    const calendar = new BusinessCalendar('Studio Calendar');
    params.addResourceCalendar('studio', calendar);

    expect(params.getCalendar('studio')).toBe(calendar);
    expect(() => params.getCalendar('remote')).toThrow(ConfigurationError);
  });

  it('stores creative input dates and delivery deadlines', () => {
    const params = new ProductionParameters();
    params.addCreativeInput('horse', '2026-03-01');
    params.setDeliveryDeadline('ep1', '2026-06-30');

    expect(params.getCreativeInput('horse')).toBe('2026-03-01');
    expect(params.getDeliveryDeadline('ep1')).toBe('2026-06-30');
    expect(params.getDeliveryDeadline('ep2')).toBeNull();
    expect(() => params.getCreativeInput('shot')).toThrow(
      "No creative input date registered for item 'shot'",
    );
    expect(() => params.addCreativeInput('shot', '2026-13-01')).toThrow(ValidationError);
  });

  it('stores complexity with free-form details', () => {
    const params = new ProductionParameters();
    params.defineComplexity('horse', 'high', { modeling: 5, layout: 3 });

    expect(params.getComplexity('horse')).toEqual({
      level: 'high',
      details: { modeling: 5, layout: 3 },
    });
    expect(() => params.defineComplexity('shot', 'extreme')).toThrow(ConfigurationError);
    expect(() => params.getComplexity('shot')).toThrow(ConfigurationError);
  });

  describe('workflows', () => {
    it('keeps stage order and walks it stage by stage', () => {
      const params = new ProductionParameters();
      const workflow = params.createWorkflow('asset_workflow', DEFAULT_ASSET_WORKFLOW);

      expect(workflow.stageOrder).toEqual(['modeling', 'layout', 'animation']);
      expect(workflow.firstStage).toBe('modeling');
      expect(workflow.getNextStage('modeling')).toBe('layout');
      expect(workflow.getNextStage('animation')).toBeNull();
      expect(workflow.resourceTypes()).toEqual(['quota']);
      expect(params.getWorkflow('asset_workflow')).toBe(workflow);
    });

    it('resolves bids from overrides, falling back to the stage default', () => {
      const params = new ProductionParameters({
        complexityLevels: createComplexityRegistry(['medium']),
      });
      params.createWorkflow('asset_workflow', DEFAULT_ASSET_WORKFLOW);

      expect(params.getStageBid('asset_workflow', 'modeling', 'high')).toBe(5);
      expect(params.getStageBid('asset_workflow', 'layout', 'low')).toBe(1);
      expect(params.getStageBid('asset_workflow', 'animation', 'medium')).toBe(4);
      expect(params.getStageBid('asset_workflow', 'animation', 'unheard-of')).toBe(4);
    });

    it('returns a zero bid for unknown workflows and stages', () => {
      const params = new ProductionParameters();
      params.createWorkflow('asset_workflow', DEFAULT_ASSET_WORKFLOW);

      expect(params.getStageBid('shot_workflow', 'modeling', 'high')).toBe(0);
      expect(params.getStageBid('asset_workflow', 'lighting', 'high')).toBe(0);
    });

    it('carries review and approval flags', () => {
      const params = new ProductionParameters();
      const workflow = params.createWorkflow('reviewed', [
        { name: 'draft', defaultHours: 2, resourceType: 'quota' },
        { name: 'check', defaultHours: 1, resourceType: 'review', review: true, approvalRequired: true },
      ]);

      expect(workflow.getStage('draft').review).toBe(false);
      expect(workflow.getStage('check').approvalRequired).toBe(true);
      expect(workflow.resourceTypes()).toEqual(['quota', 'review']);
    });

    it('rejects invalid definitions', () => {
      const params = new ProductionParameters();

      expect(() => params.createWorkflow('empty', [])).toThrow(ConfigurationError);
      expect(() =>
        params.createWorkflow('twice', [
          { name: 'a', defaultHours: 1, resourceType: 'quota' },
          { name: 'a', defaultHours: 2, resourceType: 'quota' },
        ]),
      ).toThrow("Workflow 'twice' declares stage 'a' twice");
      expect(() =>
        params.createWorkflow('free', [{ name: 'a', defaultHours: 0, resourceType: 'quota' }]),
      ).toThrow(ConfigurationError);
      expect(() =>
        params.createWorkflow('render', [{ name: 'a', defaultHours: 1, resourceType: 'render' }]),
      ).toThrow("Unknown resource type: 'render'");
      expect(() => params.getWorkflow('empty')).toThrow(ConfigurationError);
    });

    it('rejects a second workflow with the same name', () => {
      const params = new ProductionParameters();
      params.createWorkflow('asset_workflow', DEFAULT_ASSET_WORKFLOW);

      expect(() => params.createWorkflow('asset_workflow', DEFAULT_ASSET_WORKFLOW)).toThrow(
        DuplicateIdError,
      );
    });
  });
});
