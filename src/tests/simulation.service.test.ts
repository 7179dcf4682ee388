import { describe, it, expect } from 'vitest';
import { RunSimulationSchema } from '../schemas/simulation.schema.js';
import { SimulationService } from '../services/simulation.service.js';
import { ConfigurationError, DuplicateIdError, ValidationError } from '../lib/errors.js';
import { MONDAY, silentLogger } from './setup.js';

const service = new SimulationService(() => ({
  defaultHorizonDays: 30,
  maxHorizonDays: 60,
  calendarScanLimitDays: 400,
}));

function run(body: Record<string, unknown>) {
  return service.run(RunSimulationSchema.parse({ startDate: MONDAY, ...body }), silentLogger);
}

describe('SimulationService', () => {
  describe('defaults', () => {
    it('exposes the studio line-up and the asset workflow', () => {
      const defaults = service.defaults();

      expect(defaults.teams.map((t) => [t.idPrefix, t.size])).toEqual([
        ['m', 2],
        ['l', 2],
        ['a', 3],
        ['s', 1],
      ]);
      expect(defaults.workflow.name).toBe('asset_workflow');
      expect(defaults.workflow.stages.map((s) => s.name)).toEqual([
        'modeling',
        'layout',
        'animation',
      ]);
    });
  });

  describe('run', () => {
    it('runs the default studio over the default horizon', () => {
      const output = run({
        projectId: 'ep1',
        items: [
          { id: 'horse', creativeInputDate: '2026-03-02', complexity: 'high' },
          { id: 'shot', creativeInputDate: '2026-03-06', complexity: 'low' },
        ],
      });

      expect(output.horizonDays).toBe(30);
      expect(output.events.map((e) => [e.itemId, e.stage, e.startDay, e.endDay, e.effortHours])).toEqual([
        ['horse', 'modeling', 0, 1, 5],
        ['horse', 'layout', 1, 2, 3],
        ['horse', 'animation', 2, 3, 8],
        ['shot', 'modeling', 4, 5, 2],
        ['shot', 'layout', 7, 8, 1],
        ['shot', 'animation', 8, 9, 4],
      ]);
      // first fit always lands on the first registered quota artist
      expect(new Set(output.events.map((e) => e.resourceId))).toEqual(new Set(['m1']));
      expect(output.stalls.map((s) => s.date)).toEqual(['2026-03-07', '2026-03-08']);
      expect(output.pendingItems).toEqual([]);

      expect(output.summary.totalProductionDays).toBe(9);
      expect(output.summary.itemsCompleted).toBe(2);
      expect(output.summary.bottlenecks).toEqual([
        { resourceType: 'quota', stage: 'layout', stalls: 2, items: ['shot'] },
      ]);
      expect(output.summary.resourceUtilization.map((r) => r.resourceId)).toEqual([
        'm1',
        'm2',
        'l1',
        'l2',
        'a1',
        'a2',
        'a3',
        's1',
      ]);
      expect(output.summary.resourceUtilization[0].assignedHours).toBe(23);
      // 7 quota artists x 22 workdays in March from the 2nd x 8h
      expect(output.summary.utilization).toBe(23 / 1232);
    });

    it('uses explicit resources with their vacations instead of the default teams', () => {
      const output = run({
        resources: [
          {
            id: 'r1',
            name: 'Generalist',
            resourceType: 'quota',
            vacations: [{ start: '2026-03-02', end: '2026-03-03' }],
          },
        ],
        items: [{ id: 'prop', creativeInputDate: MONDAY, complexity: 'low' }],
      });

      expect(output.events.map((e) => [e.stage, e.resourceId, e.startDay, e.endDay])).toEqual([
        ['modeling', 'r1', 2, 3],
        ['layout', 'r1', 3, 4],
        ['animation', 'r1', 4, 5],
      ]);
      expect(output.stalls).toHaveLength(2);
      expect(output.summary.resourceUtilization).toHaveLength(1);
    });

    it('registers custom resource types, complexity levels and workflows', () => {
      const output = run({
        horizonDays: 10,
        resourceTypes: ['render'],
        complexityLevels: ['medium'],
        teams: [{ idPrefix: 'rf', name: 'Render Node', resourceType: 'render', size: 2 }],
        workflows: [
          {
            name: 'shot_workflow',
            stages: [
              { name: 'render', defaultHours: 10, overrides: { medium: 4 }, resourceType: 'render' },
            ],
          },
        ],
        items: [
          { id: 'shot1', creativeInputDate: MONDAY, complexity: 'medium', workflow: 'shot_workflow' },
          { id: 'shot2', creativeInputDate: MONDAY, complexity: 'high', workflow: 'shot_workflow' },
        ],
      });

      expect(output.events.map((e) => [e.itemId, e.resourceId, e.startDay, e.endDay])).toEqual([
        ['shot1', 'rf1', 0, 1],
        ['shot2', 'rf2', 0, 2],
      ]);
      expect(output.summary.utilization).toBe(0);
    });

    it('reports pending items when the horizon cuts the run short', () => {
      const output = run({
        horizonDays: 1,
        items: [{ id: 'horse', creativeInputDate: MONDAY, complexity: 'high' }],
      });

      expect(output.events.map((e) => e.stage)).toEqual([]);
      expect(output.pendingItems).toEqual([
        { projectId: 'project', itemId: 'horse', stage: 'modeling', state: 'in-progress', stalls: 0 },
      ]);
    });

    it('rejects a horizon beyond the configured maximum', () => {
      expect(() =>
        run({ horizonDays: 90, items: [{ id: 'a', creativeInputDate: MONDAY, complexity: 'low' }] }),
      ).toThrow(ValidationError);
    });

    it('rejects items naming an unknown workflow', () => {
      expect(() =>
        run({
          items: [{ id: 'a', creativeInputDate: MONDAY, complexity: 'low', workflow: 'missing' }],
        }),
      ).toThrow(ConfigurationError);
    });

    it('rejects resource ids that clash with generated team ids', () => {
      expect(() =>
        run({
          teams: [{ idPrefix: 'm', name: 'Modeling Artist', resourceType: 'quota', size: 1 }],
          resources: [{ id: 'm1', name: 'Lead Modeler', resourceType: 'quota' }],
          items: [{ id: 'a', creativeInputDate: MONDAY, complexity: 'low' }],
        }),
      ).toThrow(DuplicateIdError);
    });
  });
});
