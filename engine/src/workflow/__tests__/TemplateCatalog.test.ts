import { describe, expect, it } from 'vitest';
import { InvalidTemplateError, TemplateNotFoundError } from '../../errors/index.js';
import { createSilentLogger } from '../../logging/EngineLogger.js';
import { UnitRegistry } from '../../registry/UnitRegistry.js';
import { ScriptedUnit } from '../../testing/ScriptedUnit.js';
import { StepMode } from '../../types/core-types.js';
import { groupSteps, TemplateCatalog } from '../TemplateCatalog.js';
import { TemplateLoader } from '../TemplateLoader.js';

function catalogWith(...units: string[]): TemplateCatalog {
  const registry = new UnitRegistry();
  for (const name of units) {
    registry.register({ name }, new ScriptedUnit());
  }
  return new TemplateCatalog(registry, createSilentLogger());
}

describe('TemplateCatalog', () => {
  it('should apply step defaults and stringify args', () => {
    const catalog = catalogWith('scan');

    const template = catalog.add({
      name: 'audit',
      title: 'Audit',
      steps: [{ id: 'scan', unit: 'scan', args: { verbose: true, depth: 2, mode: 'full' } }],
    });

    expect(template.steps[0]).toEqual({
      id: 'scan',
      unit: 'scan',
      args: { verbose: 'true', depth: '2', mode: 'full' },
      mode: StepMode.SEQUENTIAL,
      dependsOn: [],
    });
    expect(Object.isFrozen(template.steps[0])).toBe(true);
    expect(catalog.get('audit')).toBe(template);
  });

  it('should reject a step naming an unknown unit', () => {
    const catalog = catalogWith('scan');

    expect(() =>
      catalog.add({ name: 't', title: 'T', steps: [{ id: 'a', unit: 'ghost' }] })
    ).toThrow('Template "t" step 1 references unknown unit "ghost"');
  });

  it('should reject a dependency on a later or unknown step', () => {
    const catalog = catalogWith('scan');

    expect(() =>
      catalog.add({
        name: 't',
        title: 'T',
        steps: [
          { id: 'a', unit: 'scan', dependsOn: ['b'] },
          { id: 'b', unit: 'scan' },
        ],
      })
    ).toThrow('Template "t" step 1 depends on "b", which is not an earlier step');
  });

  it('should reject a dependency inside the same parallel group', () => {
    const catalog = catalogWith('scan');

    expect(() =>
      catalog.add({
        name: 't',
        title: 'T',
        steps: [
          { id: 'a', unit: 'scan', mode: 'PARALLEL' },
          { id: 'b', unit: 'scan', mode: 'PARALLEL', dependsOn: ['a'] },
        ],
      })
    ).toThrow('Template "t" step 2 depends on "a" in the same parallel group');
  });

  it('should reject duplicate step ids and duplicate templates', () => {
    const catalog = catalogWith('scan');
    const template = { name: 't', title: 'T', steps: [{ id: 'a', unit: 'scan' }] };

    expect(() =>
      catalog.add({ ...template, steps: [{ id: 'a', unit: 'scan' }, { id: 'a', unit: 'scan' }] })
    ).toThrow('declares step id "a" more than once');

    catalog.add(template);
    expect(() => catalog.add(template)).toThrow('Template "t" is already loaded');
  });

  it('should report schema problems with their path', () => {
    const catalog = catalogWith('scan');

    try {
      catalog.add({ name: 'bad', title: 'Bad', steps: [] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidTemplateError);
      if (!(error instanceof InvalidTemplateError)) return;
      expect(error.path).toBe('steps');
      expect(error.templateName).toBe('bad');
    }
  });

  it('should only add templates whose units are registered', () => {
    const catalog = catalogWith('scan');

    const added = catalog.addAvailable([
      { name: 'ok', title: 'Ok', steps: [{ id: 'a', unit: 'scan' }] },
      { name: 'missing', title: 'Missing', steps: [{ id: 'a', unit: 'backup' }] },
    ]);

    expect(added).toEqual(['ok']);
    expect(catalog.names()).toEqual(['ok']);
  });

  it('should list available names when a template is missing', () => {
    const catalog = catalogWith('scan');
    catalog.add({ name: 'ok', title: 'Ok', steps: [{ id: 'a', unit: 'scan' }] });

    expect(() => catalog.get('nope')).toThrow(TemplateNotFoundError);
    try {
      catalog.get('nope');
    } catch (error) {
      if (error instanceof TemplateNotFoundError) {
        expect(error.hint).toBe('Available templates: ok');
      }
    }
  });
});

describe('groupSteps', () => {
  it('should group consecutive parallel steps', () => {
    const step = (id: string, mode: StepMode) => ({ id, unit: 'u', args: {}, mode, dependsOn: [] });
    const steps = [
      step('a', StepMode.SEQUENTIAL),
      step('b', StepMode.PARALLEL),
      step('c', StepMode.PARALLEL),
      step('d', StepMode.SEQUENTIAL),
      step('e', StepMode.PARALLEL),
    ];

    expect(groupSteps(steps).map((group) => group.map((s) => s.id))).toEqual([['a'], ['b', 'c'], ['d'], ['e']]);
  });
});

describe('TemplateLoader', () => {
  it('should accept a templates document, a bare list and a single template', () => {
    const single = 'name: t\ntitle: T\nsteps:\n  - id: a\n    unit: scan\n';

    expect(TemplateLoader.parse(`templates:\n  - name: t\n`, 'doc.yaml')).toEqual([{ name: 't' }]);
    expect(TemplateLoader.parse('[{"name": "t"}]', 'doc.json')).toEqual([{ name: 't' }]);
    expect(TemplateLoader.parse(single, 'one.yaml')).toEqual([
      { name: 't', title: 'T', steps: [{ id: 'a', unit: 'scan' }] },
    ]);
  });

  it('should reject documents without templates', () => {
    expect(() => TemplateLoader.parse('title: nothing here\n', 'empty.yaml')).toThrow(
      'Template "empty.yaml" is malformed: expected a "templates" list'
    );
    expect(() => TemplateLoader.parse('templates: [\n', 'broken.yaml')).toThrow(InvalidTemplateError);
  });

  it('should ship default templates that validate', async () => {
    const templates = await TemplateLoader.defaults();
    const catalog = catalogWith(
      'security_auditor',
      'network_monitor',
      'sys_health',
      'process_manager',
      'system_cleaner',
      'project_context',
      'backup_manager'
    );

    expect(catalog.addAvailable(templates)).toEqual([
      'security_audit',
      'system_health',
      'project_analysis',
      'daily_maintenance',
      'full_backup',
    ]);
  });
});
