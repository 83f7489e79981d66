/**
 * Template Catalog
 *
 * Holds the loaded workflow templates. Every template is checked against the
 * unit registry when added, so a template that loads is one that can run.
 *
 * @module workflow
 */

import { describeFirstIssue, InvalidTemplateError, TemplateNotFoundError } from '../errors/index.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import type { UnitRegistry } from '../registry/UnitRegistry.js';
import { StepMode, type StepSpec, type WorkflowTemplate } from '../types/core-types.js';
import { TemplateSchema } from './TemplateSchema.js';

export class TemplateCatalog {
  private readonly templates = new Map<string, WorkflowTemplate>();
  private readonly logger: EngineLogger;

  constructor(
    private readonly registry: UnitRegistry,
    logger?: EngineLogger
  ) {
    this.logger = (logger ?? LoggerManager.getLogger()).child('TemplateCatalog');
  }

  /**
   * Validate and add a template
   *
   * @throws {InvalidTemplateError} when malformed, duplicated or referencing
   * unknown units or steps
   */
  add(input: unknown): WorkflowTemplate {
    const template = parseTemplate(input);
    if (this.templates.has(template.name)) {
      throw InvalidTemplateError.duplicateTemplate(template.name);
    }
    validateTemplate(template, this.registry);
    this.templates.set(template.name, template);
    this.logger.debug(`loaded template "${template.name}"`, { steps: template.steps.length });
    return template;
  }

  /**
   * Add every template whose units are all registered; the rest are skipped
   *
   * @returns names of the templates added
   */
  addAvailable(inputs: readonly unknown[]): string[] {
    const added: string[] = [];
    for (const input of inputs) {
      const template = parseTemplate(input);
      const missing = template.steps.filter((step) => !this.registry.has(step.unit)).map((step) => step.unit);
      if (missing.length > 0) {
        this.logger.debug(`skipping template "${template.name}"`, { missing });
        continue;
      }
      if (!this.templates.has(template.name)) {
        added.push(this.add(template).name);
      }
    }
    return added;
  }

  /**
   * @throws {TemplateNotFoundError}
   */
  get(name: string): WorkflowTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw new TemplateNotFoundError(name, this.names());
    }
    return template;
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  remove(name: string): boolean {
    return this.templates.delete(name);
  }

  names(): string[] {
    return [...this.templates.keys()];
  }

  list(): WorkflowTemplate[] {
    return [...this.templates.values()];
  }
}

function parseTemplate(input: unknown): WorkflowTemplate {
  const result = TemplateSchema.safeParse(input);
  if (!result.success) {
    const name = nameOf(input);
    const issue = describeFirstIssue(result.error);
    throw InvalidTemplateError.schema(name, issue.path, issue.message);
  }
  const template = result.data;
  return Object.freeze({
    ...template,
    steps: Object.freeze(
      template.steps.map((step) =>
        Object.freeze({ ...step, args: Object.freeze({ ...step.args }), dependsOn: Object.freeze([...step.dependsOn]) })
      )
    ),
  });
}

function nameOf(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'name' in input && typeof input.name === 'string') {
    return input.name;
  }
  return '<unnamed>';
}

/**
 * Consecutive PARALLEL steps form one group; every SEQUENTIAL step is a group
 * of its own
 */
export function groupSteps(steps: readonly StepSpec[]): StepSpec[][] {
  const groups: StepSpec[][] = [];
  let current: StepSpec[] | null = null;

  for (const step of steps) {
    if (step.mode === StepMode.PARALLEL) {
      if (!current) {
        current = [];
        groups.push(current);
      }
      current.push(step);
    } else {
      current = null;
      groups.push([step]);
    }
  }
  return groups;
}

function validateTemplate(template: WorkflowTemplate, registry: UnitRegistry): void {
  const seen = new Map<string, number>();
  const groupOf = new Map<string, number>();
  groupSteps(template.steps).forEach((group, groupIndex) => {
    for (const step of group) {
      groupOf.set(step.id, groupIndex);
    }
  });

  template.steps.forEach((step, index) => {
    if (seen.has(step.id)) {
      throw InvalidTemplateError.duplicateStep(template.name, index, step.id);
    }
    if (!registry.has(step.unit)) {
      throw InvalidTemplateError.unknownUnit(template.name, index, step.unit);
    }
    for (const dependency of step.dependsOn) {
      if (!seen.has(dependency)) {
        throw InvalidTemplateError.unknownDependency(template.name, index, dependency);
      }
      if (groupOf.get(dependency) === groupOf.get(step.id)) {
        throw InvalidTemplateError.sameGroupDependency(template.name, index, dependency);
      }
    }
    seen.set(step.id, index);
  });
}
