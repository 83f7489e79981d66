/**
 * Workflow template errors
 *
 * Raised while templates are loaded, never while they run.
 *
 * @module errors
 */

import { ConductorError, type ConductorErrorDiagnostic } from './ConductorError.js';
import { ConductorErrorCode, ErrorSeverity } from './ErrorCodes.js';

export class InvalidTemplateError extends ConductorError {
  constructor(
    public readonly templateName: string,
    diagnostic: Omit<ConductorErrorDiagnostic, 'severity' | 'code'>
  ) {
    super({
      ...diagnostic,
      code: ConductorErrorCode.TEMPLATE_INVALID,
      severity: ErrorSeverity.ERROR,
      context: { template: templateName, ...diagnostic.context },
    });
  }

  static unknownUnit(templateName: string, stepIndex: number, unit: string): InvalidTemplateError {
    return new InvalidTemplateError(templateName, {
      message: `Template "${templateName}" step ${stepIndex + 1} references unknown unit "${unit}"`,
      path: `steps[${stepIndex}].unit`,
      hint: 'Register the unit before loading the template, or fix the unit name',
      context: { unit },
    });
  }

  static unknownDependency(
    templateName: string,
    stepIndex: number,
    dependency: string
  ): InvalidTemplateError {
    return new InvalidTemplateError(templateName, {
      message: `Template "${templateName}" step ${stepIndex + 1} depends on "${dependency}", which is not an earlier step`,
      path: `steps[${stepIndex}].dependsOn`,
      hint: 'A step may only depend on steps declared before it',
      context: { dependency },
    });
  }

  static sameGroupDependency(
    templateName: string,
    stepIndex: number,
    dependency: string
  ): InvalidTemplateError {
    return new InvalidTemplateError(templateName, {
      message: `Template "${templateName}" step ${stepIndex + 1} depends on "${dependency}" in the same parallel group`,
      path: `steps[${stepIndex}].dependsOn`,
      hint: 'Make the dependent step SEQUENTIAL so it runs after the group settles',
      context: { dependency },
    });
  }

  static duplicateStep(templateName: string, stepIndex: number, stepId: string): InvalidTemplateError {
    return new InvalidTemplateError(templateName, {
      message: `Template "${templateName}" declares step id "${stepId}" more than once`,
      path: `steps[${stepIndex}].id`,
      context: { stepId },
    });
  }

  static duplicateTemplate(templateName: string): InvalidTemplateError {
    return new InvalidTemplateError(templateName, {
      message: `Template "${templateName}" is already loaded`,
    });
  }

  static schema(templateName: string, path: string, message: string): InvalidTemplateError {
    return new InvalidTemplateError(templateName, {
      message: `Template "${templateName}" is malformed: ${message}`,
      path,
    });
  }
}

export class TemplateNotFoundError extends ConductorError {
  constructor(name: string, available: readonly string[]) {
    super({
      code: ConductorErrorCode.TEMPLATE_NOT_FOUND,
      message: `Workflow template "${name}" is not loaded`,
      hint: available.length > 0 ? `Available templates: ${available.join(', ')}` : undefined,
      severity: ErrorSeverity.ERROR,
      context: { name },
    });
  }
}
