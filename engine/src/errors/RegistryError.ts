/**
 * Unit registry errors
 *
 * @module errors
 */

import { ConductorError, type ConductorErrorDiagnostic } from './ConductorError.js';
import { ConductorErrorCode, ErrorSeverity } from './ErrorCodes.js';

export class RegistryError extends ConductorError {
  constructor(diagnostic: Omit<ConductorErrorDiagnostic, 'severity'>) {
    super({ ...diagnostic, severity: ErrorSeverity.ERROR });
  }

  /**
   * A unit with this name is already registered
   */
  static duplicateName(name: string): RegistryError {
    return new RegistryError({
      code: ConductorErrorCode.REGISTRY_DUPLICATE_NAME,
      message: `Unit "${name}" is already registered`,
      hint: 'Use a different unit name or unregister the existing one first',
      context: { name },
    });
  }

  /**
   * No unit with this name
   */
  static notFound(name: string, available: readonly string[]): RegistryError {
    return new RegistryError({
      code: ConductorErrorCode.REGISTRY_NOT_FOUND,
      message: `Unit "${name}" is not registered`,
      hint: available.length > 0
        ? `Registered units: ${available.join(', ')}`
        : 'No units are registered yet',
      context: { name },
    });
  }

  static invalidSpec(name: string, reason: string): RegistryError {
    return new RegistryError({
      code: ConductorErrorCode.REGISTRY_INVALID_SPEC,
      message: `Unit "${name}" has an invalid spec: ${reason}`,
      context: { name },
    });
  }
}
