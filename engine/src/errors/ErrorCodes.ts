/**
 * Conductor Error Codes
 *
 * Structured diagnostic codes for the orchestration engine, kept separate
 * from process exit codes.
 *
 * TWO-LAYER SYSTEM:
 * ================
 * 1. Exit Codes: process termination codes used by the CLI and scripts
 *    - Example: ExitCodes.NO_CANDIDATE (110) when routing finds nothing
 *
 * 2. Error Codes (CND-X-NNN): precise identification inside the engine
 *    - Example: CND-R-001 (no candidate above the confidence floor)
 *
 * Categories:
 * - G: Registry (unit catalog)
 * - R: Routing
 * - T: Templates
 * - E: Execution (supervisor, error handler, tasks)
 * - S: Storage (checkpoints, circuit states, reports)
 * - C: Configuration
 *
 * ADDING NEW ERRORS:
 * =================
 * 1. Add the enum value below
 * 2. Add a description in getErrorDescription()
 * 3. Add an exit code mapping in getExitCodeForError()
 *
 * @module errors
 */

/**
 * Process exit codes
 */
export enum ExitCodes {
  SUCCESS = 0,
  GENERAL_ERROR = 1,
  INVALID_CONFIG = 103,
  VALIDATION_FAILED = 105,
  NO_CANDIDATE = 110,
  NOT_FOUND = 120,
  EXECUTION_FAILED = 300,
  PARTIAL_FAILURE = 301,
  TIMEOUT = 302,
  CANCELLED = 303,
  STORAGE_ERROR = 400,
  INTERNAL_ERROR = 500,
}

export enum ConductorErrorCode {
  // ============================================================================
  // REGISTRY ERRORS (G)
  // ============================================================================

  /** A unit with the same name is already registered */
  REGISTRY_DUPLICATE_NAME = 'CND-G-001',

  /** Unit name not present in the registry */
  REGISTRY_NOT_FOUND = 'CND-G-002',

  /** Unit spec failed validation */
  REGISTRY_INVALID_SPEC = 'CND-G-003',

  // ============================================================================
  // ROUTING ERRORS (R)
  // ============================================================================

  /** No unit scored above the confidence floor */
  ROUTING_NO_CANDIDATE = 'CND-R-001',

  // ============================================================================
  // TEMPLATE ERRORS (T)
  // ============================================================================

  /** Template is malformed or references unknown units/steps */
  TEMPLATE_INVALID = 'CND-T-001',

  /** Template name not loaded */
  TEMPLATE_NOT_FOUND = 'CND-T-002',

  // ============================================================================
  // EXECUTION ERRORS (E)
  // ============================================================================

  /** Unit reported a non-retryable failure */
  EXECUTION_FATAL = 'CND-E-001',

  /** Invocation was cancelled */
  EXECUTION_CANCELLED = 'CND-E-002',

  /** Invocation exceeded the unit timeout */
  EXECUTION_TIMEOUT = 'CND-E-003',

  /** Execution id has no checkpoint */
  EXECUTION_NOT_FOUND = 'CND-E-004',

  /** Execution aborted on an unrecoverable error */
  EXECUTION_FAILED = 'CND-E-005',

  /** State machine rejected a transition */
  EXECUTION_INVALID_TRANSITION = 'CND-E-006',

  /** Task handle unknown or already reaped */
  EXECUTION_TASK_NOT_FOUND = 'CND-E-007',

  // ============================================================================
  // STORAGE ERRORS (S)
  // ============================================================================

  /** Persisted record failed validation */
  STORE_CORRUPT = 'CND-S-001',

  /** Report already written for this step index */
  STORE_REPORT_CONFLICT = 'CND-S-002',

  /** Stored run or report file does not exist */
  STORE_NOT_FOUND = 'CND-S-003',

  // ============================================================================
  // CONFIGURATION ERRORS (C)
  // ============================================================================

  /** Configuration file missing, unparsable or invalid */
  CONFIG_INVALID = 'CND-C-001',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  CRITICAL = 'critical',
  ERROR = 'error',
  WARNING = 'warning',
  INFO = 'info',
}

const CATEGORY_BY_PREFIX: Record<string, string> = {
  'CND-G': 'RegistryError',
  'CND-R': 'RoutingError',
  'CND-T': 'TemplateError',
  'CND-E': 'ExecutionError',
  'CND-S': 'StoreError',
  'CND-C': 'ConfigError',
};

/**
 * Get error category name from a code prefix
 */
export function getErrorCategory(code: ConductorErrorCode): string {
  return CATEGORY_BY_PREFIX[code.slice(0, 5)] ?? 'ConductorError';
}

/**
 * Get a one-line description of an error code
 */
export function getErrorDescription(code: ConductorErrorCode): string {
  const descriptions: Record<ConductorErrorCode, string> = {
    [ConductorErrorCode.REGISTRY_DUPLICATE_NAME]: 'A unit with this name is already registered',
    [ConductorErrorCode.REGISTRY_NOT_FOUND]: 'The requested unit is not registered',
    [ConductorErrorCode.REGISTRY_INVALID_SPEC]: 'The unit specification is invalid',
    [ConductorErrorCode.ROUTING_NO_CANDIDATE]: 'No unit matched the request above the confidence floor',
    [ConductorErrorCode.TEMPLATE_INVALID]: 'The workflow template is invalid',
    [ConductorErrorCode.TEMPLATE_NOT_FOUND]: 'No workflow template with this name is loaded',
    [ConductorErrorCode.EXECUTION_FATAL]: 'The unit reported a non-retryable failure',
    [ConductorErrorCode.EXECUTION_CANCELLED]: 'The invocation was cancelled',
    [ConductorErrorCode.EXECUTION_TIMEOUT]: 'The invocation exceeded its timeout',
    [ConductorErrorCode.EXECUTION_NOT_FOUND]: 'No checkpoint exists for this execution',
    [ConductorErrorCode.EXECUTION_FAILED]: 'The execution aborted on an unrecoverable error',
    [ConductorErrorCode.EXECUTION_INVALID_TRANSITION]: 'The requested state transition is not allowed',
    [ConductorErrorCode.EXECUTION_TASK_NOT_FOUND]: 'No task with this handle is tracked',
    [ConductorErrorCode.STORE_CORRUPT]: 'A persisted record could not be read back',
    [ConductorErrorCode.STORE_REPORT_CONFLICT]: 'A report for this step was already written',
    [ConductorErrorCode.STORE_NOT_FOUND]: 'The stored run or report does not exist',
    [ConductorErrorCode.CONFIG_INVALID]: 'The configuration is invalid',
  };

  return descriptions[code];
}

/**
 * Map an error code to the process exit code
 */
export function getExitCodeForError(code: ConductorErrorCode): ExitCodes {
  switch (code) {
    case ConductorErrorCode.REGISTRY_DUPLICATE_NAME:
    case ConductorErrorCode.REGISTRY_INVALID_SPEC:
    case ConductorErrorCode.TEMPLATE_INVALID:
      return ExitCodes.VALIDATION_FAILED;

    case ConductorErrorCode.REGISTRY_NOT_FOUND:
    case ConductorErrorCode.TEMPLATE_NOT_FOUND:
    case ConductorErrorCode.EXECUTION_NOT_FOUND:
    case ConductorErrorCode.EXECUTION_TASK_NOT_FOUND:
    case ConductorErrorCode.STORE_NOT_FOUND:
      return ExitCodes.NOT_FOUND;

    case ConductorErrorCode.ROUTING_NO_CANDIDATE:
      return ExitCodes.NO_CANDIDATE;

    case ConductorErrorCode.EXECUTION_TIMEOUT:
      return ExitCodes.TIMEOUT;

    case ConductorErrorCode.EXECUTION_CANCELLED:
      return ExitCodes.CANCELLED;

    case ConductorErrorCode.EXECUTION_FATAL:
    case ConductorErrorCode.EXECUTION_FAILED:
      return ExitCodes.EXECUTION_FAILED;

    case ConductorErrorCode.EXECUTION_INVALID_TRANSITION:
      return ExitCodes.INTERNAL_ERROR;

    case ConductorErrorCode.STORE_CORRUPT:
    case ConductorErrorCode.STORE_REPORT_CONFLICT:
      return ExitCodes.STORAGE_ERROR;

    case ConductorErrorCode.CONFIG_INVALID:
      return ExitCodes.INVALID_CONFIG;
  }
}

/**
 * Whether retrying the same call might succeed
 */
export function isRetryable(code: ConductorErrorCode): boolean {
  return code === ConductorErrorCode.EXECUTION_TIMEOUT;
}

/**
 * Whether the caller can fix the error by changing configuration or input
 */
export function isUserError(code: ConductorErrorCode): boolean {
  return (
    code.startsWith('CND-G-') ||
    code.startsWith('CND-T-') ||
    code.startsWith('CND-C-') ||
    code === ConductorErrorCode.ROUTING_NO_CANDIDATE
  );
}
