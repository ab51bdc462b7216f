export type WorkflowErrorKind =
  | 'VALIDATION'
  | 'INVALID_STATUS'
  | 'INVALID_DECISION'
  | 'NOT_ELIGIBLE'
  | 'NOT_FOUND'
  | 'FORBIDDEN';

/**
 * Typed failure of a workflow operation. `code` is the stable, snake_case
 * identifier clients match on; `kind` decides the transport status.
 */
export class WorkflowError extends Error {
  constructor(
    public readonly kind: WorkflowErrorKind,
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'WorkflowError';
  }

  static validation(code: string, message: string, details?: Record<string, unknown>): WorkflowError {
    return new WorkflowError('VALIDATION', code, message, details);
  }

  static notFound(code: string, message: string): WorkflowError {
    return new WorkflowError('NOT_FOUND', code, message);
  }

  static forbidden(code: string, message: string, details?: Record<string, unknown>): WorkflowError {
    return new WorkflowError('FORBIDDEN', code, message, details);
  }
}

export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}
