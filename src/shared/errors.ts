export enum BaselineErrorCode {
  INVALID_CONFIG = 'INVALID_CONFIG',
  PRECONDITION_FAILED = 'PRECONDITION_FAILED',
  BACKUP_FAILED = 'BACKUP_FAILED',
  BUNDLE_INVALID = 'BUNDLE_INVALID',
  BUNDLE_NOT_FOUND = 'BUNDLE_NOT_FOUND',
  TEMPLATE_MISSING = 'TEMPLATE_MISSING',
  TEMPLATE_UNRESOLVED = 'TEMPLATE_UNRESOLVED',
  STEP_FAILED = 'STEP_FAILED',
  COMMAND_TIMEOUT = 'COMMAND_TIMEOUT',
  COMMAND_FAILED = 'COMMAND_FAILED',
}

export class BaselineError extends Error {
  readonly code: BaselineErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: BaselineErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'BaselineError';
    this.code = code;
    this.context = context;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof BaselineError) return `${err.code}: ${err.message}`;
  return err instanceof Error ? err.message : String(err);
}
