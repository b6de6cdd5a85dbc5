// src/core/errors.ts
export enum ErrorCode {
  INVALID_PARAM = 'invalid_param',
  TOOL_NOT_FOUND = 'tool_not_found',
  DOWNLOAD_FAILED = 'download_failed',
  PROCESS_SPAWN_FAILED = 'process_spawn_failed',
  PROCESS_TIMEOUT = 'process_timeout',
  RESOLUTION_FAILED = 'resolution_failed',
}

export interface ErrorInfo {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  suggestion?: string;
}

export class ResolverError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ResolverError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

/**
 * Flattens any thrown value into the shape carried by failed results.
 * Errors that did not originate here are reported as resolution failures.
 */
export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof ResolverError) {
    return {
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      suggestion: error.suggestion,
    };
  }

  return {
    code: ErrorCode.RESOLUTION_FAILED,
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
  };
}
