/**
 * Compilation errors
 */

export type CompilationErrorCode = 'SCHEMA' | 'PARSE' | 'PARAM' | 'FUNCTION' | 'SEMANTIC';

export interface CompilationError {
  code: CompilationErrorCode;
  message: string;
  details?: unknown;
}

export class ScriptCompileError extends Error implements CompilationError {
  constructor(
    readonly code: CompilationErrorCode,
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = 'ScriptCompileError';
  }
}
