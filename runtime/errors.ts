/**
 * Runtime errors raised while evaluating scripts
 */

export type RuntimeErrorKind =
  | 'ZeroDivision'
  | 'TypeError'
  | 'IndexOutOfBounds'
  | 'NullReference'
  | 'UndefinedVariable'
  | 'UndefinedFunction'
  | 'ArgumentMismatch';

export class RuntimeError extends Error {
  constructor(
    readonly kind: RuntimeErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'RuntimeError';
  }

  static zeroDivision(): RuntimeError {
    return new RuntimeError('ZeroDivision', 'Division by zero');
  }

  static typeError(message: string): RuntimeError {
    return new RuntimeError('TypeError', message);
  }

  static undefinedVariable(name: string): RuntimeError {
    return new RuntimeError('UndefinedVariable', `Undefined variable: ${name}`);
  }

  static undefinedFunction(name: string): RuntimeError {
    return new RuntimeError('UndefinedFunction', `Undefined function: ${name}`);
  }

  static argumentMismatch(message: string): RuntimeError {
    return new RuntimeError('ArgumentMismatch', message);
  }
}

export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}
