/**
 * Builtin function registry and factory
 */
import { BuiltinFunction, CORE_BUILTINS } from '../runtime/builtins';
import { INDICATOR_BUILTINS } from './indicators';

// ============================================================================
// Builtin Registry
// ============================================================================

export class BuiltinRegistry {
  private builtins: Map<string, BuiltinFunction> = new Map();

  registerBuiltin(name: string, fn: BuiltinFunction): void {
    this.builtins.set(name, fn);
  }

  getBuiltin(name: string): BuiltinFunction | null {
    return this.builtins.get(name) || null;
  }

  has(name: string): boolean {
    return this.builtins.has(name);
  }

  names(): string[] {
    return [...this.builtins.keys()];
  }
}

// ============================================================================
// Standard Registry
// ============================================================================

/**
 * Core builtins plus the technical indicators.
 */
export function createStandardRegistry(): BuiltinRegistry {
  const registry = new BuiltinRegistry();

  for (const [name, fn] of Object.entries(CORE_BUILTINS)) {
    registry.registerBuiltin(name, fn);
  }
  for (const [name, fn] of Object.entries(INDICATOR_BUILTINS)) {
    registry.registerBuiltin(name, fn);
  }

  return registry;
}
