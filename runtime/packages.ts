/**
 * Package evaluation
 * Runs package scripts once and flattens their members into `pkg.member` data.
 */
import { PackageData, PackageScript, Value } from '../spec/types';
import { LoggerFactory } from '../logging/logger';
import { BuiltinRegistry } from '../features/registry';
import { ExecutionContext } from './context';
import { Evaluator } from './eval';
import { RuntimeError } from './errors';

const logger = LoggerFactory.getLogger('Packages');

/**
 * Evaluate a package script. Functions are registered before variables,
 * so variables may call them; each variable sees the ones declared above it.
 */
export function evaluatePackage(
  script: PackageScript,
  registry?: BuiltinRegistry
): Map<string, Value> {
  const evaluator = new Evaluator({ functions: script.functions, registry });
  const scope = new ExecutionContext();
  const members = new Map<string, Value>();

  for (const def of script.functions) {
    members.set(def.name, { type: 'function', def, packageName: script.name });
  }
  for (const variable of script.variables) {
    const value = evaluator.evaluate(variable.value, { scope });
    scope.set(variable.name, value);
    members.set(variable.name, value);
  }

  logger.debug('Package evaluated', {
    package: script.name,
    variables: script.variables.length,
    functions: script.functions.length,
  });
  return members;
}

/**
 * Evaluate every imported package once and flatten into `pkg.member` keys.
 */
export function loadPackageData(
  imports: readonly string[],
  packages: ReadonlyMap<string, PackageScript>,
  registry?: BuiltinRegistry
): PackageData {
  const data = new Map<string, Value>();

  for (const name of new Set(imports)) {
    const script = packages.get(name);
    if (!script) {
      throw RuntimeError.typeError(`Package not found: ${name}`);
    }
    for (const [member, value] of evaluatePackage(script, registry)) {
      data.set(`${name}.${member}`, value);
    }
  }

  return data;
}
