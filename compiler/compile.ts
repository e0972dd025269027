/**
 * Compiler: YAML script documents → script AST
 * Orchestrates schema validation, statement parsing and semantic checks
 */
import YAML from 'yaml';
import { ZodError } from 'zod';
import {
  DataScriptDSL,
  FunctionDSL,
  isPackageDocument,
  PackageScriptDSL,
  StatementDSL,
  validateDataScriptDSL,
  validatePackageScriptDSL,
} from '../spec/schema';
import {
  DataScript,
  DestructureTarget,
  FunctionDef,
  PackageScript,
  Parameter,
  ParamType,
  Script,
  StmtNode,
  VariableDef,
} from '../spec/types';
import { BuiltinRegistry, createStandardRegistry } from '../features/registry';
import { LoggerFactory } from '../logging/logger';
import { ScriptCompileError } from './errors';
import { parseExpression } from './expr';
import { analyzeScript } from './typecheck';

const logger = LoggerFactory.getLogger('ScriptCompiler');

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const PARAM_TYPES: readonly ParamType[] = ['number', 'decimal', 'string', 'bool', 'array', 'null'];

export interface CompileOptions {
  /** Run the semantic check and reject scripts with errors (default true) */
  semanticCheck?: boolean;
}

// ============================================================================
// Compiler
// ============================================================================

export class ScriptCompiler {
  private readonly semanticCheck: boolean;

  constructor(
    private readonly registry: BuiltinRegistry = createStandardRegistry(),
    options: CompileOptions = {}
  ) {
    this.semanticCheck = options.semanticCheck ?? true;
  }

  /**
   * Compile from YAML string
   */
  compileFromYAML(yamlSource: string): Script {
    let parsed: unknown;
    try {
      parsed = YAML.parse(yamlSource);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new ScriptCompileError('SCHEMA', `Invalid YAML: ${message}`);
    }
    return this.compileFromDSL(parsed);
  }

  /**
   * Compile from a parsed document. Documents with a `package` key are package scripts.
   */
  compileFromDSL(dslObj: unknown): Script {
    const script = isPackageDocument(dslObj)
      ? this.buildPackageScript(validated(() => validatePackageScriptDSL(dslObj)))
      : this.buildDataScript(validated(() => validateDataScriptDSL(dslObj)));

    if (this.semanticCheck) {
      const analysis = analyzeScript(script, this.registry);
      for (const warning of analysis.warnings) {
        logger.warn(`Script warning: ${warning.message}`);
      }
      if (analysis.errors.length > 0) {
        throw new ScriptCompileError(
          'SEMANTIC',
          analysis.errors.map((e) => e.message).join('; '),
          analysis.errors
        );
      }
    }

    return script;
  }

  /**
   * Compile and require a data script
   */
  compileDataScript(yamlSource: string): DataScript {
    const script = this.compileFromYAML(yamlSource);
    if (script.kind !== 'data') {
      throw new ScriptCompileError('SCHEMA', `Expected a data script, got package "${script.name}"`);
    }
    return script;
  }

  // ==========================================================================
  // Script builders
  // ==========================================================================

  private buildDataScript(dsl: DataScriptDSL): DataScript {
    const input = parseParamList(dsl.input, 'INPUT');
    const output = parseParamList(dsl.output, 'OUTPUT');
    for (const param of [...input, ...output]) {
      if (param.defaultValue) {
        throw new ScriptCompileError('PARAM', `Parameter '${param.name}' cannot have a default here`);
      }
    }

    return {
      kind: 'data',
      imports: dsl.imports,
      input,
      output,
      functions: buildFunctions(dsl.functions),
      errorBlock: dsl.error ? parseStatements(dsl.error) : undefined,
      precision: dsl.precision,
      body: parseStatements(dsl.body),
    };
  }

  private buildPackageScript(dsl: PackageScriptDSL): PackageScript {
    const variables: VariableDef[] = dsl.variables.map((source) => {
      const stmt = parseStatement(source);
      if (stmt.type !== 'assign') {
        throw new ScriptCompileError(
          'PARSE',
          `Package variable must be an assignment: "${source}"`
        );
      }
      return { name: stmt.name, value: stmt.value, mutable: stmt.mutable };
    });

    return {
      kind: 'package',
      name: dsl.package,
      variables,
      functions: buildFunctions(dsl.functions),
    };
  }
}

// ============================================================================
// Declarations
// ============================================================================

function validated<T>(parse: () => T): T {
  try {
    return parse();
  } catch (e) {
    if (e instanceof ZodError) {
      const issues = e.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
      throw new ScriptCompileError('SCHEMA', `Invalid script: ${issues.join('; ')}`, e.issues);
    }
    throw e;
  }
}

function parseParamList(list: string | string[], where: string): Parameter[] {
  const entries = typeof list === 'string' ? splitTopLevel(list) : list;
  const params = entries
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => parseParameter(entry, where));

  const seen = new Set<string>();
  for (const param of params) {
    if (seen.has(param.name)) {
      throw new ScriptCompileError('PARAM', `Duplicate ${where} parameter '${param.name}'`);
    }
    seen.add(param.name);
  }
  return params;
}

/**
 * `name`, `name:type`, `name = default`, or `name:type = default`
 */
export function parseParameter(source: string, where = 'function'): Parameter {
  const match = /^([A-Za-z_][A-Za-z0-9_]*)\s*(?::\s*([A-Za-z]+))?\s*(?:=\s*([\s\S]+))?$/.exec(
    source.trim()
  );
  if (!match) {
    throw new ScriptCompileError('PARAM', `Invalid ${where} parameter "${source}"`);
  }

  const [, name, typeName, defaultSource] = match;
  const param: Parameter = { name };
  if (typeName !== undefined) {
    const paramType = PARAM_TYPES.find((t) => t === typeName);
    if (!paramType) {
      throw new ScriptCompileError(
        'PARAM',
        `Unknown type '${typeName}' for parameter '${name}'. Allowed: ${PARAM_TYPES.join(', ')}`
      );
    }
    param.paramType = paramType;
  }
  if (defaultSource !== undefined) {
    param.defaultValue = parseExpression(defaultSource);
  }
  return param;
}

function buildFunctions(defs: FunctionDSL[]): FunctionDef[] {
  const names = new Set<string>();
  return defs.map((dsl) => {
    if (names.has(dsl.name)) {
      throw new ScriptCompileError('FUNCTION', `Duplicate function '${dsl.name}'`);
    }
    names.add(dsl.name);

    const params = parseParamList(dsl.params, `function ${dsl.name}`);
    let seenDefault = false;
    for (const param of params) {
      if (param.defaultValue) {
        seenDefault = true;
      } else if (seenDefault) {
        throw new ScriptCompileError(
          'FUNCTION',
          `Function ${dsl.name}: required parameter '${param.name}' follows a parameter with a default`
        );
      }
    }

    return { name: dsl.name, params, body: parseStatements(dsl.body) };
  });
}

// ============================================================================
// Statements
// ============================================================================

export function parseStatements(statements: StatementDSL[]): StmtNode[] {
  return statements.map((stmt) =>
    typeof stmt === 'string'
      ? parseStatement(stmt)
      : {
          type: 'if',
          test: parseExpression(stmt.if),
          then: parseStatements(stmt.then),
          otherwise: stmt.else ? parseStatements(stmt.else) : undefined,
        }
  );
}

/**
 * One line: `return e`, `mut x = e`, `x = e`, `[a, _, ...rest] = e`, or a bare expression.
 */
export function parseStatement(source: string): StmtNode {
  const text = source.trim();

  const ret = /^return(?:\s+([\s\S]+))?$/.exec(text);
  if (ret) {
    return { type: 'return', value: ret[1] ? parseExpression(ret[1]) : { type: 'null' } };
  }

  const assign = /^(mut\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=(?!=)\s*([\s\S]+)$/.exec(text);
  if (assign) {
    return {
      type: 'assign',
      name: assign[2],
      value: parseExpression(assign[3]),
      mutable: assign[1] !== undefined,
    };
  }

  const destructure = /^\[([^\]]*)\]\s*=(?!=)\s*([\s\S]+)$/.exec(text);
  if (destructure) {
    return {
      type: 'destructure',
      targets: parseTargets(destructure[1], text),
      value: parseExpression(destructure[2]),
    };
  }

  return { type: 'expression', expression: parseExpression(text) };
}

function parseTargets(list: string, source: string): DestructureTarget[] {
  const parts = list.split(',').map((p) => p.trim());
  return parts.map((part, i) => {
    if (part === '_') {
      return { kind: 'ignore' };
    }
    if (part.startsWith('...')) {
      const name = part.slice(3).trim();
      if (!IDENTIFIER.test(name) || i !== parts.length - 1) {
        throw new ScriptCompileError('PARSE', `Invalid rest target in "${source}"`);
      }
      return { kind: 'rest', name };
    }
    if (!IDENTIFIER.test(part)) {
      throw new ScriptCompileError('PARSE', `Invalid destructuring target "${part}" in "${source}"`);
    }
    return { kind: 'name', name: part };
  });
}

/**
 * Split on commas outside brackets, parentheses and quotes.
 */
function splitTopLevel(source: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let current = '';

  for (const ch of source) {
    if (quote) {
      if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '(' || ch === '[') {
      depth++;
    } else if (ch === ')' || ch === ']') {
      depth--;
    } else if (ch === ',' && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts;
}
