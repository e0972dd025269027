/**
 * Semantic checks
 * Undefined names, unknown functions, unused variables and return arity
 */
import { ExprNode, FunctionDef, Script, StmtNode } from '../spec/types';
import { BuiltinRegistry, createStandardRegistry } from '../features/registry';

// ============================================================================
// Builtin identifiers
// ============================================================================

// Row metadata resolved by the executors
const METADATA_IDENTIFIERS = new Set(['_index', '_total', '_args', '_args_names']);

const ERROR_IDENTIFIER = '__error__';

// ============================================================================
// Results
// ============================================================================

export interface SemanticIssue {
  message: string;
  name?: string;
}

export interface AnalysisResult {
  errors: SemanticIssue[];
  warnings: SemanticIssue[];
}

// ============================================================================
// Analyzer
// ============================================================================

class ScriptAnalyzer {
  readonly errors: SemanticIssue[] = [];
  readonly warnings: SemanticIssue[] = [];
  private readonly reads = new Set<string>();
  private readonly assigned: string[] = [];
  private readonly reported = new Set<string>();

  constructor(
    private readonly registry: BuiltinRegistry,
    private readonly functionNames: ReadonlySet<string>,
    /** Names that may be read through history even before assignment */
    private readonly historyNames: ReadonlySet<string>,
    private readonly outputCount: number
  ) {}

  checkFunction(def: FunctionDef, globals: Iterable<string>): void {
    const defined = new Set(globals);
    for (const param of def.params) {
      if (param.defaultValue) {
        this.checkExpr(param.defaultValue, defined);
      }
      defined.add(param.name);
    }
    this.checkBody(def.body, defined, false);
  }

  /**
   * Walks statements in order; `defined` grows as assignments are seen.
   */
  checkBody(stmts: StmtNode[], defined: Set<string>, checkReturn: boolean): void {
    for (const stmt of stmts) {
      switch (stmt.type) {
        case 'assign':
          this.checkExpr(stmt.value, defined);
          this.define(stmt.name, defined);
          break;

        case 'destructure':
          this.checkExpr(stmt.value, defined);
          for (const target of stmt.targets) {
            if (target.kind !== 'ignore') {
              this.define(target.name, defined);
            }
          }
          break;

        case 'if': {
          this.checkExpr(stmt.test, defined);
          const thenScope = new Set(defined);
          const elseScope = new Set(defined);
          this.checkBody(stmt.then, thenScope, checkReturn);
          if (stmt.otherwise) {
            this.checkBody(stmt.otherwise, elseScope, checkReturn);
          }
          // Names assigned on either branch count as defined afterwards
          for (const name of [...thenScope, ...elseScope]) {
            defined.add(name);
          }
          break;
        }

        case 'return':
          this.checkExpr(stmt.value, defined);
          if (
            checkReturn &&
            stmt.value.type === 'array' &&
            this.outputCount > 0 &&
            stmt.value.elements.length !== this.outputCount
          ) {
            this.warnings.push({
              message: `Return has ${stmt.value.elements.length} values but OUTPUT declares ${this.outputCount}`,
            });
          }
          break;

        case 'expression':
          this.checkExpr(stmt.expression, defined);
          break;
      }
    }
  }

  checkExpr(node: ExprNode, defined: ReadonlySet<string>): void {
    switch (node.type) {
      case 'number':
      case 'string':
      case 'bool':
      case 'null':
      case 'member':
        return;

      case 'identifier':
        this.read(node.name, defined);
        return;

      case 'array':
        node.elements.forEach((el) => this.checkExpr(el, defined));
        return;

      case 'binary':
        this.checkExpr(node.left, defined);
        this.checkExpr(node.right, defined);
        return;

      case 'unary':
        this.checkExpr(node.argument, defined);
        return;

      case 'ternary':
        this.checkExpr(node.test, defined);
        this.checkExpr(node.consequent, defined);
        this.checkExpr(node.alternate, defined);
        return;

      case 'when':
        for (const branch of node.branches) {
          this.checkExpr(branch.test, defined);
          this.checkExpr(branch.result, defined);
        }
        if (node.otherwise) {
          this.checkExpr(node.otherwise, defined);
        }
        return;

      case 'call':
        this.checkCallee(node.callee, defined);
        node.arguments.forEach((arg) => this.checkExpr(arg, defined));
        return;

      case 'index':
        this.checkHistoryBase(node.object, defined);
        this.checkExpr(node.index, defined);
        return;

      case 'slice':
        this.checkHistoryBase(node.object, defined);
        if (node.start) this.checkExpr(node.start, defined);
        if (node.end) this.checkExpr(node.end, defined);
        return;

      case 'lambda':
        this.checkExpr(node.body, new Set([...defined, ...node.params]));
        return;

      case 'fstring':
        node.parts.forEach((part) => this.checkExpr(part, defined));
        return;

      case 'pipeline':
        this.checkExpr(node.value, defined);
        for (const stage of node.stages) {
          if (stage.type === 'call') {
            this.checkExpr(stage, defined);
          } else {
            this.errors.push({ message: 'Pipeline stages must be function calls' });
          }
        }
        return;
    }
  }

  /**
   * Warn about assigned names that are never read.
   */
  reportUnused(): void {
    for (const name of new Set(this.assigned)) {
      if (!this.reads.has(name) && !name.startsWith('_')) {
        this.warnings.push({ message: `Variable '${name}' is assigned but never used`, name });
      }
    }
  }

  private define(name: string, defined: Set<string>): void {
    defined.add(name);
    this.assigned.push(name);
  }

  private read(name: string, defined: ReadonlySet<string>): void {
    this.reads.add(name);
    if (!defined.has(name) && !METADATA_IDENTIFIERS.has(name)) {
      this.report(`Undefined variable: ${name}`, name);
    }
  }

  private checkHistoryBase(object: ExprNode, defined: ReadonlySet<string>): void {
    if (object.type === 'identifier' && this.historyNames.has(object.name)) {
      this.reads.add(object.name);
      return;
    }
    this.checkExpr(object, defined);
  }

  private checkCallee(callee: string, defined: ReadonlySet<string>): void {
    if (callee.includes('.')) {
      return;
    }
    if (defined.has(callee)) {
      this.reads.add(callee);
      return;
    }
    if (!this.functionNames.has(callee) && !this.registry.has(callee)) {
      this.report(`Undefined function: ${callee}`, callee);
    }
  }

  private report(message: string, name: string): void {
    if (!this.reported.has(message)) {
      this.reported.add(message);
      this.errors.push({ message, name });
    }
  }
}

// ============================================================================
// Entry point
// ============================================================================

export function analyzeScript(
  script: Script,
  registry: BuiltinRegistry = createStandardRegistry()
): AnalysisResult {
  const functionNames = new Set(script.functions.map((f) => f.name));

  if (script.kind === 'package') {
    const analyzer = new ScriptAnalyzer(registry, functionNames, new Set(), 0);
    const defined = new Set<string>();
    for (const variable of script.variables) {
      analyzer.checkExpr(variable.value, defined);
      defined.add(variable.name);
    }
    const globals = script.variables.map((v) => v.name);
    for (const def of script.functions) {
      analyzer.checkFunction(def, globals);
    }
    return { errors: analyzer.errors, warnings: analyzer.warnings };
  }

  const inputs = script.input.map((p) => p.name);
  const historyNames = new Set([...inputs, ...script.output.map((p) => p.name)]);
  const analyzer = new ScriptAnalyzer(registry, functionNames, historyNames, script.output.length);

  for (const def of script.functions) {
    analyzer.checkFunction(def, inputs);
  }

  const defined = new Set(inputs);
  analyzer.checkBody(script.body, defined, true);

  if (script.errorBlock) {
    // The ERROR block runs in the failed row's scope
    analyzer.checkBody(script.errorBlock, new Set([...defined, ERROR_IDENTIFIER]), true);
  }

  analyzer.reportUnused();
  return { errors: analyzer.errors, warnings: analyzer.warnings };
}
