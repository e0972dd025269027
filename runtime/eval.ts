/**
 * Runtime evaluator
 * Walks expression and statement trees against a scope, package data,
 * user functions and the builtin registry.
 */
import {
  ExprNode,
  FunctionDef,
  IndexNode,
  LambdaNode,
  LambdaValue,
  PackageData,
  RowSource,
  SliceNode,
  StmtNode,
  Value,
} from '../spec/types';
import { extractIdentifiers } from '../compiler/expr';
import { BuiltinRegistry, createStandardRegistry } from '../features/registry';
import { BuiltinContext } from './builtins';
import { ExecutionContext } from './context';
import { RuntimeError } from './errors';
import * as V from './values';

// ============================================================================
// Types
// ============================================================================

/**
 * Per-call state threaded through evaluation.
 * `rows` is present only while a row executor drives the evaluation.
 */
export interface CallContext {
  scope: ExecutionContext;
  rows?: RowSource;
  /** Set while a package function runs; bare names also resolve as `<package>.<name>` */
  packageName?: string;
}

export interface EvaluatorOptions {
  packageData?: PackageData;
  functions?: FunctionDef[];
  registry?: BuiltinRegistry;
  print?: (text: string) => void;
}

const BINARY_OPS: Record<string, (a: Value, b: Value) => Value> = {
  '+': V.add,
  '-': V.sub,
  '*': V.mul,
  '/': V.div,
  '%': V.mod,
  '^': V.pow,
  '>': V.gt,
  '<': V.lt,
  '>=': V.gte,
  '<=': V.lte,
  '==': V.eq,
  '!=': V.neq,
  and: V.and,
  or: V.or,
};

// Free variables per lambda body, computed once per node
const captureCache = new WeakMap<LambdaNode, string[]>();

function captureNames(node: LambdaNode): string[] {
  let names = captureCache.get(node);
  if (!names) {
    names = [...extractIdentifiers(node.body, new Set(node.params))];
    captureCache.set(node, names);
  }
  return names;
}

// ============================================================================
// Evaluator
// ============================================================================

export class Evaluator {
  private readonly packageData: PackageData;
  private readonly functions = new Map<string, FunctionDef>();
  private readonly registry: BuiltinRegistry;
  private readonly print: (text: string) => void;

  constructor(options: EvaluatorOptions = {}) {
    this.packageData = options.packageData ?? new Map();
    this.registry = options.registry ?? createStandardRegistry();
    this.print = options.print ?? (() => undefined);
    for (const def of options.functions ?? []) {
      this.registerFunction(def);
    }
  }

  /**
   * Register a user function. Required parameters must precede defaulted ones.
   */
  registerFunction(def: FunctionDef): void {
    let seenDefault = false;
    for (const param of def.params) {
      if (param.defaultValue) {
        seenDefault = true;
      } else if (seenDefault) {
        throw RuntimeError.typeError(
          `Function ${def.name}: required parameter '${param.name}' follows a parameter with a default`
        );
      }
    }
    this.functions.set(def.name, def);
  }

  hasFunction(name: string): boolean {
    return this.functions.has(name);
  }

  // ==========================================================================
  // Statements
  // ==========================================================================

  /**
   * Run statements in order. Returns the first returned value, or undefined.
   */
  executeBody(stmts: StmtNode[], ctx: CallContext): Value | undefined {
    for (const stmt of stmts) {
      const result = this.executeStatement(stmt, ctx);
      if (result !== undefined) {
        return result;
      }
    }
    return undefined;
  }

  executeStatement(stmt: StmtNode, ctx: CallContext): Value | undefined {
    switch (stmt.type) {
      case 'assign':
        ctx.scope.set(stmt.name, this.evaluate(stmt.value, ctx));
        return undefined;

      case 'destructure': {
        const items = V.sequenceItems(this.evaluate(stmt.value, ctx));
        if (!items) {
          return undefined;
        }
        for (let i = 0; i < stmt.targets.length; i++) {
          const target = stmt.targets[i];
          if (target.kind === 'rest') {
            ctx.scope.set(target.name, V.arr(items.slice(i)));
            break;
          }
          if (target.kind === 'name' && i < items.length) {
            ctx.scope.set(target.name, items[i]);
          }
        }
        return undefined;
      }

      case 'if':
        if (V.truthy(this.evaluate(stmt.test, ctx))) {
          return this.executeBody(stmt.then, ctx);
        }
        return stmt.otherwise ? this.executeBody(stmt.otherwise, ctx) : undefined;

      case 'return':
        return this.evaluate(stmt.value, ctx);

      case 'expression':
        this.evaluate(stmt.expression, ctx);
        return undefined;
    }
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  evaluate(node: ExprNode, ctx: CallContext): Value {
    switch (node.type) {
      case 'number':
        return V.num(node.value);
      case 'string':
        return V.str(node.value);
      case 'bool':
        return V.bool(node.value);
      case 'null':
        return V.NULL;

      case 'identifier':
        return this.resolveIdentifier(node.name, ctx);

      case 'array':
        return V.arr(node.elements.map((el) => this.evaluate(el, ctx)));

      case 'binary': {
        // Both sides are always evaluated
        const left = this.evaluate(node.left, ctx);
        const right = this.evaluate(node.right, ctx);
        return BINARY_OPS[node.operator](left, right);
      }

      case 'unary': {
        const arg = this.evaluate(node.argument, ctx);
        return node.operator === '-' ? V.neg(arg) : V.not(arg);
      }

      case 'ternary':
        return V.truthy(this.evaluate(node.test, ctx))
          ? this.evaluate(node.consequent, ctx)
          : this.evaluate(node.alternate, ctx);

      case 'when':
        for (const branch of node.branches) {
          if (V.truthy(this.evaluate(branch.test, ctx))) {
            return this.evaluate(branch.result, ctx);
          }
        }
        return node.otherwise ? this.evaluate(node.otherwise, ctx) : V.NULL;

      case 'call': {
        const args = node.arguments.map((arg) => this.evaluate(arg, ctx));
        return this.callByName(node.callee, args, ctx);
      }

      case 'member': {
        const fullName = `${node.object}.${node.property}`;
        const value = this.packageData.get(fullName);
        if (value === undefined) {
          throw RuntimeError.undefinedVariable(fullName);
        }
        return value;
      }

      case 'index':
        return this.evaluateIndex(node, ctx);

      case 'slice':
        return this.evaluateSlice(node, ctx);

      case 'lambda': {
        const captures = new Map<string, Value>();
        for (const name of captureNames(node)) {
          const value = ctx.scope.get(name);
          if (value !== undefined) {
            captures.set(name, value);
          }
        }
        return { type: 'lambda', params: node.params, body: node.body, captures };
      }

      case 'fstring':
        return V.str(node.parts.map((part) => V.valueToText(this.evaluate(part, ctx))).join(''));

      case 'pipeline': {
        let result = this.evaluate(node.value, ctx);
        for (const stage of node.stages) {
          if (stage.type !== 'call') {
            throw RuntimeError.typeError('Pipeline stages must be function calls');
          }
          const args = [result, ...stage.arguments.map((arg) => this.evaluate(arg, ctx))];
          result = this.callByName(stage.callee, args, ctx);
        }
        return result;
      }
    }
  }

  // ==========================================================================
  // Identifiers
  // ==========================================================================

  private resolveIdentifier(name: string, ctx: CallContext): Value {
    const value = ctx.scope.get(name) ?? this.packageMember(name, ctx);
    if (value !== undefined) {
      return value;
    }
    const meta = ctx.rows ? this.resolveMetadata(name, ctx.rows) : undefined;
    if (meta !== undefined) {
      return meta;
    }
    throw RuntimeError.undefinedVariable(name);
  }

  private packageMember(name: string, ctx: CallContext): Value | undefined {
    return ctx.packageName ? this.packageData.get(`${ctx.packageName}.${name}`) : undefined;
  }

  /**
   * Row metadata names, consulted only when the scope has no such variable.
   */
  private resolveMetadata(name: string, rows: RowSource): Value | undefined {
    switch (name) {
      case '_index':
        return V.num(rows.currentIndex());
      case '_total':
        return V.num(rows.totalRows());
      case '_args': {
        const row = rows.currentRow();
        return row ? V.arr([...row.values()]) : undefined;
      }
      case '_args_names': {
        const row = rows.currentRow();
        return row ? V.arr([...row.keys()].map(V.str)) : undefined;
      }
      default:
        return undefined;
    }
  }

  // ==========================================================================
  // Indexing and slicing
  // ==========================================================================

  private indexNumber(node: ExprNode, ctx: CallContext, what: string): number {
    const value = this.evaluate(node, ctx);
    if (value.type !== 'number') {
      throw RuntimeError.typeError(`${what} must be a number, got ${value.type}`);
    }
    return Math.trunc(value.value);
  }

  private evaluateIndex(node: IndexNode, ctx: CallContext): Value {
    const idx = this.indexNumber(node.index, ctx, 'Index');

    if (node.object.type === 'identifier') {
      const name = node.object.name;
      if (idx === 0) {
        return this.resolveIdentifier(name, ctx);
      }
      if (idx < 0) {
        const history = ctx.rows
          ? ctx.rows.getInputHistory(name, -idx) ?? ctx.rows.getOutputHistory(name, -idx)
          : undefined;
        if (history !== undefined) {
          return history;
        }
        const local = ctx.scope.get(name);
        const items = local ? V.sequenceItems(local) : undefined;
        return items ? indexItems(items, idx) : V.NULL;
      }
    }

    const base = this.evaluate(node.object, ctx);
    const items = V.sequenceItems(base);
    if (!items) {
      throw RuntimeError.typeError(`Cannot index ${base.type}`);
    }
    return indexItems(items, idx);
  }

  private evaluateSlice(node: SliceNode, ctx: CallContext): Value {
    const start = node.start ? this.indexNumber(node.start, ctx, 'Slice bound') : undefined;
    const end = node.end ? this.indexNumber(node.end, ctx, 'Slice bound') : undefined;

    const rows = ctx.rows;
    if (node.object.type === 'identifier' && rows && ((start ?? 0) < 0 || (end ?? 0) < 0)) {
      const name = node.object.name;
      const startOffset = start === undefined ? rows.historyLength() : start < 0 ? -start : 0;
      const endOffset = end !== undefined && end < 0 ? -end : 0;
      return rows.isInputColumn(name)
        ? rows.getInputSlice(name, startOffset, endOffset)
        : rows.getOutputSlice(name, startOffset, endOffset);
    }

    const base = this.evaluate(node.object, ctx);
    const items = V.sequenceItems(base);
    if (!items) {
      throw RuntimeError.typeError(`Cannot slice ${base.type}`);
    }
    const len = items.length;
    const from = start === undefined ? 0 : start < 0 ? Math.max(0, len + start) : Math.min(start, len);
    const to = end === undefined ? len : end < 0 ? Math.max(0, len + end) : Math.min(end, len);
    return V.arr(from <= to ? items.slice(from, to) : []);
  }

  // ==========================================================================
  // Calls
  // ==========================================================================

  /**
   * Resolution order: scope lambda, package function, user function, builtin.
   */
  private callByName(name: string, args: Value[], ctx: CallContext): Value {
    const local = ctx.scope.get(name);
    if (local?.type === 'lambda') {
      return this.callLambda(local, args, ctx);
    }

    const packaged = this.packageData.get(name) ?? this.packageMember(name, ctx);
    if (packaged?.type === 'function') {
      return this.callFunction(packaged.def, args, ctx, packaged.packageName);
    }

    const def = this.functions.get(name);
    if (def) {
      return this.callFunction(def, args, ctx);
    }

    const builtin = this.registry.getBuiltin(name);
    if (builtin) {
      return builtin(args, this.builtinContext(ctx));
    }

    throw RuntimeError.undefinedFunction(name);
  }

  private builtinContext(ctx: CallContext): BuiltinContext {
    return {
      history: ctx.rows,
      invoke: (fn, args) => this.invoke(fn, args, ctx),
      print: this.print,
    };
  }

  /**
   * Call a lambda or function value.
   */
  invoke(fn: Value, args: Value[], ctx: CallContext): Value {
    if (fn.type === 'lambda') {
      return this.callLambda(fn, args, ctx);
    }
    if (fn.type === 'function') {
      return this.callFunction(fn.def, args, ctx, fn.packageName);
    }
    throw RuntimeError.typeError(`${fn.type} is not callable`);
  }

  callLambda(lambda: LambdaValue, args: Value[], ctx: CallContext): Value {
    if (args.length !== lambda.params.length) {
      throw RuntimeError.argumentMismatch(
        `Lambda expects ${lambda.params.length} args, got ${args.length}`
      );
    }

    const saved = ctx.scope.snapshot();
    try {
      ctx.scope.setBatch(lambda.captures);
      lambda.params.forEach((param, i) => ctx.scope.set(param, args[i]));
      return this.evaluate(lambda.body, ctx);
    } finally {
      ctx.scope.restore(saved);
    }
  }

  callFunction(def: FunctionDef, args: Value[], ctx: CallContext, packageName?: string): Value {
    const required = def.params.filter((p) => !p.defaultValue).length;
    const total = def.params.length;
    if (args.length < required || args.length > total) {
      const expected = required === total ? `${total}` : `${required}-${total}`;
      throw RuntimeError.argumentMismatch(
        `Function ${def.name} expects ${expected} args, got ${args.length}`
      );
    }

    const inner: CallContext = packageName ? { ...ctx, packageName } : ctx;
    const saved = ctx.scope.snapshot();
    try {
      def.params.forEach((param, i) => {
        if (i < args.length) {
          ctx.scope.set(param.name, args[i]);
        } else if (param.defaultValue) {
          // Defaults are evaluated at call time and may read earlier parameters
          ctx.scope.set(param.name, this.evaluate(param.defaultValue, inner));
        }
      });
      return this.executeBody(def.body, inner) ?? V.NULL;
    } finally {
      ctx.scope.restore(saved);
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function indexItems(items: Value[], idx: number): Value {
  const actual = idx < 0 ? items.length + idx : idx;
  return actual >= 0 && actual < items.length ? items[actual] : V.NULL;
}
