/**
 * Row executor base
 * Shared per-row lifecycle for the batch and streaming executors:
 * acquire scope, bind inputs, evaluate body, collect outputs, release scope.
 */
import {
  DataScript,
  ErrorPolicy,
  FunctionDef,
  PackageData,
  PoolConfig,
  Row,
  RowSource,
  Value,
} from '../spec/types';
import { loadEngineConfig } from '../config';
import { BuiltinRegistry } from '../features/registry';
import { Logger, LoggerFactory } from '../logging/logger';
import { ContextPool } from './contextPool';
import { ExecutionContext } from './context';
import { CallContext, Evaluator } from './eval';
import * as V from './values';

export interface ExecutorOptions {
  packageData?: PackageData;
  /** Registered alongside the script's own functions */
  functions?: FunctionDef[];
  pool?: PoolConfig;
  errorPolicy?: ErrorPolicy;
  registry?: BuiltinRegistry;
  logger?: Logger;
}

/**
 * Round every decimal in a result to the script's precision.
 */
export function applyScriptPrecision(value: Value, precision: number | undefined): Value {
  if (precision === undefined) {
    return value;
  }
  switch (value.type) {
    case 'decimal':
      return V.applyPrecision(value, precision);
    case 'array':
    case 'slice': {
      const items = V.sequenceItems(value) ?? [];
      return V.arr(items.map((item) => applyScriptPrecision(item, precision)));
    }
    default:
      return value;
  }
}

export abstract class BaseRowExecutor implements RowSource {
  protected readonly evaluator: Evaluator;
  protected readonly pool: ContextPool;
  protected readonly errorPolicy: ErrorPolicy;
  protected readonly logger: Logger;

  constructor(protected readonly script: DataScript, options: ExecutorOptions = {}) {
    this.logger = options.logger ?? LoggerFactory.getLogger(this.constructor.name);
    this.pool = new ContextPool(options.pool ?? loadEngineConfig().pool);
    this.errorPolicy = options.errorPolicy ?? 'abort';
    this.evaluator = new Evaluator({
      packageData: options.packageData,
      functions: [...script.functions, ...(options.functions ?? [])],
      registry: options.registry,
      print: (text) => this.logger.info(text),
    });
  }

  // ==========================================================================
  // RowSource
  // ==========================================================================

  abstract getInputHistory(name: string, offset: number): Value | undefined;
  abstract getOutputHistory(name: string, offset: number): Value | undefined;
  abstract getInputSlice(name: string, startOffset: number, endOffset: number): Value;
  abstract getOutputSlice(name: string, startOffset: number, endOffset: number): Value;
  abstract currentIndex(): number;
  abstract totalRows(): number;
  abstract currentRow(): Row | undefined;
  abstract historyLength(): number;

  isInputColumn(name: string): boolean {
    return this.script.input.some((param) => param.name === name) || (this.currentRow()?.has(name) ?? false);
  }

  // ==========================================================================
  // Row evaluation
  // ==========================================================================

  /**
   * Evaluate the body for one input row. Undefined when the body returns no array.
   */
  protected evaluateRow(input: Row): Row | undefined {
    return this.pool.use((scope) => {
      for (const param of this.script.input) {
        scope.set(param.name, input.get(param.name) ?? V.NULL);
      }
      const ctx: CallContext = { scope, rows: this };
      try {
        return this.collectOutputs(this.evaluator.executeBody(this.script.body, ctx));
      } catch (error) {
        return this.recover(error, scope);
      }
    });
  }

  private recover(error: unknown, scope: ExecutionContext): Row | undefined {
    const message = error instanceof Error ? error.message : String(error);
    const errorBlock = this.script.errorBlock;

    if (this.errorPolicy !== 'error-block' || !errorBlock) {
      this.logger.logRow('error', `Row evaluation failed: ${message}`, this.currentIndex());
      throw error;
    }

    this.logger.logRow('warn', `Row recovered by ERROR block: ${message}`, this.currentIndex());
    scope.set('__error__', V.str(message));
    return this.collectOutputs(this.evaluator.executeBody(errorBlock, { scope, rows: this }));
  }

  /**
   * Map a returned array onto OUTPUT names by position.
   */
  private collectOutputs(result: Value | undefined): Row | undefined {
    const items = result ? V.sequenceItems(result) : undefined;
    if (!items) {
      return undefined;
    }
    const row: Row = new Map();
    this.script.output.forEach((param, i) => {
      if (i < items.length) {
        row.set(param.name, applyScriptPrecision(items[i], this.script.precision));
      }
    });
    return row;
  }
}
