/**
 * Single-shot runner
 * Evaluates a data script once against explicitly set inputs, without row history.
 */
import { DataScript, Row, Value } from '../spec/types';
import { Logger, LoggerFactory } from '../logging/logger';
import { ExecutionContext } from './context';
import { CallContext, Evaluator } from './eval';
import { applyScriptPrecision, ExecutorOptions } from './executor';
import * as V from './values';

export type RunnerOptions = Pick<ExecutorOptions, 'packageData' | 'functions' | 'registry' | 'logger'>;

export class ScriptRunner {
  private readonly evaluator: Evaluator;
  private readonly inputs: Row = new Map();
  private readonly logger: Logger;

  constructor(private readonly script: DataScript, options: RunnerOptions = {}) {
    this.logger = options.logger ?? LoggerFactory.getLogger('ScriptRunner');
    this.evaluator = new Evaluator({
      packageData: options.packageData,
      functions: [...script.functions, ...(options.functions ?? [])],
      registry: options.registry,
      print: (text) => this.logger.info(text),
    });
  }

  setInput(name: string, value: Value): this {
    this.inputs.set(name, value);
    return this;
  }

  setInputs(row: Row): this {
    for (const [name, value] of row) {
      this.inputs.set(name, value);
    }
    return this;
  }

  /**
   * Run the body once. On failure the ERROR block, when declared, supplies the
   * result with `__error__` bound to the message. Undefined when nothing is returned.
   */
  run(): Value | undefined {
    const scope = new ExecutionContext();
    for (const param of this.script.input) {
      scope.set(param.name, V.NULL);
    }
    scope.setBatch(this.inputs);
    const ctx: CallContext = { scope };

    let result: Value | undefined;
    try {
      result = this.evaluator.executeBody(this.script.body, ctx);
    } catch (error) {
      if (!this.script.errorBlock) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Script failed, running ERROR block', { error: message });
      scope.set('__error__', V.str(message));
      result = this.evaluator.executeBody(this.script.errorBlock, ctx);
    }

    return result === undefined ? undefined : applyScriptPrecision(result, this.script.precision);
  }
}
