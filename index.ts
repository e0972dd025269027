/**
 * tickscript engine
 * Main entry point and public API
 */

// ============================================================================
// Core Types
// ============================================================================
export type {
  ExprNode,
  StmtNode,
  Parameter,
  ParamType,
  FunctionDef,
  VariableDef,
  DataScript,
  PackageScript,
  Script,
  Value,
  Row,
  PackageData,
  HistoryAccess,
  RowCursor,
  RowSource,
  PoolConfig,
  ErrorPolicy,
} from './spec/types';

// ============================================================================
// Schema & Validation
// ============================================================================
export {
  DataScriptDSLSchema,
  PackageScriptDSLSchema,
  StatementDSLSchema,
  validateDataScriptDSL,
  validatePackageScriptDSL,
} from './spec/schema';

// ============================================================================
// Compiler
// ============================================================================
export { ScriptCompiler, parseStatement, parseStatements } from './compiler/compile';
export type { CompileOptions } from './compiler/compile';
export { ScriptCompileError } from './compiler/errors';
export type { CompilationError, CompilationErrorCode } from './compiler/errors';
export { parseExpression, extractIdentifiers } from './compiler/expr';
export { analyzeScript } from './compiler/typecheck';
export type { AnalysisResult, SemanticIssue } from './compiler/typecheck';

// ============================================================================
// Runtime
// ============================================================================
export * as values from './runtime/values';
export { RuntimeError, isRuntimeError } from './runtime/errors';
export type { RuntimeErrorKind } from './runtime/errors';
export { ExecutionContext } from './runtime/context';
export { ContextPool, DEFAULT_POOL_CONFIG } from './runtime/contextPool';
export { ColumnarStorage } from './runtime/columnar';
export { Evaluator } from './runtime/eval';
export type { CallContext, EvaluatorOptions } from './runtime/eval';
export { BaseRowExecutor } from './runtime/executor';
export type { ExecutorOptions } from './runtime/executor';
export { DataStreamExecutor } from './runtime/dataStream';
export { StreamingExecutor, RingBuffer } from './runtime/streaming';
export { ScriptRunner } from './runtime/runner';
export { evaluatePackage, loadPackageData } from './runtime/packages';
export { PackageLoader } from './runtime/packageLoader';

// ============================================================================
// Builtins
// ============================================================================
export { BuiltinRegistry, createStandardRegistry } from './features/registry';
export type { BuiltinFunction, BuiltinContext } from './runtime/builtins';
export {
  computeSMA,
  computeEMA,
  computeRSI,
  computeMACD,
  computeBollingerBands,
  computeATR,
  computeKDJ,
} from './features/indicators';

// ============================================================================
// Configuration & Logging
// ============================================================================
export { loadEngineConfig, loadLoggingConfig } from './config';
export type { EngineConfig, LoggingConfig } from './config';
export { Logger, LoggerFactory } from './logging/logger';
