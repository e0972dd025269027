/**
 * Expression language: parsing and identifier analysis
 * Uses jsep for parsing, extended with the script operators
 */
import jsep from 'jsep';
import { BinaryOperator, ExprNode, WhenBranch } from '../spec/types';
import { ScriptCompileError } from './errors';

// ============================================================================
// Grammar Extensions
// ============================================================================

jsep.addBinaryOp('or', 1);
jsep.addBinaryOp('and', 2);
jsep.addBinaryOp('^', 11, true);
jsep.addBinaryOp('|>', 0.7);
jsep.addBinaryOp('->', 0.5);
jsep.addUnaryOp('not');

const SLICE_MARKER = '__slice__';
const FSTRING_MARKER = '__fstring__';

const BINARY_ALIASES: Record<string, BinaryOperator> = {
  '+': '+',
  '-': '-',
  '*': '*',
  '/': '/',
  '%': '%',
  '^': '^',
  '>': '>',
  '<': '<',
  '>=': '>=',
  '<=': '<=',
  '==': '==',
  '===': '==',
  '!=': '!=',
  '!==': '!=',
  and: 'and',
  '&&': 'and',
  or: 'or',
  '||': 'or',
};

// ============================================================================
// Parser
// ============================================================================

export function parseExpression(expr: string): ExprNode {
  let raw: jsep.Expression;
  try {
    raw = jsep(rewriteSlices(rewriteFStrings(expr)));
  } catch (e) {
    if (e instanceof ScriptCompileError) throw e;
    const message = e instanceof Error ? e.message : String(e);
    throw new ScriptCompileError('PARSE', `Cannot parse "${expr}": ${message}`);
  }
  return normalizeNode(raw, expr);
}

/**
 * Rewrite `base[a:b]` into `base[__slice__(a, b)]` so jsep can read it.
 * Array literals and ternaries inside brackets are left alone.
 */
export function rewriteSlices(source: string): string {
  let out = '';
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (ch === '"' || ch === "'") {
      const end = skipString(source, i);
      out += source.slice(i, end);
      i = end;
      continue;
    }

    if (ch === '[' && isIndexPosition(out)) {
      const close = findClosing(source, i);
      const inner = rewriteSlices(source.slice(i + 1, close));
      const colon = topLevelColon(inner);
      if (colon === -1) {
        out += `[${inner}]`;
      } else {
        const start = inner.slice(0, colon).trim() || 'null';
        const end = inner.slice(colon + 1).trim() || 'null';
        out += `[${SLICE_MARKER}(${start}, ${end})]`;
      }
      i = close + 1;
      continue;
    }

    out += ch;
    i++;
  }

  return out;
}

/**
 * Rewrite `f"a{x}b"` into `__fstring__("a", (x), "b")`.
 * `{{` and `}}` stand for literal braces.
 */
export function rewriteFStrings(source: string): string {
  let out = '';
  let i = 0;

  while (i < source.length) {
    const ch = source[i];
    const next = source[i + 1];

    if (ch === 'f' && (next === '"' || next === "'") && !/[A-Za-z0-9_$]/.test(source[i - 1] ?? '')) {
      const { parts, end } = readFString(source, i + 1);
      out += `${FSTRING_MARKER}(${parts.join(', ')})`;
      i = end;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const end = skipString(source, i);
      out += source.slice(i, end);
      i = end;
      continue;
    }

    out += ch;
    i++;
  }

  return out;
}

function readFString(source: string, open: number): { parts: string[]; end: number } {
  const quote = source[open];
  const parts: string[] = [];
  let text = '';
  let i = open + 1;

  const flushText = () => {
    if (text.length > 0) {
      parts.push(JSON.stringify(text));
      text = '';
    }
  };

  while (i < source.length) {
    const ch = source[i];
    if (ch === quote) {
      flushText();
      return { parts, end: i + 1 };
    }
    if (ch === '\\' && i + 1 < source.length) {
      const escaped = source[i + 1];
      text += escaped === 'n' ? '\n' : escaped === 't' ? '\t' : escaped;
      i += 2;
      continue;
    }
    if ((ch === '{' || ch === '}') && source[i + 1] === ch) {
      text += ch;
      i += 2;
      continue;
    }
    if (ch === '}') {
      throw new ScriptCompileError('PARSE', `Cannot parse "${source}": single '}' in f-string`);
    }
    if (ch === '{') {
      const close = findFStringClose(source, i, quote);
      const inner = source.slice(i + 1, close).trim();
      if (inner.length === 0) {
        throw new ScriptCompileError('PARSE', `Cannot parse "${source}": empty expression in f-string`);
      }
      flushText();
      parts.push(`(${rewriteFStrings(inner)})`);
      i = close + 1;
      continue;
    }
    text += ch;
    i++;
  }

  throw new ScriptCompileError('PARSE', `Cannot parse "${source}": unterminated f-string`);
}

function findFStringClose(source: string, open: number, quote: string): number {
  let depth = 0;
  let i = open;
  while (i < source.length && source[i] !== quote) {
    const ch = source[i];
    if (ch === '"' || ch === "'") {
      i = skipString(source, i);
      continue;
    }
    if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
    i++;
  }
  throw new ScriptCompileError('PARSE', `Cannot parse "${source}": unclosed '{' in f-string`);
}

function skipString(source: string, start: number): number {
  const quote = source[start];
  let i = start + 1;
  while (i < source.length && source[i] !== quote) {
    i += source[i] === '\\' ? 2 : 1;
  }
  return Math.min(i + 1, source.length);
}

/**
 * A bracket indexes when it follows an identifier, a closing paren or a closing bracket.
 */
function isIndexPosition(preceding: string): boolean {
  const trimmed = preceding.trimEnd();
  if (trimmed.length === 0) {
    return false;
  }
  const last = trimmed[trimmed.length - 1];
  if (last === ')' || last === ']') {
    return true;
  }
  if (!/[A-Za-z0-9_$]/.test(last)) {
    return false;
  }
  // Word operators precede array literals, not indexes
  return !/(^|[^A-Za-z0-9_$])(and|or|not|return)$/.test(trimmed);
}

function findClosing(source: string, open: number): number {
  let depth = 0;
  let i = open;
  while (i < source.length) {
    const ch = source[i];
    if (ch === '"' || ch === "'") {
      i = skipString(source, i);
      continue;
    }
    if (ch === '[' || ch === '(') {
      depth++;
    } else if (ch === ']' || ch === ')') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
    i++;
  }
  throw new ScriptCompileError('PARSE', `Unclosed bracket in "${source}"`);
}

function topLevelColon(inner: string): number {
  let depth = 0;
  let i = 0;
  while (i < inner.length) {
    const ch = inner[i];
    if (ch === '"' || ch === "'") {
      i = skipString(inner, i);
      continue;
    }
    if (ch === '[' || ch === '(') {
      depth++;
    } else if (ch === ']' || ch === ')') {
      depth--;
    } else if (depth === 0 && ch === '?') {
      return -1;
    } else if (depth === 0 && ch === ':') {
      return i;
    }
    i++;
  }
  return -1;
}

// ============================================================================
// jsep node guards
// ============================================================================

function isLiteral(node: jsep.Expression): node is jsep.Literal {
  return node.type === 'Literal';
}

function isIdentifier(node: jsep.Expression): node is jsep.Identifier {
  return node.type === 'Identifier';
}

function isBinary(node: jsep.Expression): node is jsep.BinaryExpression {
  return node.type === 'BinaryExpression';
}

function isUnary(node: jsep.Expression): node is jsep.UnaryExpression {
  return node.type === 'UnaryExpression';
}

function isCall(node: jsep.Expression): node is jsep.CallExpression {
  return node.type === 'CallExpression';
}

function isMember(node: jsep.Expression): node is jsep.MemberExpression {
  return node.type === 'MemberExpression';
}

function isConditional(node: jsep.Expression): node is jsep.ConditionalExpression {
  return node.type === 'ConditionalExpression';
}

function isArray(node: jsep.Expression): node is jsep.ArrayExpression {
  return node.type === 'ArrayExpression';
}

function isSequence(node: jsep.Expression): node is jsep.SequenceExpression {
  return node.type === 'SequenceExpression';
}

// ============================================================================
// Normalization
// ============================================================================

function fail(source: string, message: string): never {
  throw new ScriptCompileError('PARSE', `Cannot parse "${source}": ${message}`);
}

function normalizeNode(raw: jsep.Expression, source: string): ExprNode {
  if (isLiteral(raw)) {
    const value = raw.value;
    if (typeof value === 'number') return { type: 'number', value };
    if (typeof value === 'string') return { type: 'string', value };
    if (typeof value === 'boolean') return { type: 'bool', value };
    if (value === null) return { type: 'null' };
    return fail(source, `unsupported literal ${raw.raw}`);
  }

  if (isIdentifier(raw)) {
    return { type: 'identifier', name: raw.name };
  }

  if (isArray(raw)) {
    return {
      type: 'array',
      elements: raw.elements.map((el) => {
        if (!el) fail(source, 'empty array element');
        return normalizeNode(el, source);
      }),
    };
  }

  if (isBinary(raw)) {
    if (raw.operator === '->') {
      return buildLambda(raw.left, normalizeNode(raw.right, source), source);
    }
    if (raw.operator === '|>') {
      return buildPipeline(raw, source);
    }
    const operator = BINARY_ALIASES[raw.operator];
    if (!operator) {
      return fail(source, `unknown operator ${raw.operator}`);
    }
    return {
      type: 'binary',
      operator,
      left: normalizeNode(raw.left, source),
      right: normalizeNode(raw.right, source),
    };
  }

  if (isUnary(raw)) {
    const argument = normalizeNode(raw.argument, source);
    switch (raw.operator) {
      case '-':
        return { type: 'unary', operator: '-', argument };
      case '+':
        return argument;
      case 'not':
      case '!':
        return { type: 'unary', operator: 'not', argument };
      default:
        return fail(source, `unknown unary operator ${raw.operator}`);
    }
  }

  if (isConditional(raw)) {
    // `x -> c ? a : b` parses as `(x -> c) ? a : b`; move the ternary into the body
    if (isBinary(raw.test) && raw.test.operator === '->') {
      return buildLambda(
        raw.test.left,
        {
          type: 'ternary',
          test: normalizeNode(raw.test.right, source),
          consequent: normalizeNode(raw.consequent, source),
          alternate: normalizeNode(raw.alternate, source),
        },
        source
      );
    }
    return {
      type: 'ternary',
      test: normalizeNode(raw.test, source),
      consequent: normalizeNode(raw.consequent, source),
      alternate: normalizeNode(raw.alternate, source),
    };
  }

  if (isCall(raw)) {
    const callee = calleeName(raw.callee, source);
    const args = raw.arguments.map((arg) => normalizeNode(arg, source));
    if (callee === 'when') {
      return buildWhen(args, source);
    }
    if (callee === FSTRING_MARKER) {
      return { type: 'fstring', parts: args };
    }
    return { type: 'call', callee, arguments: args };
  }

  if (isMember(raw)) {
    if (raw.computed) {
      const object = normalizeNode(raw.object, source);
      const property = raw.property;
      if (isCall(property) && isIdentifier(property.callee) && property.callee.name === SLICE_MARKER) {
        const [start, end] = property.arguments.map((arg) => normalizeNode(arg, source));
        return {
          type: 'slice',
          object,
          start: start && start.type !== 'null' ? start : undefined,
          end: end && end.type !== 'null' ? end : undefined,
        };
      }
      return { type: 'index', object, index: normalizeNode(property, source) };
    }
    if (!isIdentifier(raw.object) || !isIdentifier(raw.property)) {
      return fail(source, 'member access is only allowed as package.member');
    }
    return { type: 'member', object: raw.object.name, property: raw.property.name };
  }

  return fail(source, `unsupported syntax (${raw.type})`);
}

function calleeName(callee: jsep.Expression, source: string): string {
  if (isIdentifier(callee)) {
    return callee.name;
  }
  if (isMember(callee) && !callee.computed && isIdentifier(callee.object) && isIdentifier(callee.property)) {
    return `${callee.object.name}.${callee.property.name}`;
  }
  return fail(source, 'only named functions can be called');
}

function buildLambda(paramsNode: jsep.Expression, body: ExprNode, source: string): ExprNode {
  const rawParams = isSequence(paramsNode) ? paramsNode.expressions : [paramsNode];
  const params = rawParams.map((p) => {
    if (!isIdentifier(p)) {
      return fail(source, 'lambda parameters must be names');
    }
    return p.name;
  });
  return { type: 'lambda', params, body };
}

function buildPipeline(raw: jsep.BinaryExpression, source: string): ExprNode {
  const value = normalizeNode(raw.left, source);
  const stage = normalizeNode(raw.right, source);
  if (value.type === 'pipeline') {
    return { type: 'pipeline', value: value.value, stages: [...value.stages, stage] };
  }
  return { type: 'pipeline', value, stages: [stage] };
}

/**
 * `when(c1, r1, c2, r2, ..., otherwise?)`
 */
function buildWhen(args: ExprNode[], source: string): ExprNode {
  if (args.length < 2) {
    return fail(source, 'when() needs at least one condition and result');
  }
  const branches: WhenBranch[] = [];
  let i = 0;
  for (; i + 1 < args.length; i += 2) {
    branches.push({ test: args[i], result: args[i + 1] });
  }
  return { type: 'when', branches, otherwise: i < args.length ? args[i] : undefined };
}

// ============================================================================
// Identifier Extraction
// ============================================================================

/**
 * Names an expression reads from scope, excluding lambda parameters bound inside it.
 * Call callees are included since a lambda bound to that name may be called.
 */
export function extractIdentifiers(node: ExprNode, bound: ReadonlySet<string> = new Set()): Set<string> {
  const ids = new Set<string>();

  function walk(n: ExprNode, scope: ReadonlySet<string>): void {
    switch (n.type) {
      case 'identifier':
        if (!scope.has(n.name)) ids.add(n.name);
        break;
      case 'array':
        n.elements.forEach((el) => walk(el, scope));
        break;
      case 'binary':
        walk(n.left, scope);
        walk(n.right, scope);
        break;
      case 'unary':
        walk(n.argument, scope);
        break;
      case 'ternary':
        walk(n.test, scope);
        walk(n.consequent, scope);
        walk(n.alternate, scope);
        break;
      case 'when':
        for (const branch of n.branches) {
          walk(branch.test, scope);
          walk(branch.result, scope);
        }
        if (n.otherwise) walk(n.otherwise, scope);
        break;
      case 'call':
        if (!n.callee.includes('.') && !scope.has(n.callee)) ids.add(n.callee);
        n.arguments.forEach((arg) => walk(arg, scope));
        break;
      case 'index':
        walk(n.object, scope);
        walk(n.index, scope);
        break;
      case 'slice':
        walk(n.object, scope);
        if (n.start) walk(n.start, scope);
        if (n.end) walk(n.end, scope);
        break;
      case 'lambda':
        walk(n.body, new Set([...scope, ...n.params]));
        break;
      case 'pipeline':
        walk(n.value, scope);
        n.stages.forEach((stage) => walk(stage, scope));
        break;
      case 'fstring':
        n.parts.forEach((part) => walk(part, scope));
        break;
      default:
        break;
    }
  }

  walk(node, bound);
  return ids;
}
