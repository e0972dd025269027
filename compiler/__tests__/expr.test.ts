/**
 * Expression parser tests
 */

import { ScriptCompileError } from '../errors';
import { extractIdentifiers, parseExpression, rewriteFStrings, rewriteSlices } from '../expr';

describe('parseExpression', () => {
  test('operator precedence', () => {
    expect(parseExpression('1 + 2 * 3')).toEqual({
      type: 'binary',
      operator: '+',
      left: { type: 'number', value: 1 },
      right: {
        type: 'binary',
        operator: '*',
        left: { type: 'number', value: 2 },
        right: { type: 'number', value: 3 },
      },
    });
  });

  test('word operators and symbol aliases', () => {
    expect(parseExpression('a and not b')).toEqual({
      type: 'binary',
      operator: 'and',
      left: { type: 'identifier', name: 'a' },
      right: { type: 'unary', operator: 'not', argument: { type: 'identifier', name: 'b' } },
    });
    expect(parseExpression('a || b')).toEqual({
      type: 'binary',
      operator: 'or',
      left: { type: 'identifier', name: 'a' },
      right: { type: 'identifier', name: 'b' },
    });
  });

  test('literals', () => {
    expect(parseExpression('null')).toEqual({ type: 'null' });
    expect(parseExpression('true')).toEqual({ type: 'bool', value: true });
    expect(parseExpression('"hi"')).toEqual({ type: 'string', value: 'hi' });
  });

  test('single-parameter lambda', () => {
    expect(parseExpression('x -> x * 2')).toEqual({
      type: 'lambda',
      params: ['x'],
      body: {
        type: 'binary',
        operator: '*',
        left: { type: 'identifier', name: 'x' },
        right: { type: 'number', value: 2 },
      },
    });
  });

  test('multi-parameter lambda', () => {
    const node = parseExpression('(a, b) -> a + b');
    expect(node.type).toBe('lambda');
    if (node.type === 'lambda') {
      expect(node.params).toEqual(['a', 'b']);
    }
  });

  test('history index on an identifier', () => {
    expect(parseExpression('close[-1]')).toEqual({
      type: 'index',
      object: { type: 'identifier', name: 'close' },
      index: { type: 'unary', operator: '-', argument: { type: 'number', value: 1 } },
    });
  });

  test('slices with and without bounds', () => {
    expect(parseExpression('close[-3:-1]')).toEqual({
      type: 'slice',
      object: { type: 'identifier', name: 'close' },
      start: { type: 'unary', operator: '-', argument: { type: 'number', value: 3 } },
      end: { type: 'unary', operator: '-', argument: { type: 'number', value: 1 } },
    });
    expect(parseExpression('xs[:2]')).toEqual({
      type: 'slice',
      object: { type: 'identifier', name: 'xs' },
      start: undefined,
      end: { type: 'number', value: 2 },
    });
  });

  test('pipelines are flattened', () => {
    const node = parseExpression('v |> f(1) |> g()');
    expect(node).toEqual({
      type: 'pipeline',
      value: { type: 'identifier', name: 'v' },
      stages: [
        { type: 'call', callee: 'f', arguments: [{ type: 'number', value: 1 }] },
        { type: 'call', callee: 'g', arguments: [] },
      ],
    });
  });

  test('when() is lowered to branches with an optional otherwise', () => {
    expect(parseExpression('when(a > 1, "big", "small")')).toEqual({
      type: 'when',
      branches: [
        {
          test: {
            type: 'binary',
            operator: '>',
            left: { type: 'identifier', name: 'a' },
            right: { type: 'number', value: 1 },
          },
          result: { type: 'string', value: 'big' },
        },
      ],
      otherwise: { type: 'string', value: 'small' },
    });
  });

  test('package members and qualified calls', () => {
    expect(parseExpression('math.PI')).toEqual({ type: 'member', object: 'math', property: 'PI' });
    expect(parseExpression('math.add(1, 2)')).toEqual({
      type: 'call',
      callee: 'math.add',
      arguments: [
        { type: 'number', value: 1 },
        { type: 'number', value: 2 },
      ],
    });
  });

  test('ternary', () => {
    expect(parseExpression('a ? 1 : 2')).toEqual({
      type: 'ternary',
      test: { type: 'identifier', name: 'a' },
      consequent: { type: 'number', value: 1 },
      alternate: { type: 'number', value: 2 },
    });
  });

  test('syntax errors are PARSE compile errors', () => {
    expect(() => parseExpression('1 +')).toThrow(ScriptCompileError);
    try {
      parseExpression('a.b.c');
      throw new Error('expected a parse failure');
    } catch (e) {
      expect(e).toBeInstanceOf(ScriptCompileError);
      if (e instanceof ScriptCompileError) {
        expect(e.code).toBe('PARSE');
      }
    }
  });
});

describe('rewriteSlices', () => {
  test('rewrites index-position slices', () => {
    expect(rewriteSlices('x[1:2]')).toBe('x[__slice__(1, 2)]');
    expect(rewriteSlices('x[:-1]')).toBe('x[__slice__(null, -1)]');
  });

  test('leaves array literals, plain indexes and ternaries alone', () => {
    expect(rewriteSlices('[1, 2]')).toBe('[1, 2]');
    expect(rewriteSlices('x[0]')).toBe('x[0]');
    expect(rewriteSlices('x[c ? 1 : 2]')).toBe('x[c ? 1 : 2]');
    expect(rewriteSlices('"a[1:2]"')).toBe('"a[1:2]"');
  });
});

describe('f-strings', () => {
  test('parse into literal and expression parts', () => {
    expect(parseExpression('f"close={close}"')).toEqual({
      type: 'fstring',
      parts: [
        { type: 'string', value: 'close=' },
        { type: 'identifier', name: 'close' },
      ],
    });
  });

  test('doubled braces are literal', () => {
    expect(rewriteFStrings('f"a{{b}}{x + 1}"')).toBe('__fstring__("a{b}", (x + 1))');
    expect(parseExpression("f'{{}}'")).toEqual({ type: 'fstring', parts: [{ type: 'string', value: '{}' }] });
  });

  test('plain strings and names ending in f are untouched', () => {
    expect(rewriteFStrings('"f{x}"')).toBe('"f{x}"');
    expect(rewriteFStrings('elf + 1')).toBe('elf + 1');
  });

  test('malformed f-strings are PARSE errors', () => {
    expect(() => parseExpression('f"a{x"')).toThrow(ScriptCompileError);
    expect(() => parseExpression('f"a}"')).toThrow("single '}' in f-string");
    expect(() => parseExpression('f"{ }"')).toThrow('empty expression in f-string');
    expect(() => parseExpression('f"open')).toThrow('unterminated f-string');
  });
});

describe('extractIdentifiers', () => {
  test('f-string expressions are read', () => {
    const ids = extractIdentifiers(parseExpression('f"{a}-{b[-1]}"'));
    expect([...ids].sort()).toEqual(['a', 'b']);
  });


  test('collects free names and callees, excluding lambda parameters', () => {
    const ids = extractIdentifiers(parseExpression('map(xs, x -> x + y) + z[-1]'));
    expect([...ids].sort()).toEqual(['map', 'xs', 'y', 'z']);
  });

  test('package-qualified callees are not free names', () => {
    const ids = extractIdentifiers(parseExpression('math.add(a, 1)'));
    expect([...ids]).toEqual(['a']);
  });
});
