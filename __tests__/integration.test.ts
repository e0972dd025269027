/**
 * End-to-end: YAML script + package files → batch and streaming outputs
 */

import * as path from 'path';
import { ScriptCompiler } from '../compiler/compile';
import { DataStreamExecutor } from '../runtime/dataStream';
import { PackageLoader } from '../runtime/packageLoader';
import { StreamingExecutor } from '../runtime/streaming';
import { rowFromRecord, rowToRecord } from '../runtime/values';

const PACKAGE_DIR = path.join(__dirname, '..', 'runtime', '__tests__', 'fixtures');

const SCRIPT = `
imports: [geometry]
input: "close:decimal, volume"
output: [ema, area, trend]
precision: 2
functions:
  - name: smooth
    params: [value, prev, "alpha = 0.5"]
    body:
      - "return prev == null ? value : alpha * value + (1 - alpha) * prev"
body:
  - ema = smooth(close, ref("ema", 1))
  - prev_close = ref("close", 1)
  - trend = when(is_null(prev_close), "start", close > prev_close, "up", "down")
  - return [ema, geometry.circle_area(volume), trend]
`;

const RECORDS = [
  { close: 10, volume: 1 },
  { close: 12, volume: 2 },
  { close: 11, volume: 3 },
];

const EXPECTED = [
  { ema: '10', area: 3, trend: 'start' },
  { ema: '11', area: 12, trend: 'up' },
  { ema: '11', area: 27, trend: 'down' },
];

describe('Integration: compile, load packages, execute', () => {
  const compiler = new ScriptCompiler();
  const script = compiler.compileDataScript(SCRIPT);
  const packageData = new PackageLoader({ searchPaths: [PACKAGE_DIR] }).resolveImports(script);
  const rows = RECORDS.map((record) => rowFromRecord(record, script.input));

  test('declared decimal inputs are coerced', () => {
    expect(rows[0].get('close')?.type).toBe('decimal');
    expect(rows[0].get('volume')?.type).toBe('number');
  });

  test('batch execution', () => {
    const outputs = new DataStreamExecutor(script, rows, { packageData }).executeAll();
    expect(outputs.map(rowToRecord)).toEqual(EXPECTED);
  });

  test('streaming execution matches batch execution', () => {
    const executor = new StreamingExecutor(script, 10, { packageData });
    const outputs = rows.map((row) => {
      const output = executor.pushTick(row);
      return output ? rowToRecord(output) : undefined;
    });
    expect(outputs).toEqual(EXPECTED);
  });

  test('a missing package fails before execution', () => {
    const other = compiler.compileDataScript(`
imports: [nowhere]
output: out
body:
  - return [1]
`);
    const loader = new PackageLoader({ searchPaths: [PACKAGE_DIR] });
    expect(() => loader.resolveImports(other)).toThrow('Package not found: nowhere');
  });
});
