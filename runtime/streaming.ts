/**
 * Streaming executor
 * Evaluates a data script per live tick, keeping a bounded window of history.
 */
import { DataScript, Row, Value } from '../spec/types';
import { loadEngineConfig } from '../config';
import { RuntimeError } from './errors';
import { BaseRowExecutor, ExecutorOptions } from './executor';
import * as V from './values';

// ============================================================================
// Ring buffer
// ============================================================================

/**
 * Fixed-capacity FIFO. Pushing past capacity evicts the oldest entry.
 */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get length(): number {
    return this.count;
  }

  push(item: T): void {
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = item;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /**
   * Position 0 is the oldest retained entry.
   */
  at(position: number): T | undefined {
    if (position < 0 || position >= this.count) {
      return undefined;
    }
    return this.slots[(this.head + position) % this.capacity];
  }

  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.at(i);
      if (item !== undefined) {
        items.push(item);
      }
    }
    return items;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}

// ============================================================================
// Streaming executor
// ============================================================================

export class StreamingExecutor extends BaseRowExecutor {
  private readonly inputWindow: RingBuffer<Row>;
  /** One slot per tick; null where the tick produced no output */
  private readonly outputWindow: RingBuffer<Row | null>;
  private current: Row | undefined;
  private ticks = 0;

  constructor(
    script: DataScript,
    private readonly window: number = loadEngineConfig().streamWindow,
    options: ExecutorOptions = {}
  ) {
    super(script, options);
    this.inputWindow = new RingBuffer(window);
    this.outputWindow = new RingBuffer(window);
    this.logger.debug('Streaming executor created', { windowSize: window });
  }

  /**
   * Evaluate one tick. A failing tick is not added to history.
   */
  pushTick(row: Row): Row | undefined {
    this.current = row;
    try {
      const output = this.evaluateRow(row);
      this.inputWindow.push(row);
      this.outputWindow.push(output ?? null);
      this.ticks++;
      return output;
    } finally {
      this.current = undefined;
    }
  }

  windowSize(): number {
    return this.window;
  }

  // ==========================================================================
  // RowSource
  // ==========================================================================

  currentIndex(): number {
    return this.ticks;
  }

  totalRows(): number {
    return this.ticks + (this.current ? 1 : 0);
  }

  currentRow(): Row | undefined {
    return this.current;
  }

  historyLength(): number {
    return this.inputWindow.length;
  }

  getInputHistory(name: string, offset: number): Value | undefined {
    if (offset === 0) {
      return this.current?.get(name);
    }
    return this.readBack(this.inputWindow, offset)?.get(name);
  }

  getOutputHistory(name: string, offset: number): Value | undefined {
    if (offset < 1) {
      return undefined;
    }
    return this.readBack(this.outputWindow, offset)?.get(name);
  }

  getInputSlice(name: string, startOffset: number, endOffset: number): Value {
    return this.slice(startOffset, endOffset, (offset) => this.getInputHistory(name, offset));
  }

  getOutputSlice(name: string, startOffset: number, endOffset: number): Value {
    if (endOffset === 0) {
      throw RuntimeError.typeError('Cannot read the output of the current row');
    }
    return this.slice(startOffset, endOffset, (offset) => this.getOutputHistory(name, offset));
  }

  /**
   * Offset k reads k entries back from the newest; evicted entries read as undefined.
   */
  private readBack(buffer: RingBuffer<Row | null>, offset: number): Row | undefined {
    return buffer.at(buffer.length - offset) ?? undefined;
  }

  private slice(
    startOffset: number,
    endOffset: number,
    read: (offset: number) => Value | undefined
  ): Value {
    const values: Value[] = [];
    for (let offset = startOffset; offset >= endOffset; offset--) {
      values.push(read(offset) ?? V.NULL);
    }
    return V.arr(values);
  }
}
