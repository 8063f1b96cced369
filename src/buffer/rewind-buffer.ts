/**
 * Bounded ring buffer with independent read/write cursors and single-step rewind.
 *
 * Both cursors count items absolutely (they are not wrapped to the storage
 * size); `% capacity` is applied only when indexing storage. Reading never
 * removes an element, so the read cursor can step back over anything that a
 * later `put()` has not overwritten yet.
 *
 * Not synchronised: callers that share a buffer between producers and
 * consumers must serialise access themselves.
 */

import type { FixedReadWriteQueue } from './queue.js';
import { DEFAULT_CAPACITY } from '../shared/config.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('rewind-buffer');

export interface RewindBufferOptions {
  /**
   * Largest value the write cursor may reach before both cursors are rebased.
   * Default: `Number.MAX_SAFE_INTEGER`. Capacity must not exceed a third of it.
   */
  cursorLimit?: number;
}

export class RewindBuffer<T> implements FixedReadWriteQueue<T>, Iterable<T> {
  readonly capacity: number;
  private readonly cursorLimit: number;
  private storage: T[];
  private writeCursor = 0;
  private readCursor = 0;

  constructor(capacity: number = DEFAULT_CAPACITY, options: RewindBufferOptions = {}) {
    const cursorLimit = options.cursorLimit ?? Number.MAX_SAFE_INTEGER;
    if (!Number.isSafeInteger(cursorLimit) || cursorLimit <= 0) {
      throw new RangeError(`cursorLimit must be a positive safe integer, got ${cursorLimit}`);
    }
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Capacity must be a positive integer, got ${capacity}`);
    }
    const maxCapacity = Math.floor(cursorLimit / 3);
    if (capacity > maxCapacity) {
      throw new RangeError(`Capacity must be <= ${maxCapacity}, got ${capacity}`);
    }

    this.capacity = capacity;
    this.cursorLimit = cursorLimit;
    this.storage = [];
  }

  /**
   * Create a buffer whose slots are all pre-populated with `value`.
   * The buffer still starts empty; the fill only matters to storage.
   */
  static filled<T>(capacity: number, value: T, options?: RewindBufferOptions): RewindBuffer<T> {
    const buffer = new RewindBuffer<T>(capacity, options);
    buffer.storage = new Array<T>(capacity).fill(value);
    return buffer;
  }

  /** Number of unread items. */
  get count(): number {
    return this.writeCursor - this.readCursor;
  }

  /** True when `get()` would yield nothing. */
  get isEmpty(): boolean {
    return this.writeCursor === this.readCursor;
  }

  /** True when `put()` would fail. */
  get isFull(): boolean {
    return this.count === this.capacity;
  }

  /**
   * True when `rewind()` will succeed: the slot behind the read cursor has
   * not been overwritten and the cursor is not at the start of the stream.
   */
  get canRewind(): boolean {
    return this.count < this.capacity && this.readCursor > 0;
  }

  /**
   * Store an item if there is room.
   * Returns false (and changes nothing) when the buffer is full, since the
   * write would overwrite an unread item.
   */
  put(item: T): boolean {
    if (this.isFull) return false;

    if (this.writeCursor === this.cursorLimit) {
      this.rebase();
    }

    if (this.storage.length === this.capacity) {
      this.storage[this.writeCursor % this.capacity] = item;
    } else {
      this.storage.push(item);
    }
    this.writeCursor++;
    return true;
  }

  /** Read the next item and advance past it, or `undefined` if empty. */
  get(): T | undefined {
    const next = this.peek();
    if (this.readCursor < this.writeCursor) {
      this.readCursor++;
    }
    return next;
  }

  /** Read the next item without advancing. */
  peek(): T | undefined {
    if (this.isEmpty) return undefined;
    return this.storage[this.readCursor % this.capacity];
  }

  /** Step the read cursor back by one item. Returns false if that is not possible. */
  rewind(): boolean {
    if (!this.canRewind) return false;
    this.readCursor--;
    return true;
  }

  /** Drop all items and reset both cursors. Storage is cleared immediately. */
  discard(): void {
    this.writeCursor = 0;
    this.readCursor = 0;
    this.storage.length = 0;
  }

  /** Alias for `put()`. */
  tryPush(item: T): boolean {
    return this.put(item);
  }

  /** Alias for `get()`. */
  tryPop(): T | undefined {
    return this.get();
  }

  /** Consume every unread item in order. */
  drain(): T[] {
    return [...this];
  }

  /**
   * Consuming iterator: each step calls `get()`, so iterating empties the
   * buffer and a second pass yields nothing until more items are put.
   */
  *[Symbol.iterator](): Iterator<T> {
    while (this.readCursor < this.writeCursor) {
      yield this.storage[this.readCursor++ % this.capacity];
    }
  }

  /**
   * Move both cursors down so the write cursor stays below `cursorLimit`.
   * Keeps `count` and `readCursor % capacity`, and leaves the read cursor
   * at or above `capacity` so rewinding still works. With
   * `capacity <= cursorLimit / 3` the new write cursor is at most
   * `3 * capacity - 2`, below the limit.
   */
  private rebase(): void {
    const count = this.count;
    this.readCursor = this.capacity + (this.readCursor % this.capacity);
    this.writeCursor = this.readCursor + count;
    log.debug(`Rebased cursors (read=${this.readCursor}, write=${this.writeCursor})`);
  }
}
