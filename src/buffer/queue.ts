/**
 * Queue capability interfaces for fixed-capacity queues.
 */

/** A write side with fixed capacity. `put()` may only succeed while `isFull` is false. */
export interface FixedWriteQueue<T> {
  put(item: T): boolean;
  readonly isFull: boolean;
}

/** A read side. `get()` yields `undefined` exactly when `isEmpty` is true. */
export interface FixedReadQueue<T> {
  get(): T | undefined;
  readonly isEmpty: boolean;
}

export interface FixedReadWriteQueue<T> extends FixedWriteQueue<T>, FixedReadQueue<T> {}
