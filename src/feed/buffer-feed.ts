/**
 * BufferFeed: collects items pushed by a source into a RewindBuffer.
 *
 * The feed owns the buffer and the subscription. Every item the source emits
 * is put into the buffer; items arriving while the buffer is full are counted
 * as dropped rather than overwriting unread ones. Consumers either read
 * `feed.buffer` directly or pass `onReadable`, which the feed submits to its
 * scheduler (at most one pending call at a time) after new items arrive.
 */

import { RewindBuffer } from '../buffer/rewind-buffer.js';
import { DEFAULT_FEED_CAPACITY, loadFeedConfig } from '../shared/config.js';
import { createLogger, setLogLevel } from '../shared/logger.js';
import { immediateScheduler } from './schedulers.js';
import type { FeedState, FeedStatus, Scheduler, Subscribable } from './types.js';

const log = createLogger('feed');

export interface BufferFeedOptions<T> {
  /** Buffer capacity (default: DEFAULT_FEED_CAPACITY). */
  capacity?: number;
  /** Where `onReadable` runs (default: immediateScheduler). */
  scheduler?: Scheduler;
  /**
   * Called with the buffer after new items have been accepted.
   * Dropped items do not trigger a call: a consumer that leaves the buffer
   * full is not called again until it reads from `feed.buffer` itself.
   */
  onReadable?: (buffer: RewindBuffer<T>) => void;
}

export class BufferFeed<T> {
  private readonly items: RewindBuffer<T>;
  private readonly scheduler: Scheduler;
  private readonly onReadable?: (buffer: RewindBuffer<T>) => void;

  private state: FeedState = 'idle';
  private unsubscribe: (() => void) | null = null;
  private drainPending = false;
  private overflowing = false;
  private totalReceived = 0;
  private totalDropped = 0;
  private lastReceivedAt: string | null = null;

  constructor(
    /** Name used in logs and status (e.g., 'sensor-a'). */
    readonly name: string,
    private readonly source: Subscribable<T>,
    options: BufferFeedOptions<T> = {},
  ) {
    this.items = new RewindBuffer<T>(options.capacity ?? DEFAULT_FEED_CAPACITY);
    this.scheduler = options.scheduler ?? immediateScheduler;
    this.onReadable = options.onReadable;
  }

  /** The underlying buffer. Reading from it consumes items. */
  get buffer(): RewindBuffer<T> {
    return this.items;
  }

  /** Subscribe to the source. No-op while already running. */
  start(): void {
    if (this.state === 'running') return;
    this.unsubscribe = this.source.subscribe((item) => this.receive(item));
    this.state = 'running';
    log.info(`Feed ${this.name} started (capacity: ${this.items.capacity})`);
  }

  /** Unsubscribe from the source. Buffered items stay readable. */
  stop(): void {
    if (this.state !== 'running') return;
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.state = 'stopped';
    log.info(`Feed ${this.name} stopped (${this.totalDropped} dropped)`);
  }

  getStatus(): FeedStatus {
    return {
      name: this.name,
      state: this.state,
      buffered: this.items.count,
      capacity: this.items.capacity,
      totalReceived: this.totalReceived,
      totalDropped: this.totalDropped,
      lastReceivedAt: this.lastReceivedAt,
    };
  }

  private receive(item: T): void {
    this.totalReceived++;

    if (!this.items.put(item)) {
      this.totalDropped++;
      if (!this.overflowing) {
        this.overflowing = true;
        log.warn(`Feed ${this.name} buffer full (capacity: ${this.items.capacity}), dropping items`);
      }
      return;
    }

    this.overflowing = false;
    this.lastReceivedAt = new Date().toISOString();
    this.scheduleDrain();
  }

  private scheduleDrain(): void {
    const onReadable = this.onReadable;
    if (!onReadable || this.drainPending) return;

    this.drainPending = true;
    this.scheduler.submit(() => {
      this.drainPending = false;
      onReadable(this.items);
    });
  }
}

/**
 * Create a feed configured from the environment (`REWIND_FEED_CAPACITY`,
 * `REWIND_LOG_LEVEL`). Explicit options win over the environment.
 * Applies the configured log level globally.
 */
export function createFeed<T>(
  name: string,
  source: Subscribable<T>,
  options: BufferFeedOptions<T> = {},
  env: NodeJS.ProcessEnv = process.env,
): BufferFeed<T> {
  const config = loadFeedConfig(env);
  setLogLevel(config.logLevel);
  return new BufferFeed<T>(name, source, {
    ...options,
    capacity: options.capacity ?? config.capacity,
  });
}
