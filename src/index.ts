// ── Buffer ──────────────────────────────────────────────────────────────
export type { FixedReadQueue, FixedWriteQueue, FixedReadWriteQueue } from './buffer/queue.js';
export { RewindBuffer, type RewindBufferOptions } from './buffer/rewind-buffer.js';

// ── Feed ────────────────────────────────────────────────────────────────
export { BufferFeed, createFeed, type BufferFeedOptions } from './feed/buffer-feed.js';
export { immediateScheduler, microtaskScheduler } from './feed/schedulers.js';
export type { FeedState, FeedStatus, Scheduler, Subscribable } from './feed/types.js';

// ── Shared ──────────────────────────────────────────────────────────────
export {
  DEFAULT_CAPACITY,
  DEFAULT_FEED_CAPACITY,
  MAX_FEED_CAPACITY,
  FeedConfigSchema,
  loadFeedConfig,
  type FeedConfig,
} from './shared/config.js';
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './shared/logger.js';
