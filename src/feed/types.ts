/**
 * Collaborator capabilities a feed is wired to, plus its status shape.
 */

/** Something that runs work, now or later. */
export interface Scheduler {
  submit(work: () => void): void;
}

/** A push-based source. `subscribe()` returns the matching unsubscribe function. */
export interface Subscribable<T> {
  subscribe(listener: (item: T) => void): () => void;
}

/** Lifecycle state of a feed. */
export type FeedState = 'idle' | 'running' | 'stopped';

/** Runtime status of a single feed. */
export interface FeedStatus {
  /** Name the feed was created with. */
  name: string;
  /** Current lifecycle state. */
  state: FeedState;
  /** Number of unread items in the buffer. */
  buffered: number;
  /** Buffer capacity. */
  capacity: number;
  /** Items received from the source since construction, accepted or not. */
  totalReceived: number;
  /** Items rejected because the buffer was full. */
  totalDropped: number;
  /** ISO-8601 timestamp of the most recent accepted item, or null if none. */
  lastReceivedAt: string | null;
}
