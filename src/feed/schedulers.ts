import type { Scheduler } from './types.js';

/** Runs work synchronously on the caller's stack. */
export const immediateScheduler: Scheduler = {
  submit(work) {
    work();
  },
};

/** Defers work to the microtask queue. */
export const microtaskScheduler: Scheduler = {
  submit(work) {
    queueMicrotask(work);
  },
};
