/**
 * Identifiers and Timestamps
 *
 * Record IDs are monotonic ULIDs and record timestamps never go backwards
 * within a process, so append order and created_at order agree.
 */

import { monotonicFactory } from 'ulid';

const nextUlid = monotonicFactory();

let lastTimestampMs = 0;

export function newRecordId(): string {
  return nextUlid();
}

export function newThreadId(): string {
  return `thread_${nextUlid()}`;
}

/**
 * Current time as ISO-8601, strictly later than any value previously returned.
 */
export function monotonicTimestamp(nowMs: number = Date.now()): string {
  const timestampMs = Math.max(nowMs, lastTimestampMs + 1);
  lastTimestampMs = timestampMs;
  return new Date(timestampMs).toISOString();
}
