/**
 * Streaming Transport Interfaces
 */

import type {
  Message,
  Task,
  TaskArtifactUpdateEvent,
  TaskStatusUpdateEvent,
} from '@a2a-js/sdk';

/** Anything pushed to a client over a message/stream connection */
export type A2AStreamEvent = Message | Task | TaskStatusUpdateEvent | TaskArtifactUpdateEvent;

/**
 * One open streaming connection. Iteration yields events in send order
 * and ends once the stream is closed and drained.
 */
export interface EventStream extends AsyncIterable<A2AStreamEvent> {
  readonly id: string;
  readonly closed: boolean;
}

export interface StreamingTransport {
  createStream(streamId: string): EventStream;
  /** Throws when the stream is unknown or already closed */
  sendStreamEvent(streamId: string, event: A2AStreamEvent): void;
  /** Idempotent */
  closeStream(streamId: string): void;
}
