/**
 * A2A Streaming Handler
 *
 * In-process registry of open message/stream connections. The HTTP layer
 * drains each stream into server-sent events.
 */

import {
  StreamClosedError,
  StreamExistsError,
  StreamNotFoundError,
} from '@storyteller/core';
import type { A2AStreamEvent, EventStream, StreamingTransport } from './types.js';

type Waiter = (result: IteratorResult<A2AStreamEvent>) => void;

class QueuedEventStream implements EventStream {
  private queue: A2AStreamEvent[] = [];
  private waiters: Waiter[] = [];
  private isClosed = false;

  constructor(readonly id: string) {}

  get closed(): boolean {
    return this.isClosed;
  }

  push(event: A2AStreamEvent): void {
    if (this.isClosed) {
      throw new StreamClosedError(this.id);
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
    } else {
      this.queue.push(event);
    }
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<A2AStreamEvent> {
    return {
      next: () => {
        const event = this.queue.shift();
        if (event !== undefined) {
          return Promise.resolve({ value: event, done: false });
        }
        if (this.isClosed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<A2AStreamEvent>>((resolve) => {
          this.waiters.push(resolve);
        });
      },
    };
  }
}

export class A2AStreamingHandler implements StreamingTransport {
  private streams = new Map<string, QueuedEventStream>();

  createStream(streamId: string): EventStream {
    if (this.streams.has(streamId)) {
      throw new StreamExistsError(streamId);
    }
    const stream = new QueuedEventStream(streamId);
    this.streams.set(streamId, stream);
    console.debug(`[Story:Streaming] Stream ${streamId} opened (active=${this.streams.size})`);
    return stream;
  }

  sendStreamEvent(streamId: string, event: A2AStreamEvent): void {
    const stream = this.streams.get(streamId);
    if (!stream) {
      throw new StreamNotFoundError(streamId);
    }
    stream.push(event);
  }

  closeStream(streamId: string): void {
    const stream = this.streams.get(streamId);
    if (!stream) return;

    this.streams.delete(streamId);
    stream.close();
    console.debug(`[Story:Streaming] Stream ${streamId} closed (active=${this.streams.size})`);
  }

  activeStreams(): number {
    return this.streams.size;
  }
}
