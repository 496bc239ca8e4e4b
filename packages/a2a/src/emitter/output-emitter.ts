/**
 * A2A Output Emitter
 *
 * Listens to agent process events and turns Story and ReviewedStory
 * bindings into A2A artifacts.
 *
 * One emitter serves every request. What it does with an artifact depends on
 * the slot of the request it is running under:
 * - streaming: sent at once as a TaskArtifactUpdateEvent
 * - collecting: buffered until the handler builds the final Task
 *
 * Slots live in AsyncLocalStorage, so concurrent requests never see each
 * other's stream or buffer.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { Artifact, TaskArtifactUpdateEvent } from '@a2a-js/sdk';
import {
  type AgentProcessEvent,
  type BoundValue,
  type ProcessEventListener,
  NoRequestScopeError,
  isObjectBindingEvent,
} from '@storyteller/core';
import type { StreamingTransport } from '../streaming/types.js';
import { createDataArtifact } from '../handler/task-factory.js';

/** Where streamed artifacts are attributed */
export interface StreamTarget {
  taskId: string;
  contextId: string;
}

export type RequestSlot =
  | { mode: 'idle' }
  | { mode: 'streaming'; streamId: string; target: StreamTarget }
  | { mode: 'collecting'; artifacts: Artifact[] };

interface RequestScope {
  slot: RequestSlot;
}

export type ArtifactType = 'story' | 'reviewed_story';

export class A2AOutputEmitter implements ProcessEventListener {
  private streamingHandler: StreamingTransport;
  private scopes = new AsyncLocalStorage<RequestScope>();

  constructor(streamingHandler: StreamingTransport) {
    this.streamingHandler = streamingHandler;
  }

  /**
   * Run fn with a fresh, empty slot for the current request.
   */
  runInRequestScope<T>(fn: () => T): T {
    return this.scopes.run({ slot: { mode: 'idle' } }, fn);
  }

  /**
   * Send artifacts of the current request to this stream.
   */
  setStreamId(streamId: string, target: StreamTarget): void {
    this.requireScope('setStreamId').slot = { mode: 'streaming', streamId, target };
    console.debug(`[Story:Emitter] Set stream ID: ${streamId}`);
  }

  /**
   * Buffer artifacts of the current request.
   */
  startCollecting(): void {
    this.requireScope('startCollecting').slot = { mode: 'collecting', artifacts: [] };
    console.debug('[Story:Emitter] Started collecting artifacts for non-streaming request');
  }

  getCollectedArtifacts(): Artifact[] {
    const slot = this.currentSlot();
    return slot.mode === 'collecting' ? [...slot.artifacts] : [];
  }

  getSlot(): RequestSlot {
    return this.currentSlot();
  }

  clear(): void {
    const scope = this.scopes.getStore();
    if (!scope) return;

    const { slot } = scope;
    if (slot.mode === 'streaming') {
      console.debug(`[Story:Emitter] Clearing stream ID: ${slot.streamId}`);
    } else if (slot.mode === 'collecting') {
      console.debug(`[Story:Emitter] Clearing ${slot.artifacts.length} collected artifacts`);
    }
    scope.slot = { mode: 'idle' };
  }

  onProcessEvent(event: AgentProcessEvent): void {
    if (!isObjectBindingEvent(event)) {
      return;
    }

    const payload = toArtifactPayload(event.value);
    if (!payload) {
      return;
    }

    console.log(`[Story:Emitter] Processing ${event.name} binding event (${payload.type})`);
    this.emitArtifact(payload.type, payload.data);
  }

  private emitArtifact(artifactType: ArtifactType, data: Record<string, unknown>): void {
    const artifact = createDataArtifact(data);
    const slot = this.currentSlot();

    switch (slot.mode) {
      case 'collecting':
        slot.artifacts.push(artifact);
        console.log(
          `[Story:Emitter] Collected ${artifactType} artifact for non-streaming request` +
          ` (total: ${slot.artifacts.length})`
        );
        return;

      case 'streaming': {
        const event: TaskArtifactUpdateEvent = {
          kind: 'artifact-update',
          taskId: slot.target.taskId,
          contextId: slot.target.contextId,
          artifact,
        };
        try {
          this.streamingHandler.sendStreamEvent(slot.streamId, event);
          console.log(`[Story:Emitter] Emitted ${artifactType} artifact to stream ${slot.streamId}`);
        } catch (error) {
          console.error(`[Story:Emitter] Failed to emit ${artifactType} artifact to stream:`, error);
        }
        return;
      }

      case 'idle':
        console.warn(
          `[Story:Emitter] No stream ID or artifact collection active, artifact will be lost: ${artifactType}`
        );
        return;
    }
  }

  private currentSlot(): RequestSlot {
    return this.scopes.getStore()?.slot ?? { mode: 'idle' };
  }

  private requireScope(operation: string): RequestScope {
    const scope = this.scopes.getStore();
    if (!scope) {
      throw new NoRequestScopeError(operation);
    }
    return scope;
  }
}

/**
 * Artifact payload for the bound values clients see; null for the rest.
 */
export function toArtifactPayload(
  value: BoundValue,
): { type: ArtifactType; data: Record<string, unknown> } | null {
  switch (value.kind) {
    case 'story':
      return {
        type: 'story',
        data: { text: value.story.text, type: 'story' },
      };
    case 'reviewed-story':
      return {
        type: 'reviewed_story',
        data: {
          story: value.reviewedStory.story.text,
          review: value.reviewedStory.review,
          reviewer: value.reviewedStory.reviewer.name,
          type: 'reviewed_story',
        },
      };
    case 'user-input':
    case 'opaque':
      return null;
    default: {
      const unreachable: never = value;
      throw new Error(`Unknown bound value: ${JSON.stringify(unreachable)}`);
    }
  }
}
