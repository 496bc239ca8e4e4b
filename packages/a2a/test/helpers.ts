/**
 * Test doubles for the A2A bridge
 */

import type {
  AgentCard,
  Message,
  MessageSendParams,
  Part,
  TaskStatus,
} from '@a2a-js/sdk';
import {
  type AgentEngine,
  type BoundValue,
  type ExecutionResult,
  type ProcessOptions,
  bindStory,
} from '@storyteller/core';
import type { A2AStreamEvent, EventStream } from '../src/streaming/types.js';

export type EngineStep =
  | { type: 'bind'; name: string; value: BoundValue }
  | { type: 'log'; action: string }
  | { type: 'wait'; ms: number }
  | { type: 'fail'; message: string }
  | { type: 'throw'; value: unknown };

/**
 * Engine stand-in that plays a fixed script per intent.
 */
export class ScriptedEngine implements AgentEngine {
  readonly intents: string[] = [];
  private scripts: Record<string, EngineStep[]>;
  private output: BoundValue;

  constructor(scripts: Record<string, EngineStep[]>, output: BoundValue = bindStory('The end')) {
    this.scripts = scripts;
    this.output = output;
  }

  async execute(intent: string, options: ProcessOptions): Promise<ExecutionResult> {
    this.intents.push(intent);
    const processId = `proc_${this.intents.length}`;
    const startedAt = new Date().toISOString();

    for (const step of this.scripts[intent] ?? this.scripts['*'] ?? []) {
      const timestamp = new Date().toISOString();
      switch (step.type) {
        case 'wait':
          await new Promise((resolve) => setTimeout(resolve, step.ms));
          break;
        case 'fail':
          throw new Error(step.message);
        case 'throw':
          throw step.value;
        case 'log':
          for (const listener of options.listeners) {
            listener.onProcessEvent({ type: 'action-started', processId, timestamp, action: step.action });
          }
          break;
        case 'bind':
          for (const listener of options.listeners) {
            listener.onProcessEvent({ type: 'object-binding', processId, timestamp, name: step.name, value: step.value });
          }
          break;
      }
    }

    return {
      processId,
      agentName: 'ScriptedAgent',
      output: this.output,
      startedAt,
      completedAt: new Date().toISOString(),
    };
  }
}

export function userMessage(parts: Part[], ids: { taskId?: string; contextId?: string } = {}): Message {
  return {
    kind: 'message',
    messageId: 'msg-1',
    role: 'user',
    parts,
    taskId: ids.taskId,
    contextId: ids.contextId,
  };
}

export function textMessage(text: string, ids: { taskId?: string; contextId?: string } = {}): Message {
  return userMessage([{ kind: 'text', text }], ids);
}

export function params(message: Message): MessageSendParams {
  return { message };
}

export const agentCard: AgentCard = {
  name: 'Test Storyteller',
  description: 'Writes and reviews stories',
  url: 'http://127.0.0.1/a2a',
  version: '0.1.0',
  protocolVersion: '0.3.0',
  capabilities: { streaming: true },
  defaultInputModes: ['text'],
  defaultOutputModes: ['text', 'application/json'],
  skills: [],
};

export async function drain(stream: EventStream): Promise<A2AStreamEvent[]> {
  const events: A2AStreamEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

export function statusText(status: TaskStatus): string | undefined {
  const part = status.message?.parts.find((p) => p.kind === 'text');
  return part?.kind === 'text' ? part.text : undefined;
}

/** Compact view of a stream event for ordering assertions */
export function describeEvent(event: A2AStreamEvent): string {
  switch (event.kind) {
    case 'status-update':
      return `status:${event.status.state}:${statusText(event.status) ?? ''}`;
    case 'artifact-update': {
      const data = event.artifact.parts.find((p) => p.kind === 'data');
      return `artifact:${data?.kind === 'data' ? String(data.data['type']) : '?'}`;
    }
    case 'task':
      return `task:${event.status.state}:${event.artifacts?.length ?? 0}`;
    case 'message':
      return 'message';
  }
}

export const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
export const CONTEXT_ID_PATTERN = /^ctx_[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
