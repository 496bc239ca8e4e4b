/**
 * A2A Message, Status, Task and Artifact Builders
 */

import type {
  Artifact,
  Message,
  Task,
  TaskState,
  TaskStatus,
  TaskStatusUpdateEvent,
} from '@a2a-js/sdk';
import {
  type ExecutionResult,
  generateArtifactId,
  generateContextId,
  generateMessageId,
  renderOutput,
} from '@storyteller/core';

export const STATUS_TEXT = {
  started: 'Task started...',
  processing: 'Processing task...',
  completed: 'Task completed successfully',
} as const;

export const FINAL_RESULT_TYPE = 'final_result';

/** Identifiers a synthesized agent message is attached to */
export interface TaskRef {
  taskId: string;
  contextId?: string;
}

// ========== Identifiers & Intent ==========

export function ensureContextId(contextId: string | undefined): string {
  return contextId ? contextId : generateContextId();
}

export function resolveTaskId(message: Message): string {
  return message.taskId ? message.taskId : generateMessageId();
}

/**
 * First text part of the message, or "Task <taskId>" when it has none.
 */
export function extractIntent(message: Message, taskId: string): string {
  for (const part of message.parts) {
    if (part.kind === 'text') {
      return part.text;
    }
  }
  return `Task ${taskId}`;
}

/**
 * Text for a thrown value. Values without a string form, such as
 * Object.create(null), read as "Unknown error".
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Unknown error';
  }
}

// ========== Status ==========

export function createAgentMessage(text: string, ref: TaskRef): Message {
  return {
    kind: 'message',
    messageId: generateMessageId(),
    role: 'agent',
    parts: [{ kind: 'text', text }],
    contextId: ref.contextId,
    taskId: ref.taskId,
  };
}

export function createTaskStatus(state: TaskState, text: string, ref: TaskRef): TaskStatus {
  return {
    state,
    message: createAgentMessage(text, ref),
    timestamp: new Date().toISOString(),
  };
}

export function createWorkingStatus(text: string, ref: TaskRef): TaskStatus {
  return createTaskStatus('working', text, ref);
}

export function createCompletedStatus(ref: TaskRef): TaskStatus {
  return createTaskStatus('completed', STATUS_TEXT.completed, ref);
}

export function createFailedStatus(error: unknown, ref: TaskRef): TaskStatus {
  return createTaskStatus('failed', `Task failed: ${describeError(error)}`, ref);
}

export function createStatusUpdate(
  taskId: string,
  contextId: string,
  status: TaskStatus,
): TaskStatusUpdateEvent {
  return {
    kind: 'status-update',
    taskId,
    contextId,
    status,
    final: status.state === 'completed' || status.state === 'failed',
  };
}

// ========== Task ==========

export function createTask(params: {
  id: string;
  contextId: string;
  status: TaskStatus;
  history: Message[];
  artifacts: Artifact[];
}): Task {
  return {
    kind: 'task',
    id: params.id,
    contextId: params.contextId,
    status: params.status,
    history: params.history,
    artifacts: params.artifacts,
  };
}

// ========== Artifacts ==========

export function createDataArtifact(data: Record<string, unknown>): Artifact {
  return {
    artifactId: generateArtifactId(),
    parts: [{ kind: 'data', data }],
  };
}

export function createResultArtifact(result: ExecutionResult): Artifact {
  return createDataArtifact({
    result: renderOutput(result.output),
    type: FINAL_RESULT_TYPE,
  });
}
