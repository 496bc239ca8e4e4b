/**
 * Story A2A Request Handler
 *
 * Drives the agent engine for A2A message/send and message/stream requests,
 * surfacing Story and ReviewedStory outputs as artifacts while it runs.
 */

import type {
  AgentCard,
  Message,
  MessageSendParams,
  Task,
  TaskArtifactUpdateEvent,
  TaskStatusUpdateEvent,
} from '@a2a-js/sdk';
import { A2AError, type A2ARequestHandler } from '@a2a-js/sdk/server';
import {
  type AgentEngine,
  type ProcessEventListener,
  type ProcessOptions,
  TaskLifecycle,
  createProcessOptions,
  generateContextId,
  generateId,
} from '@storyteller/core';
import type { A2AOutputEmitter } from '../emitter/output-emitter.js';
import type { A2AStreamEvent, EventStream, StreamingTransport } from '../streaming/types.js';
import {
  STATUS_TEXT,
  createCompletedStatus,
  createFailedStatus,
  createResultArtifact,
  createStatusUpdate,
  createTask,
  createWorkingStatus,
  describeError,
  ensureContextId,
  extractIntent,
  resolveTaskId,
} from './task-factory.js';

export interface StoryA2ARequestHandlerOptions {
  agentCard: AgentCard;
  engine: AgentEngine;
  streamingHandler: StreamingTransport;
  outputEmitter: A2AOutputEmitter;
  /** Listeners added to every process besides the output emitter */
  defaultListeners?: ProcessEventListener[];
}

/**
 * Serves message/send and message/stream. Task storage, cancellation and
 * push notifications are not offered; those methods answer "method not found".
 */
export class StoryA2ARequestHandler implements A2ARequestHandler {
  private agentCard: AgentCard;
  private engine: AgentEngine;
  private streamingHandler: StreamingTransport;
  private outputEmitter: A2AOutputEmitter;
  private defaultListeners: ProcessEventListener[];

  constructor(options: StoryA2ARequestHandlerOptions) {
    this.agentCard = options.agentCard;
    this.engine = options.engine;
    this.streamingHandler = options.streamingHandler;
    this.outputEmitter = options.outputEmitter;
    this.defaultListeners = options.defaultListeners ?? [];
  }

  async getAgentCard(): Promise<AgentCard> {
    return this.agentCard;
  }

  /**
   * Runs the engine to completion and returns the finished Task. Engine
   * failures come back as a failed Task, never as a rejection.
   */
  sendMessage(params: MessageSendParams): Promise<Task> {
    const message = requireMessage(params);
    return this.outputEmitter.runInRequestScope(() => this.runNonStreamingTask(message, params));
  }

  /**
   * Yields the events of handleStreamingMessage; closes the stream if the
   * consumer stops early.
   */
  sendMessageStream(params: MessageSendParams): AsyncGenerator<A2AStreamEvent, void, undefined> {
    return this.relay(this.handleStreamingMessage(params));
  }

  /**
   * Opens the stream and returns it at once; the task runs detached and
   * always closes the stream when it settles.
   */
  handleStreamingMessage(params: MessageSendParams): EventStream {
    const message = requireMessage(params);
    const taskId = resolveTaskId(message);
    const streamId = generateId({ prefix: taskId, length: 'short' });
    const stream = this.streamingHandler.createStream(streamId);

    this.outputEmitter
      .runInRequestScope(() => this.runStreamingTask(streamId, taskId, message, params))
      .catch((error) => {
        console.error(`[Story:Handler] Streaming task on ${streamId} crashed:`, error);
      });

    return stream;
  }

  async getAuthenticatedExtendedAgentCard(): Promise<AgentCard> {
    throw A2AError.methodNotFound('agent/getAuthenticatedExtendedCard');
  }

  async getTask(): Promise<Task> {
    throw A2AError.methodNotFound('tasks/get');
  }

  async cancelTask(): Promise<Task> {
    throw A2AError.methodNotFound('tasks/cancel');
  }

  async setTaskPushNotificationConfig(): Promise<never> {
    throw A2AError.methodNotFound('tasks/pushNotificationConfig/set');
  }

  async getTaskPushNotificationConfig(): Promise<never> {
    throw A2AError.methodNotFound('tasks/pushNotificationConfig/get');
  }

  async listTaskPushNotificationConfigs(): Promise<never> {
    throw A2AError.methodNotFound('tasks/pushNotificationConfig/list');
  }

  async deleteTaskPushNotificationConfig(): Promise<void> {
    throw A2AError.methodNotFound('tasks/pushNotificationConfig/delete');
  }

  async *resubscribe(): AsyncGenerator<
    Task | TaskStatusUpdateEvent | TaskArtifactUpdateEvent,
    void,
    undefined
  > {
    throw A2AError.methodNotFound('tasks/resubscribe');
  }

  private async *relay(stream: EventStream): AsyncGenerator<A2AStreamEvent, void, undefined> {
    try {
      for await (const event of stream) {
        yield event;
      }
    } finally {
      if (!stream.closed) {
        console.log(`[Story:Handler] Consumer left stream ${stream.id} early`);
        this.streamingHandler.closeStream(stream.id);
      }
    }
  }

  private async runNonStreamingTask(message: Message, params: MessageSendParams): Promise<Task> {
    const taskId = resolveTaskId(message);
    const contextId = ensureContextId(message.contextId);
    const lifecycle = new TaskLifecycle(taskId);

    try {
      this.outputEmitter.startCollecting();
      lifecycle.transition({ type: 'START' });

      const intent = extractIntent(message, taskId);
      console.log(`[Story:Handler] Handling message send request with intent: '${intent}'`);
      this.logOutputModes(params);

      const result = await this.engine.execute(intent, this.processOptions());
      console.debug(`[Story:Handler] Task ${taskId} execution result from ${result.processId}`);

      const artifacts = [...this.outputEmitter.getCollectedArtifacts(), createResultArtifact(result)];
      const task = createTask({
        id: taskId,
        contextId,
        status: createCompletedStatus({ taskId, contextId: message.contextId }),
        history: [message],
        artifacts,
      });
      lifecycle.transition({ type: 'COMPLETE' });

      console.log(`[Story:Handler] Handled message send request with ${artifacts.length} artifacts`);
      return task;
    } catch (error) {
      console.error('[Story:Handler] Error handling non-streaming message request:', error);
      lifecycle.transition({ type: 'FAIL', reason: describeError(error) });

      const task = createTask({
        id: taskId,
        contextId,
        status: createFailedStatus(error, { taskId, contextId: message.contextId }),
        history: [message],
        artifacts: [],
      });
      return task;
    } finally {
      this.outputEmitter.clear();
    }
  }

  private async runStreamingTask(
    streamId: string,
    taskId: string,
    message: Message,
    params: MessageSendParams,
  ): Promise<void> {
    const contextId = ensureContextId(message.contextId);
    const ref = { taskId, contextId: message.contextId };
    const lifecycle = new TaskLifecycle(taskId);

    try {
      this.outputEmitter.setStreamId(streamId, { taskId, contextId });
      lifecycle.transition({ type: 'START' });

      this.send(streamId, createStatusUpdate(taskId, contextId, createWorkingStatus(STATUS_TEXT.started, ref)));

      const intent = extractIntent(message, taskId);
      console.log(`[Story:Handler] Executing streaming task with intent: '${intent}'`);
      this.logOutputModes(params);

      const result = await this.engine.execute(intent, this.processOptions());
      console.debug(`[Story:Handler] Task ${taskId} execution result from ${result.processId}`);

      this.send(streamId, createStatusUpdate(taskId, contextId, createWorkingStatus(STATUS_TEXT.processing, ref)));

      this.send(streamId, createTask({
        id: taskId,
        contextId: generateContextId(),
        status: createCompletedStatus(ref),
        history: [message],
        artifacts: [createResultArtifact(result)],
      }));
      lifecycle.transition({ type: 'COMPLETE' });
    } catch (error) {
      console.error(`[Story:Handler] Streaming error on ${streamId}:`, error);
      if (lifecycle.transition({ type: 'FAIL', reason: describeError(error) }).success) {
        this.sendFailure(streamId, taskId, contextId, error, message);
      }
    } finally {
      this.outputEmitter.clear();
      this.streamingHandler.closeStream(streamId);
    }
  }

  private sendFailure(
    streamId: string,
    taskId: string,
    contextId: string,
    error: unknown,
    message: Message,
  ): void {
    try {
      this.send(
        streamId,
        createStatusUpdate(taskId, contextId, createFailedStatus(error, { taskId, contextId: message.contextId })),
      );
    } catch (sendError) {
      console.error(`[Story:Handler] Error sending error event to ${streamId}:`, sendError);
    }
  }

  private send(streamId: string, event: A2AStreamEvent): void {
    this.streamingHandler.sendStreamEvent(streamId, event);
  }

  private processOptions(): ProcessOptions {
    return createProcessOptions({
      defaults: this.defaultListeners,
      listeners: [this.outputEmitter],
    });
  }

  private logOutputModes(params: MessageSendParams): void {
    const modes = params.configuration?.acceptedOutputModes;
    if (modes && modes.length > 0) {
      console.debug(`[Story:Handler] Accepted output modes: ${modes.join(', ')}`);
    }
  }
}

/**
 * The message a send request carries; rejects bodies without one.
 */
function requireMessage(params: MessageSendParams): Message {
  const { message } = params;
  if (!message || !Array.isArray(message.parts)) {
    throw A2AError.invalidParams('params.message with a parts array is required');
  }
  return message;
}
