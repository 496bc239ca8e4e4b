/**
 * Task Factory Tests
 */

import { describe, it, expect } from 'vitest';
import { bindReviewedStory, bindStory, bindUserInput, type ExecutionResult } from '@storyteller/core';
import {
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
} from '../src/handler/task-factory.js';
import { CONTEXT_ID_PATTERN, UUID_PATTERN, statusText, textMessage, userMessage } from './helpers.js';

function result(output: ExecutionResult['output']): ExecutionResult {
  return {
    processId: 'proc_1',
    agentName: 'WriteAndReviewAgent',
    output,
    startedAt: '2026-01-01T00:00:00.000Z',
    completedAt: '2026-01-01T00:00:01.000Z',
  };
}

describe('identifiers', () => {
  it('should keep a provided context id', () => {
    expect(ensureContextId('ctx_given')).toBe('ctx_given');
  });

  it('should generate a context id when missing or empty', () => {
    expect(ensureContextId(undefined)).toMatch(CONTEXT_ID_PATTERN);
    expect(ensureContextId('')).toMatch(CONTEXT_ID_PATTERN);
  });

  it('should use the message task id or a fresh uuid', () => {
    expect(resolveTaskId(textMessage('hi', { taskId: 'T1' }))).toBe('T1');
    expect(resolveTaskId(textMessage('hi'))).toMatch(UUID_PATTERN);
  });
});

describe('extractIntent', () => {
  it('should take the first text part', () => {
    const message = userMessage([
      { kind: 'file', file: { uri: 'file:///tmp/notes.txt' } },
      { kind: 'text', text: 'first' },
      { kind: 'text', text: 'second' },
    ]);
    expect(extractIntent(message, 'T1')).toBe('first');
  });

  it('should keep an empty first text part', () => {
    expect(extractIntent(textMessage(''), 'T1')).toBe('');
  });

  it('should fall back to the task id', () => {
    expect(extractIntent(userMessage([{ kind: 'data', data: {} }]), 'T9')).toBe('Task T9');
  });
});

describe('status', () => {
  it('should build a working status with an agent message', () => {
    const status = createWorkingStatus('Task started...', { taskId: 'T1', contextId: 'ctx_1' });

    expect(status.state).toBe('working');
    expect(statusText(status)).toBe('Task started...');
    expect(status.message?.role).toBe('agent');
    expect(status.message?.taskId).toBe('T1');
    expect(status.message?.contextId).toBe('ctx_1');
    expect(status.message?.messageId).toMatch(UUID_PATTERN);
    expect(Number.isNaN(Date.parse(status.timestamp ?? ''))).toBe(false);
  });

  it('should describe failures with the error message', () => {
    expect(statusText(createFailedStatus(new Error('boom'), { taskId: 'T1' }))).toBe('Task failed: boom');
    expect(statusText(createFailedStatus('plain', { taskId: 'T1' }))).toBe('Task failed: plain');
  });

  it('should mark only terminal status updates final', () => {
    const ref = { taskId: 'T1' };
    expect(createStatusUpdate('T1', 'ctx_1', createWorkingStatus('x', ref)).final).toBe(false);
    expect(createStatusUpdate('T1', 'ctx_1', createCompletedStatus(ref)).final).toBe(true);
    expect(createStatusUpdate('T1', 'ctx_1', createFailedStatus('x', ref)).final).toBe(true);
  });
});

describe('describeError', () => {
  it('should read the message of an Error', () => {
    expect(describeError(new Error('model unavailable'))).toBe('model unavailable');
  });

  it('should stringify other thrown values', () => {
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });

  it('should fall back to Unknown error for values without a string form', () => {
    expect(describeError(Object.create(null))).toBe('Unknown error');
  });
});

describe('createTask', () => {
  it('should build a task without metadata', () => {
    const message = textMessage('hi');
    const status = createCompletedStatus({ taskId: 'T1' });
    expect(createTask({ id: 'T1', contextId: 'ctx_1', status, history: [message], artifacts: [] })).toEqual({
      kind: 'task',
      id: 'T1',
      contextId: 'ctx_1',
      status,
      history: [message],
      artifacts: [],
    });
  });
});

describe('createResultArtifact', () => {
  it('should render a story output', () => {
    const artifact = createResultArtifact(result(bindStory('Once upon a time')));

    expect(artifact.artifactId).toMatch(UUID_PATTERN);
    expect(artifact.parts).toEqual([
      { kind: 'data', data: { result: 'Once upon a time', type: 'final_result' } },
    ]);
  });

  it('should render a reviewed story output', () => {
    const reviewer = { name: 'Jane', persona: 'Book reviewer', voice: 'Warm', objective: 'Guide readers' };
    const artifact = createResultArtifact(result(bindReviewedStory({ text: 'S' }, 'Great', reviewer)));

    expect(artifact.parts).toEqual([
      {
        kind: 'data',
        data: { result: '# Story\nS\n\n# Review\nGreat\n\n# Reviewer\nJane, Book reviewer', type: 'final_result' },
      },
    ]);
  });

  it('should render user input as its content', () => {
    expect(createResultArtifact(result(bindUserInput('echo'))).parts).toEqual([
      { kind: 'data', data: { result: 'echo', type: 'final_result' } },
    ]);
  });
});
