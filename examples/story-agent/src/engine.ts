/**
 * Write-and-Review Engine
 *
 * Writes a story for the user's prompt, then has the reviewer persona
 * critique it. Raises process events so listeners see each value as it
 * is bound.
 */

import {
  type AgentEngine,
  type AgentProcessEvent,
  type BoundValue,
  type ExecutionResult,
  type Persona,
  type ProcessOptions,
  type RoleGoalBackstory,
  ExecutionFailedError,
  bindReviewedStory,
  bindUserInput,
  generateProcessId,
} from '@storyteller/core';
import { REVIEWER, WRITER } from './personas.js';
import { TemplateStoryteller, type StoryReviewer, type StoryWriter } from './storyteller.js';

export const DEFAULT_WORD_COUNT = 100;

export interface WriteAndReviewAgentOptions {
  writer?: StoryWriter;
  reviewer?: StoryReviewer;
  wordCount?: number;
  writerPersona?: RoleGoalBackstory;
  reviewerPersona?: Persona;
}

type Emit = (event: AgentProcessEvent) => void;

export class WriteAndReviewAgent implements AgentEngine {
  static readonly NAME = 'WriteAndReviewAgent';

  private writer: StoryWriter;
  private reviewer: StoryReviewer;
  private wordCount: number;
  private writerPersona: RoleGoalBackstory;
  private reviewerPersona: Persona;

  constructor(options: WriteAndReviewAgentOptions = {}) {
    const storyteller = new TemplateStoryteller();
    this.writer = options.writer ?? storyteller;
    this.reviewer = options.reviewer ?? storyteller;
    this.wordCount = options.wordCount ?? DEFAULT_WORD_COUNT;
    this.writerPersona = options.writerPersona ?? WRITER;
    this.reviewerPersona = options.reviewerPersona ?? REVIEWER;
  }

  async execute(intent: string, options: ProcessOptions): Promise<ExecutionResult> {
    const processId = generateProcessId();
    const startedAt = new Date().toISOString();
    const emit: Emit = (event) => {
      for (const listener of options.listeners) {
        listener.onProcessEvent(event);
      }
    };
    const bind = (name: string, value: BoundValue) => {
      emit({ type: 'object-binding', processId, timestamp: new Date().toISOString(), name, value });
    };

    emit({ type: 'process-created', processId, timestamp: startedAt, agentName: WriteAndReviewAgent.NAME, intent });

    try {
      const userInput = bindUserInput(intent);
      bind('userInput', userInput);

      const story = await this.runAction(processId, 'craftStory', emit, () =>
        this.writer.writeStory({ input: userInput.input, writer: this.writerPersona, wordCount: this.wordCount })
      );
      bind('story', { kind: 'story', story });

      const review = await this.runAction(processId, 'reviewStory', emit, () =>
        this.reviewer.reviewStory({
          input: userInput.input,
          story,
          reviewer: this.reviewerPersona,
          wordCount: this.wordCount,
        })
      );
      const output = bindReviewedStory(story, review, this.reviewerPersona);
      bind('reviewedStory', output);

      const completedAt = new Date().toISOString();
      emit({ type: 'process-completed', processId, timestamp: completedAt });

      return { processId, agentName: WriteAndReviewAgent.NAME, output, startedAt, completedAt };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      emit({ type: 'process-failed', processId, timestamp: new Date().toISOString(), error: reason });
      throw new ExecutionFailedError(reason, processId);
    }
  }

  private async runAction<T>(processId: string, action: string, emit: Emit, run: () => Promise<T>): Promise<T> {
    const started = Date.now();
    emit({ type: 'action-started', processId, timestamp: new Date(started).toISOString(), action });
    const result = await run();
    emit({
      type: 'action-completed',
      processId,
      timestamp: new Date().toISOString(),
      action,
      durationMs: Date.now() - started,
    });
    return result;
  }
}
