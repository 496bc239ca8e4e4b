/**
 * Template Storyteller
 *
 * Deterministic writer and reviewer used in place of a language model.
 * The same prompt and word count always produce the same story.
 */

import type { Persona, RoleGoalBackstory, Story, UserInput } from '@storyteller/core';

export interface StoryRequest {
  input: UserInput;
  writer: RoleGoalBackstory;
  /** Target length; the story stops at the first beat that reaches it */
  wordCount: number;
}

export interface ReviewRequest {
  input: UserInput;
  story: Story;
  reviewer: Persona;
  wordCount: number;
}

export interface StoryWriter {
  writeStory(request: StoryRequest): Promise<Story>;
}

export interface StoryReviewer {
  reviewStory(request: ReviewRequest): Promise<string>;
}

const STORY_BEATS = [
  'This is a story about {subject}.',
  'In a quiet valley, {subject} woke to a morning that smelled of rain.',
  'Nobody expected much from {subject}, and that suited everyone just fine.',
  'Then a storm rolled over the hills and scattered everything familiar.',
  'An old circus performer appeared on the road and offered to show the way home.',
  'They crossed the river together, argued about poetry and laughed until dawn.',
  'When the sun rose, the valley looked different, and so did {subject}.',
  'From then on, every storm felt a little like an invitation.',
];

const STORY_REQUEST = /^\s*(?:please\s+)?(?:tell|write)\s+(?:me\s+)?(?:a\s+)?(?:short\s+)?story\s+about\s+/i;

const DEFAULT_SUBJECT = 'a curious traveller';

/**
 * What the story is about: the prompt minus a leading "tell me a story about".
 */
export function extractSubject(prompt: string): string {
  const subject = prompt.replace(STORY_REQUEST, '').replace(/[\s.!?]+$/, '').trim();
  return subject.length > 0 ? subject : DEFAULT_SUBJECT;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export class TemplateStoryteller implements StoryWriter, StoryReviewer {
  async writeStory(request: StoryRequest): Promise<Story> {
    const subject = extractSubject(request.input.content);
    const sentences: string[] = [];

    for (const beat of STORY_BEATS) {
      sentences.push(beat.replaceAll('{subject}', subject));
      if (countWords(sentences.join(' ')) >= request.wordCount) {
        break;
      }
    }

    return { text: sentences.join(' ') };
  }

  async reviewStory(request: ReviewRequest): Promise<string> {
    const words = countWords(request.story.text);
    const subject = extractSubject(request.input.content);
    const pacing = words >= request.wordCount
      ? 'takes its time and earns its ending'
      : 'is brief, but never feels rushed';

    return `As a ${request.reviewer.persona}, I read this ${words}-word tale about ${subject}. `
      + `It ${pacing}. Recommended for readers who like a little weather in their fairy tales.`;
  }
}
