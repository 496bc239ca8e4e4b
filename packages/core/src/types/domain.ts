/**
 * Story Domain Types
 *
 * Values that a write-and-review process binds while it runs.
 */

export interface UserInput {
  content: string;
  timestamp: string;
}

export interface Story {
  text: string;
}

/** Who a prompt speaks as */
export interface Persona {
  name: string;
  persona: string;
  voice: string;
  objective: string;
}

/** Role/goal/backstory style persona used for the writer */
export interface RoleGoalBackstory {
  role: string;
  goal: string;
  backstory: string;
}

export interface ReviewedStory {
  story: Story;
  review: string;
  reviewer: Persona;
}

// ========== Bound Values ==========

export interface UserInputBinding {
  kind: 'user-input';
  input: UserInput;
}

export interface StoryBinding {
  kind: 'story';
  story: Story;
}

export interface ReviewedStoryBinding {
  kind: 'reviewed-story';
  reviewedStory: ReviewedStory;
}

/** Anything else an engine binds (intermediate values this bridge does not surface) */
export interface OpaqueBinding {
  kind: 'opaque';
  typeName: string;
  value: unknown;
}

export type BoundValue =
  | UserInputBinding
  | StoryBinding
  | ReviewedStoryBinding
  | OpaqueBinding;

export function bindStory(text: string): StoryBinding {
  return { kind: 'story', story: { text } };
}

export function bindReviewedStory(story: Story, review: string, reviewer: Persona): ReviewedStoryBinding {
  return { kind: 'reviewed-story', reviewedStory: { story, review, reviewer } };
}

export function bindUserInput(content: string): UserInputBinding {
  return { kind: 'user-input', input: { content, timestamp: new Date().toISOString() } };
}
