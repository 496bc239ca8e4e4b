import type { BoundValue, ReviewedStory } from '../types/domain.js';

/**
 * Render a bound value as plain text for a final result.
 */
export function renderOutput(value: BoundValue): string {
  switch (value.kind) {
    case 'story':
      return value.story.text;
    case 'reviewed-story':
      return renderReviewedStory(value.reviewedStory);
    case 'user-input':
      return value.input.content;
    case 'opaque':
      return typeof value.value === 'string' ? value.value : JSON.stringify(value.value) ?? String(value.value);
    default: {
      const unreachable: never = value;
      throw new Error(`Unknown bound value: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function renderReviewedStory(reviewed: ReviewedStory): string {
  return [
    '# Story',
    reviewed.story.text,
    '',
    '# Review',
    reviewed.review,
    '',
    '# Reviewer',
    `${reviewed.reviewer.name}, ${reviewed.reviewer.persona}`,
  ].join('\n');
}
