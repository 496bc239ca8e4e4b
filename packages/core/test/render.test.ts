/**
 * Output Rendering Tests
 */

import { describe, it, expect } from 'vitest';
import { renderOutput } from '../src/utils/render.js';
import { bindReviewedStory, bindStory, bindUserInput } from '../src/types/domain.js';

const reviewer = {
  name: 'Jane',
  persona: 'Book reviewer',
  voice: 'Measured',
  objective: 'Guide readers',
};

describe('renderOutput', () => {
  it('should render a story as its text', () => {
    expect(renderOutput(bindStory('Once upon a time'))).toBe('Once upon a time');
  });

  it('should render a reviewed story with story, review and reviewer sections', () => {
    const value = bindReviewedStory({ text: 'S' }, 'Great', reviewer);
    expect(renderOutput(value)).toBe(
      '# Story\nS\n\n# Review\nGreat\n\n# Reviewer\nJane, Book reviewer',
    );
  });

  it('should render user input as its content', () => {
    expect(renderOutput(bindUserInput('hello'))).toBe('hello');
  });

  it('should pass opaque strings through', () => {
    expect(renderOutput({ kind: 'opaque', typeName: 'Note', value: 'plain' })).toBe('plain');
  });

  it('should JSON-encode opaque objects', () => {
    expect(renderOutput({ kind: 'opaque', typeName: 'Animal', value: { name: 'Moth', legs: 6 } }))
      .toBe('{"name":"Moth","legs":6}');
  });
});
