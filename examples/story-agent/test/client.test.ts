/**
 * StoryAgentClient SSE parsing Tests
 */

import { describe, it, expect } from 'vitest';
import { takeSseFrames } from '../src/client.js';

describe('takeSseFrames', () => {
  it('should return complete frames and keep the partial one', () => {
    expect(takeSseFrames('data: {"a":1}\n\ndata: {"b"')).toEqual({
      payloads: ['{"a":1}'],
      rest: 'data: {"b"',
    });
  });

  it('should join multi-line data and skip comments', () => {
    expect(takeSseFrames(': keep-alive\n\ndata: one\ndata: two\n\n')).toEqual({
      payloads: ['one\ntwo'],
      rest: '',
    });
  });

  it('should ignore id lines ahead of the data', () => {
    expect(takeSseFrames('id: 1700000000000\ndata: {"a":1}\n\n')).toEqual({
      payloads: ['{"a":1}'],
      rest: '',
    });
  });

  it('should keep everything when no frame is complete', () => {
    expect(takeSseFrames('data: {"a"')).toEqual({ payloads: [], rest: 'data: {"a"' });
  });
});
