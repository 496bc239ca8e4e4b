/**
 * ID Generation Tests
 */

import { describe, it, expect } from 'vitest';
import {
  generateId,
  generateContextId,
  generateArtifactId,
  generateMessageId,
  generateProcessId,
} from '../src/utils/id.js';

const UUID = '[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}';

describe('generateId', () => {
  describe('default behavior', () => {
    it('should generate medium length ID without prefix', () => {
      const id = generateId();
      expect(id).toMatch(/^[a-f0-9]{12}$/);
    });

    it('should generate unique IDs', () => {
      const ids = new Set(Array.from({ length: 100 }, () => generateId()));
      expect(ids.size).toBe(100);
    });
  });

  describe('with prefix', () => {
    it('should add prefix with underscore separator', () => {
      const id = generateId({ prefix: 'test' });
      expect(id).toMatch(/^test_[a-f0-9]{12}$/);
    });

    it('should handle empty prefix', () => {
      const id = generateId({ prefix: '' });
      expect(id).toMatch(/^[a-f0-9]{12}$/);
    });
  });

  describe('length options', () => {
    it('should generate short ID (8 chars)', () => {
      expect(generateId({ length: 'short' })).toMatch(/^[a-f0-9]{8}$/);
    });

    it('should generate long ID (16 chars)', () => {
      expect(generateId({ length: 'long' })).toMatch(/^[a-f0-9]{16}$/);
    });

    it('should keep hyphens for uuid length', () => {
      expect(generateId({ length: 'uuid' })).toMatch(new RegExp(`^${UUID}$`));
    });
  });
});

describe('generateContextId', () => {
  it('should prefix a UUID with ctx_', () => {
    expect(generateContextId()).toMatch(new RegExp(`^ctx_${UUID}$`));
  });

  it('should differ between calls', () => {
    expect(generateContextId()).not.toBe(generateContextId());
  });
});

describe('generateArtifactId / generateMessageId', () => {
  it('should be bare UUIDs', () => {
    expect(generateArtifactId()).toMatch(new RegExp(`^${UUID}$`));
    expect(generateMessageId()).toMatch(new RegExp(`^${UUID}$`));
  });
});

describe('generateProcessId', () => {
  it('should generate with proc prefix and medium length by default', () => {
    expect(generateProcessId()).toMatch(/^proc_[a-f0-9]{12}$/);
  });

  it('should respect custom length', () => {
    expect(generateProcessId('short')).toMatch(/^proc_[a-f0-9]{8}$/);
  });
});
