/**
 * ID Generation Utilities
 */

import { randomUUID, randomBytes } from 'node:crypto';

export type IdLength = 'short' | 'medium' | 'long' | 'uuid';

export interface GenerateIdOptions {
  prefix?: string;
  length?: IdLength;
}

const HEX_LENGTH: Record<Exclude<IdLength, 'uuid'>, number> = {
  short: 8,
  medium: 12,
  long: 16,
};

/**
 * Generate a unique ID with optional prefix and configurable length.
 *
 * @example
 * generateId() // "a1b2c3d4e5f6" (medium, no prefix)
 * generateId({ prefix: 'proc' }) // "proc_a1b2c3d4e5f6"
 * generateId({ prefix: 'ctx', length: 'uuid' }) // "ctx_1b4e28ba-2fa1-11d2-883f-0016d3cca427"
 */
export function generateId(options: GenerateIdOptions = {}): string {
  const { prefix, length = 'medium' } = options;

  let id: string;
  if (length === 'uuid') {
    id = randomUUID();
  } else {
    const size = HEX_LENGTH[length];
    id = randomBytes(Math.ceil(size / 2)).toString('hex').slice(0, size);
  }

  return prefix ? `${prefix}_${id}` : id;
}

/**
 * Generate a conversation context ID ("ctx_" + UUID).
 */
export function generateContextId(): string {
  return generateId({ prefix: 'ctx', length: 'uuid' });
}

/**
 * Generate an artifact ID (bare UUID).
 */
export function generateArtifactId(): string {
  return randomUUID();
}

/**
 * Generate a protocol message ID (bare UUID).
 */
export function generateMessageId(): string {
  return randomUUID();
}

/**
 * Generate an agent process ID.
 */
export function generateProcessId(length: IdLength = 'medium'): string {
  return generateId({ prefix: 'proc', length });
}
