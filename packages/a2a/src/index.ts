/**
 * @storyteller/a2a
 *
 * A2A bridge - streaming and non-streaming request handling over an agent engine
 */

export {
  StoryA2ARequestHandler,
  type StoryA2ARequestHandlerOptions,
} from './handler/request-handler.js';

export {
  STATUS_TEXT,
  FINAL_RESULT_TYPE,
  extractIntent,
  ensureContextId,
  resolveTaskId,
  createResultArtifact,
  createDataArtifact,
  type TaskRef,
} from './handler/task-factory.js';

export {
  A2AOutputEmitter,
  toArtifactPayload,
  type StreamTarget,
  type RequestSlot,
  type ArtifactType,
} from './emitter/output-emitter.js';

export { A2AStreamingHandler } from './streaming/stream-registry.js';
export type { A2AStreamEvent, EventStream, StreamingTransport } from './streaming/types.js';

export {
  DEFAULT_SERVER,
  resolveServerConfig,
  type ServerConfig,
  type ResolvedServerConfig,
} from './config.js';

// Re-export core types for convenience
export * from '@storyteller/core';
