/**
 * Story Agent
 *
 * Wires the write-and-review engine into the A2A server.
 */

import {
  A2AOutputEmitter,
  A2AStreamingHandler,
  StoryA2ARequestHandler,
  resolveServerConfig,
} from '@storyteller/a2a';
import { createA2AServer, type A2AServer } from '@storyteller/a2a/server/express';
import type { AgentEngine } from '@storyteller/core';
import { createAgentCard } from './agent-card.js';
import type { StoryAgentConfig } from './config.js';
import { WriteAndReviewAgent } from './engine.js';
import { ProcessLogger } from './process-logger.js';

export interface StoryAgentOptions {
  config: StoryAgentConfig;
  /** Engine override; defaults to the write-and-review agent */
  engine?: AgentEngine;
}

export function createStoryAgent(options: StoryAgentOptions): A2AServer {
  const { config } = options;
  const serverConfig = resolveServerConfig(config.server);
  const engine = options.engine ?? new WriteAndReviewAgent({ wordCount: config.wordCount });

  const streamingHandler = new A2AStreamingHandler();
  const outputEmitter = new A2AOutputEmitter(streamingHandler);
  const requestHandler = new StoryA2ARequestHandler({
    agentCard: createAgentCard(`${serverConfig.publicUrl}${serverConfig.rpcPath}`),
    engine,
    streamingHandler,
    outputEmitter,
    defaultListeners: [new ProcessLogger()],
  });

  return createA2AServer({
    config: serverConfig,
    requestHandler,
    streamingHandler,
  });
}
