/**
 * A2A HTTP Server
 *
 * Express app serving the agent card, health check and JSON-RPC endpoint.
 * JSON-RPC parsing, SSE framing and error replies come from the SDK's
 * Express handlers.
 */

import express, { type Express, type Request, type Response } from 'express';
import { AGENT_CARD_PATH } from '@a2a-js/sdk';
import { agentCardHandler, jsonRpcHandler, UserBuilder } from '@a2a-js/sdk/server/express';
import { type ServerConfig, type ResolvedServerConfig, resolveServerConfig } from '../../config.js';
import type { StoryA2ARequestHandler } from '../../handler/request-handler.js';
import type { A2AStreamingHandler } from '../../streaming/stream-registry.js';

export interface A2AServerOptions {
  config?: ServerConfig;
  requestHandler: StoryA2ARequestHandler;
  streamingHandler: A2AStreamingHandler;
}

export interface A2AServer {
  /** Express app instance */
  app: Express;
  config: ResolvedServerConfig;
  /** Start listening; resolves with the bound port */
  start: () => Promise<number>;
  stop: () => Promise<void>;
}

export function createA2AServer(options: A2AServerOptions): A2AServer {
  const { requestHandler, streamingHandler } = options;
  const config = resolveServerConfig(options.config);
  const app = express();
  let server: ReturnType<Express['listen']> | null = null;

  // Request logging middleware
  app.use((req, _res, next) => {
    if (req.path !== '/health') {
      console.log(`[${config.name}] ${req.method} ${req.path}`);
    }
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', name: config.name, timestamp: new Date().toISOString() });
  });

  // A2A endpoints
  app.use(`/${AGENT_CARD_PATH}`, agentCardHandler({ agentCardProvider: requestHandler }));

  /**
   * GET <rpcPath>/status - Open stream count
   */
  app.get(`${config.rpcPath}/status`, (_req: Request, res: Response) => {
    res.json({ activeStreams: streamingHandler.activeStreams() });
  });

  app.use(config.rpcPath, jsonRpcHandler({
    requestHandler,
    userBuilder: UserBuilder.noAuthentication,
  }));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  return {
    app,
    config,
    start: () => new Promise((resolve, reject) => {
      const listening = app.listen(config.port, config.host);
      listening.once('listening', () => {
        const address = listening.address();
        const port = typeof address === 'object' && address ? address.port : config.port;
        console.log(`[${config.name}] A2A Server listening on ${config.host}:${port}`);
        resolve(port);
      });
      listening.once('error', reject);
      server = listening;
    }),
    stop: () => new Promise((resolve, reject) => {
      if (server) {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
        server = null;
      } else {
        resolve();
      }
    }),
  };
}
