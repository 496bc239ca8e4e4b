/**
 * Story Agent Client
 *
 * Minimal A2A JSON-RPC client for message/send and message/stream.
 *
 * @example
 * ```typescript
 * const client = new StoryAgentClient('http://localhost:8080/a2a');
 *
 * const response = await client.send('Tell me a story about caterpillars');
 *
 * for await (const frame of client.stream('Tell me a story about owls')) {
 *   console.log(frame.result);
 * }
 * ```
 */

import { v4 as uuidv4 } from 'uuid';
import type { Message } from '@a2a-js/sdk';
import { z } from 'zod';

const responseFrameSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

/** One JSON-RPC response, or one SSE frame of a streamed response */
export type ResponseFrame = z.infer<typeof responseFrameSchema>;

export interface MessageIds {
  taskId?: string;
  contextId?: string;
}

export function createUserMessage(prompt: string, ids: MessageIds = {}): Message {
  return {
    kind: 'message',
    messageId: uuidv4(),
    role: 'user',
    parts: [{ kind: 'text', text: prompt }],
    taskId: ids.taskId,
    contextId: ids.contextId,
  };
}

/**
 * Split buffered SSE text into complete frame payloads and the unfinished rest.
 */
export function takeSseFrames(buffer: string): { payloads: string[]; rest: string } {
  const blocks = buffer.split('\n\n');
  const rest = blocks.pop() ?? '';
  const payloads = blocks
    .map((block) =>
      block
        .split('\n')
        .filter((line) => line.startsWith('data:'))
        .map((line) => line.slice('data:'.length).trimStart())
        .join('\n')
    )
    .filter((payload) => payload.length > 0);
  return { payloads, rest };
}

export class StoryAgentClient {
  private rpcUrl: string;
  private timeout: number;
  private nextId = 1;

  constructor(rpcUrl: string, options?: { timeout?: number }) {
    this.rpcUrl = rpcUrl.replace(/\/$/, '');
    this.timeout = options?.timeout ?? 30000;
  }

  /**
   * message/send; resolves with the JSON-RPC response
   */
  async send(prompt: string, ids?: MessageIds): Promise<ResponseFrame> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.post('message/send', prompt, ids, controller.signal);
      return responseFrameSchema.parse(await response.json());
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * message/stream; yields each frame until the server ends the stream
   */
  async *stream(prompt: string, ids?: MessageIds): AsyncGenerator<ResponseFrame> {
    const response = await this.post('message/stream', prompt, ids);
    if (!response.body) {
      throw new Error('Streaming response has no body');
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        buffer += decoder.decode(value, { stream: true });

        const { payloads, rest } = takeSseFrames(buffer);
        buffer = rest;
        for (const payload of payloads) {
          yield responseFrameSchema.parse(JSON.parse(payload));
        }
      }
    } finally {
      reader.releaseLock();
    }
  }

  private async post(
    method: 'message/send' | 'message/stream',
    prompt: string,
    ids: MessageIds | undefined,
    signal?: AbortSignal,
  ): Promise<Response> {
    const response = await fetch(this.rpcUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        jsonrpc: '2.0',
        id: this.nextId++,
        method,
        params: { message: createUserMessage(prompt, ids) },
      }),
      signal,
    });

    if (!response.ok) {
      throw new Error(`Request failed: ${response.status} ${response.statusText}`);
    }
    return response;
  }
}
