/**
 * Story Agent CLI
 *
 * - serve: Start the A2A server
 * - demo: Run the write-and-review agent in process
 * - send / stream: Talk to a running server
 */

import { AGENT_CARD_PATH } from '@a2a-js/sdk';
import { createProcessOptions, renderOutput } from '@storyteller/core';
import { createStoryAgent } from '../agent.js';
import { StoryAgentClient } from '../client.js';
import { loadConfig } from '../config.js';
import { WriteAndReviewAgent } from '../engine.js';
import { ProcessLogger } from '../process-logger.js';

const DEFAULT_PROMPT = 'Tell me a story about caterpillars';

async function main() {
  const [command, ...args] = process.argv.slice(2);

  switch (command) {
    case 'serve':
      await runServe();
      break;
    case 'demo':
      await runDemo(args.join(' ') || DEFAULT_PROMPT);
      break;
    case 'send':
      await runSend(args);
      break;
    case 'stream':
      await runStream(args);
      break;
    default:
      printHelp();
  }
}

function printHelp() {
  console.log(`
Story Agent CLI

Usage: npm run story -- <command>

Commands:
  serve                 Start the A2A server
  demo [prompt]         Write and review a story without a server
  send <url> <prompt>   Send a message to a running server
  stream <url> <prompt> Stream a message from a running server

Environment (or .env):
  PORT=8080             Listen port
  HOST=0.0.0.0          Listen host
  PUBLIC_URL            URL advertised in the agent card
  STORY_WORD_COUNT=100  Target story length

Examples:
  npm run story -- demo "Tell me a story about owls"
  npm run story -- stream http://localhost:8080/a2a "Tell me a story about owls"
`);
}

async function runServe() {
  const server = createStoryAgent({ config: loadConfig() });
  const port = await server.start();
  const base = server.config.publicUrl;

  console.log('');
  console.log('Story Agent started');
  console.log(`  Port:       ${port}`);
  console.log(`  Agent Card: ${base}/${AGENT_CARD_PATH}`);
  console.log(`  JSON-RPC:   ${base}${server.config.rpcPath}`);
  console.log('');

  process.once('SIGINT', () => {
    console.log('\n[CLI] Shutting down...');
    server.stop()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error('[CLI] Shutdown failed:', error);
        process.exit(1);
      });
  });
}

async function runDemo(prompt: string) {
  const { wordCount } = loadConfig();
  const engine = new WriteAndReviewAgent({ wordCount });
  const result = await engine.execute(prompt, createProcessOptions({ listeners: [new ProcessLogger()] }));

  console.log('');
  console.log(renderOutput(result.output));
}

function requireTarget(args: string[]): { url: string; prompt: string } {
  const [url, ...rest] = args;
  if (!url) {
    throw new Error('Missing server URL, e.g. http://localhost:8080/a2a');
  }
  return { url, prompt: rest.join(' ') || DEFAULT_PROMPT };
}

async function runSend(args: string[]) {
  const { url, prompt } = requireTarget(args);
  const response = await new StoryAgentClient(url).send(prompt);
  console.log(JSON.stringify(response, null, 2));
}

async function runStream(args: string[]) {
  const { url, prompt } = requireTarget(args);
  for await (const frame of new StoryAgentClient(url).stream(prompt)) {
    console.log(JSON.stringify(frame.error ?? frame.result));
  }
}

main().catch((error) => {
  console.error('[CLI] Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
