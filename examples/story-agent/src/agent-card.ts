/**
 * Agent Card - Story Agent Identity
 */

import type { AgentCard } from '@a2a-js/sdk';

export function createAgentCard(rpcUrl: string): AgentCard {
  return {
    name: 'Story Writer and Reviewer',
    description: 'Writes a short story from your prompt and has a book reviewer critique it',
    url: rpcUrl,
    version: '0.1.0',
    protocolVersion: '0.3.0',
    defaultInputModes: ['text'],
    defaultOutputModes: ['text', 'application/json'],
    capabilities: {
      streaming: true,
      pushNotifications: false,
      stateTransitionHistory: false,
    },
    skills: [
      {
        id: 'write-and-review-story',
        name: 'Write and Review a Story',
        description: 'Write a story on a topic, then review it as a newspaper book critic',
        tags: ['story', 'writing', 'review'],
        examples: [
          'Tell me a story about caterpillars',
          'Write a story about a lighthouse keeper',
        ],
      },
    ],
  };
}
