/**
 * @storyteller/story-agent
 */

export { createStoryAgent, type StoryAgentOptions } from './agent.js';
export { createAgentCard } from './agent-card.js';
export { StoryAgentClient, createUserMessage, takeSseFrames, type ResponseFrame, type MessageIds } from './client.js';
export { loadConfig, type StoryAgentConfig, type LoadConfigOptions } from './config.js';
export { WriteAndReviewAgent, DEFAULT_WORD_COUNT, type WriteAndReviewAgentOptions } from './engine.js';
export { REVIEWER, WRITER } from './personas.js';
export { ProcessLogger, describeProcessEvent } from './process-logger.js';
export {
  TemplateStoryteller,
  countWords,
  extractSubject,
  type StoryRequest,
  type ReviewRequest,
  type StoryWriter,
  type StoryReviewer,
} from './storyteller.js';
