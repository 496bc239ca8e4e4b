/**
 * Express integration for the Storyteller A2A bridge
 */

export { createA2AServer, type A2AServer, type A2AServerOptions } from './server.js';
