/**
 * Logs agent process events as they happen.
 */

import type { AgentProcessEvent, ProcessEventListener } from '@storyteller/core';

export class ProcessLogger implements ProcessEventListener {
  onProcessEvent(event: AgentProcessEvent): void {
    console.log(`[Story:Process] ${describeProcessEvent(event)}`);
  }
}

export function describeProcessEvent(event: AgentProcessEvent): string {
  switch (event.type) {
    case 'process-created':
      return `${event.processId} created for ${event.agentName}: '${event.intent}'`;
    case 'object-binding':
      return `${event.processId} bound ${event.name} (${event.value.kind})`;
    case 'action-started':
      return `${event.processId} started ${event.action}`;
    case 'action-completed':
      return `${event.processId} completed ${event.action} in ${event.durationMs}ms`;
    case 'process-completed':
      return `${event.processId} completed`;
    case 'process-failed':
      return `${event.processId} failed: ${event.error}`;
  }
}
