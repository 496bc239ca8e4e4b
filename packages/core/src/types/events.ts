/**
 * Agent Process Events
 *
 * Notifications an engine raises while a process runs.
 */

import type { BoundValue } from './domain.js';

export type ProcessEventType =
  | 'process-created'
  | 'object-binding'
  | 'action-started'
  | 'action-completed'
  | 'process-completed'
  | 'process-failed';

interface BaseProcessEvent {
  type: ProcessEventType;
  processId: string;
  timestamp: string;
}

export interface ProcessCreatedEvent extends BaseProcessEvent {
  type: 'process-created';
  agentName: string;
  intent: string;
}

/** A named intermediate value became available */
export interface ObjectBindingEvent extends BaseProcessEvent {
  type: 'object-binding';
  name: string;
  value: BoundValue;
}

export interface ActionStartedEvent extends BaseProcessEvent {
  type: 'action-started';
  action: string;
}

export interface ActionCompletedEvent extends BaseProcessEvent {
  type: 'action-completed';
  action: string;
  durationMs: number;
}

export interface ProcessCompletedEvent extends BaseProcessEvent {
  type: 'process-completed';
}

export interface ProcessFailedEvent extends BaseProcessEvent {
  type: 'process-failed';
  error: string;
}

export type AgentProcessEvent =
  | ProcessCreatedEvent
  | ObjectBindingEvent
  | ActionStartedEvent
  | ActionCompletedEvent
  | ProcessCompletedEvent
  | ProcessFailedEvent;

export function isObjectBindingEvent(event: AgentProcessEvent): event is ObjectBindingEvent {
  return event.type === 'object-binding';
}
