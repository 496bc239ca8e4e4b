/**
 * Engine Contracts
 */

import type { BoundValue } from './domain.js';
import type { AgentProcessEvent } from './events.js';

// ========== Listener ==========

export interface ProcessEventListener {
  onProcessEvent(event: AgentProcessEvent): void;
}

// ========== Process Options ==========

export interface ProcessOptions {
  listeners: ProcessEventListener[];
}

export interface ProcessOptionsInit {
  /** Listeners for this process only */
  listeners?: ProcessEventListener[];
  /** Listeners registered for every process */
  defaults?: ProcessEventListener[];
}

/**
 * Merge default and per-process listeners, defaults first.
 * A listener registered in both places is notified once.
 */
export function createProcessOptions(init: ProcessOptionsInit = {}): ProcessOptions {
  const listeners: ProcessEventListener[] = [];
  for (const listener of [...(init.defaults ?? []), ...(init.listeners ?? [])]) {
    if (!listeners.includes(listener)) {
      listeners.push(listener);
    }
  }
  return { listeners };
}

// ========== Execution ==========

export interface ExecutionResult {
  processId: string;
  agentName: string;
  output: BoundValue;
  startedAt: string;
  completedAt: string;
}

/**
 * Runs a workflow for an intent, notifying listeners as values are bound.
 * Rejects when the workflow fails.
 */
export interface AgentEngine {
  execute(intent: string, options: ProcessOptions): Promise<ExecutionResult>;
}
