// ========== States ==========

export type TaskLifecycleState = 'submitted' | 'working' | 'completed' | 'failed';

const TASK_TRANSITIONS: Record<TaskLifecycleState, TaskLifecycleState[]> = {
  submitted: ['working', 'failed'],
  working: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminalTaskState(state: TaskLifecycleState): boolean {
  return TASK_TRANSITIONS[state].length === 0;
}

export function isValidTaskTransition(
  from: TaskLifecycleState,
  to: TaskLifecycleState,
): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

// ========== Events ==========

export type TaskLifecycleEvent =
  | { type: 'START' }
  | { type: 'COMPLETE' }
  | { type: 'FAIL'; reason: string };

export interface TaskTransitionResult {
  success: boolean;
  newState: TaskLifecycleState;
  error?: string;
}

// ========== State Machine ==========

/**
 * Tracks one request's task from submission to its single terminal state.
 */
export class TaskLifecycle {
  private state: TaskLifecycleState = 'submitted';
  private failureReason?: string;

  constructor(readonly taskId: string) {}

  getState(): TaskLifecycleState {
    return this.state;
  }

  getFailureReason(): string | undefined {
    return this.failureReason;
  }

  isTerminal(): boolean {
    return isTerminalTaskState(this.state);
  }

  transition(event: TaskLifecycleEvent): TaskTransitionResult {
    const targetState = this.getTargetState(event);

    if (!isValidTaskTransition(this.state, targetState)) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid transition from ${this.state} to ${targetState} for task ${this.taskId}`,
      };
    }

    this.state = targetState;
    if (event.type === 'FAIL') {
      this.failureReason = event.reason;
    }
    return {
      success: true,
      newState: this.state,
    };
  }

  private getTargetState(event: TaskLifecycleEvent): TaskLifecycleState {
    switch (event.type) {
      case 'START':
        return 'working';
      case 'COMPLETE':
        return 'completed';
      case 'FAIL':
        return 'failed';
    }
  }
}
