export {
  TaskLifecycle,
  isTerminalTaskState,
  isValidTaskTransition,
  type TaskLifecycleState,
  type TaskLifecycleEvent,
  type TaskTransitionResult,
} from './task.js';
