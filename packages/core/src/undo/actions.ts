/**
 * Undo action types as a discriminated union.
 * Each action stores exactly the data needed to invert one store mutation.
 * Reversal itself is done by the undo executor.
 */

import type { Task, TaskId } from '../types/task.js';

export interface AddedAction {
  readonly $type: 'added';
  readonly taskId: TaskId;
}

export interface CompletedAction {
  readonly $type: 'completed';
  readonly taskId: TaskId;
  readonly previousCompleted: boolean;
}

export interface RemovedAction {
  readonly $type: 'removed';
  readonly task: Task;
}

export type Action = AddedAction | CompletedAction | RemovedAction;

/** Id of the task an action refers to */
export function getActionTaskId(action: Action): TaskId {
  switch (action.$type) {
    case 'added':
    case 'completed':
      return action.taskId;
    case 'removed':
      return action.task.id;
  }
}

/** Get a human-readable description of an action */
export function getActionDescription(action: Action): string {
  switch (action.$type) {
    case 'added': return `Add: task ${action.taskId}`;
    case 'completed': return `Complete: task ${action.taskId}`;
    case 'removed': return `Remove: task ${action.task.id} (${action.task.description.slice(0, 30)})`;
  }
}
