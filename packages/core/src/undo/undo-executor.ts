/**
 * Reverses a single history action against the task store.
 */

import type { TaskStore } from '../store/task-store.js';
import type { UndoResult } from '../types/results.js';
import type { Action } from './actions.js';
import { getActionTaskId } from './actions.js';

function targetMissing(action: Action): UndoResult {
  const taskId = getActionTaskId(action);
  return {
    type: 'target-missing',
    action,
    taskId,
    message: `Cannot undo: ${action.$type} task ${taskId} no longer exists`,
  };
}

/** Undo an action (reverse the operation). The action is consumed whatever the outcome. */
export function undoAction(store: TaskStore, action: Action): UndoResult {
  switch (action.$type) {
    case 'added':
      if (!store.removeById(action.taskId)) return targetMissing(action);
      return { type: 'success', action, message: `Removed task ${action.taskId} (originally added)` };

    case 'completed': {
      if (!store.restoreCompleted(action.taskId, action.previousCompleted)) return targetMissing(action);
      const state = action.previousCompleted ? 'completed' : 'pending';
      return { type: 'success', action, message: `Task ${action.taskId} reverted to ${state}` };
    }

    case 'removed':
      store.reinsertTask(action.task);
      return {
        type: 'success',
        action,
        message: `Restored task '${action.task.description}' (ID: ${action.task.id})`,
      };
  }
}
