import type { Task, TaskId } from './task.js';
import type { Action } from '../undo/actions.js';

export type CompleteResult =
  | { readonly type: 'success'; readonly task: Task; readonly previousCompleted: boolean }
  | { readonly type: 'not-found'; readonly taskId: TaskId }
  | { readonly type: 'already-completed'; readonly taskId: TaskId };

export type RemoveResult =
  | { readonly type: 'success'; readonly task: Task }
  | { readonly type: 'not-found'; readonly taskId: TaskId };

/** Outcome of consuming one history entry */
export type UndoResult =
  | { readonly type: 'success'; readonly action: Action; readonly message: string }
  | { readonly type: 'nothing-to-undo' }
  | { readonly type: 'target-missing'; readonly action: Action; readonly taskId: TaskId; readonly message: string };
