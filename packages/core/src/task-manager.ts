/**
 * Couples the task store with its action history.
 * Every mutation that succeeds records its inverse; failures record nothing.
 */

import { TaskStore } from './store/task-store.js';
import { ActionHistory } from './undo/action-history.js';
import type { Action } from './undo/actions.js';
import type { Task, TaskId } from './types/task.js';
import type { CompleteResult, RemoveResult, UndoResult } from './types/results.js';

export interface TaskManagerOptions {
  /** Cap on pending undo entries. Unbounded when omitted. */
  historyLimit?: number;
  /** Called after an action is pushed onto the history */
  onRecord?: (action: Action) => void;
}

export class TaskManager {
  private readonly store = new TaskStore();
  private readonly _history: ActionHistory;
  private readonly onRecord: ((action: Action) => void) | undefined;

  constructor(options: TaskManagerOptions = {}) {
    this._history = new ActionHistory(
      options.historyLimit === undefined ? {} : { limit: options.historyLimit },
    );
    this.onRecord = options.onRecord;
  }

  /** Pending undo entries, most recent first */
  get history(): readonly Action[] { return this._history.entries; }
  get canUndo(): boolean { return this._history.canUndo; }
  /** Id the next added task will receive */
  get nextId(): TaskId { return this.store.nextId; }

  addTask(description: string): TaskId {
    // Record the id the store handed back rather than deriving it from nextId
    const taskId = this.store.addTask(description);
    this.record({ $type: 'added', taskId });
    return taskId;
  }

  listTasks(): Task[] {
    return this.store.listTasks();
  }

  completeTask(taskId: TaskId): CompleteResult {
    const result = this.store.completeTask(taskId);
    if (result.type === 'success') {
      this.record({ $type: 'completed', taskId, previousCompleted: result.previousCompleted });
    }
    return result;
  }

  removeTask(taskId: TaskId): RemoveResult {
    const result = this.store.removeTask(taskId);
    if (result.type === 'success') {
      this.record({ $type: 'removed', task: result.task });
    }
    return result;
  }

  undo(): UndoResult {
    return this._history.undo(this.store);
  }

  clearHistory(): void {
    this._history.clear();
  }

  private record(action: Action): void {
    this._history.push(action);
    this.onRecord?.(action);
  }
}
