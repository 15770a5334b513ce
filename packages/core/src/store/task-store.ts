/**
 * In-memory ordered task collection.
 *
 * Tasks live in a Map keyed by id: Map iteration follows insertion order,
 * `set` on a new key appends at the tail, and `delete` leaves the order of
 * the remaining entries untouched, which is exactly the list semantics the
 * store needs.
 */

import type { Task, TaskId } from '../types/task.js';
import type { CompleteResult, RemoveResult } from '../types/results.js';

interface TaskRecord {
  readonly id: TaskId;
  readonly description: string;
  completed: boolean;
}

function snapshot(record: TaskRecord): Task {
  return { id: record.id, description: record.description, completed: record.completed };
}

export class TaskStore {
  private tasks = new Map<TaskId, TaskRecord>();
  private _nextId: TaskId = 1;

  /** The id the next `addTask` call will issue. Always greater than every id ever issued. */
  get nextId(): TaskId { return this._nextId; }
  get size(): number { return this.tasks.size; }

  /** Append a new pending task and return its freshly issued id */
  addTask(description: string): TaskId {
    const id = this._nextId++;
    this.tasks.set(id, { id, description, completed: false });
    return id;
  }

  /** Snapshots in insertion order */
  listTasks(): Task[] {
    return [...this.tasks.values()].map(snapshot);
  }

  getTask(taskId: TaskId): Task | null {
    const record = this.tasks.get(taskId);
    return record ? snapshot(record) : null;
  }

  completeTask(taskId: TaskId): CompleteResult {
    const record = this.tasks.get(taskId);
    if (!record) return { type: 'not-found', taskId };
    if (record.completed) return { type: 'already-completed', taskId };

    const previousCompleted = record.completed;
    record.completed = true;
    return { type: 'success', task: snapshot(record), previousCompleted };
  }

  removeTask(taskId: TaskId): RemoveResult {
    const record = this.tasks.get(taskId);
    if (!record) return { type: 'not-found', taskId };

    this.tasks.delete(taskId);
    return { type: 'success', task: snapshot(record) };
  }

  /** Undo-of-add helper. Returns false if the task is already gone. */
  removeById(taskId: TaskId): boolean {
    return this.tasks.delete(taskId);
  }

  /**
   * Undo-of-complete helper: writes the completed flag directly, so it can
   * move a task back to pending. Returns false if the task is gone.
   */
  restoreCompleted(taskId: TaskId, completed: boolean): boolean {
    const record = this.tasks.get(taskId);
    if (!record) return false;
    record.completed = completed;
    return true;
  }

  /**
   * Undo-of-remove helper: appends a task that keeps its original id.
   * The task goes to the tail, not back to its former position.
   * @internal Only the undo executor calls this; normal adds go through `addTask`.
   */
  reinsertTask(task: Task): void {
    if (this.tasks.has(task.id)) {
      throw new Error(`Cannot reinsert task ${task.id}: id already in use`);
    }
    this.tasks.set(task.id, { id: task.id, description: task.description, completed: task.completed });
    if (task.id >= this._nextId) {
      this._nextId = task.id + 1;
    }
  }
}
