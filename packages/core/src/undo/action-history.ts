/**
 * LIFO record of reversible store mutations.
 * Single stack, no redo: an undone action is consumed for good.
 */

import type { TaskStore } from '../store/task-store.js';
import type { UndoResult } from '../types/results.js';
import type { Action } from './actions.js';
import { undoAction } from './undo-executor.js';

export interface ActionHistoryOptions {
  /** Maximum number of entries kept; oldest are dropped first. Unbounded when omitted. */
  limit?: number;
}

export class ActionHistory {
  private stack: Action[] = [];
  private readonly limit: number | null;

  constructor(options: ActionHistoryOptions = {}) {
    const { limit } = options;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new RangeError(`History limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit ?? null;
  }

  get size(): number { return this.stack.length; }
  get canUndo(): boolean { return this.stack.length > 0; }

  /** Pending actions, most recent first */
  get entries(): readonly Action[] { return [...this.stack].reverse(); }

  push(action: Action): void {
    this.stack.push(action);
    this.enforceSizeLimit();
  }

  /** Remove and return the most recent action, or null if the history is empty */
  pop(): Action | null {
    return this.stack.pop() ?? null;
  }

  /** Pop the most recent action and reverse it against the store */
  undo(store: TaskStore): UndoResult {
    const action = this.pop();
    if (!action) return { type: 'nothing-to-undo' };
    return undoAction(store, action);
  }

  clear(): void {
    this.stack = [];
  }

  private enforceSizeLimit(): void {
    if (this.limit !== null && this.stack.length > this.limit) {
      this.stack.splice(0, this.stack.length - this.limit);
    }
  }
}
