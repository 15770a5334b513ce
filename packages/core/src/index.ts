// Types
export type { TaskId, Task } from './types/task.js';
export type { CompleteResult, RemoveResult, UndoResult } from './types/results.js';

// Store
export { TaskStore } from './store/task-store.js';

// Undo
export { ActionHistory, undoAction, getActionDescription } from './undo/index.js';
export type { Action, AddedAction, CompletedAction, RemovedAction, ActionHistoryOptions } from './undo/index.js';

// Facade
export { TaskManager } from './task-manager.js';
export type { TaskManagerOptions } from './task-manager.js';
