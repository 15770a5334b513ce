export type { TaskId, Task } from './task.js';
export type { CompleteResult, RemoveResult, UndoResult } from './results.js';
