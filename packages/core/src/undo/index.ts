export { ActionHistory } from './action-history.js';
export type { ActionHistoryOptions } from './action-history.js';
export { undoAction } from './undo-executor.js';
export { getActionDescription } from './actions.js';
export type {
  Action,
  AddedAction,
  CompletedAction,
  RemovedAction,
} from './actions.js';
