import type { TaskManager } from '@taskstack/core';

/** What each shell command needs: the core facade and a way to end the session */
export interface ShellContext {
  readonly manager: TaskManager;
  close(): void;
}
