/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import type { Task, CompleteResult, RemoveResult, UndoResult } from '@taskstack/core/types';

let verbose = false;

/** Enable or disable `debug` output */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatTask(task: Task): string {
  const description = task.completed ? chalk.dim(task.description) : chalk.bold(task.description);
  return `${chalk.dim(`ID: ${task.id}`)} | ${formatCheckbox(task.completed)} | ${description}`;
}

// --- Result output ---

export function printCompleteResult(result: CompleteResult): void {
  switch (result.type) {
    case 'success': success(`Task ${result.task.id} marked as completed`); break;
    case 'not-found': error(`Could not find task with id ${result.taskId}`); break;
    case 'already-completed': info(`Task ${result.taskId} is already completed`); break;
  }
}

export function printRemoveResult(result: RemoveResult): void {
  switch (result.type) {
    case 'success': success(`Task ${result.task.id} ('${result.task.description}') removed`); break;
    case 'not-found': error(`Could not find task with id ${result.taskId}`); break;
  }
}

export function printUndoResult(result: UndoResult): void {
  switch (result.type) {
    case 'success': success(`Undone: ${result.message}`); break;
    case 'nothing-to-undo': info('Nothing to undo'); break;
    case 'target-missing': warning(result.message); break;
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

export function debug(message: string): void {
  if (verbose) console.log(chalk.dim(`[debug] ${message}`));
}
