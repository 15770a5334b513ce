import { Command } from 'commander';
import chalk from 'chalk';
import type { ShellContext } from '../context.js';
import * as out from '../output.js';

const MENU_ENTRIES: ReadonlyArray<readonly [string, string]> = [
  ['1. add <description>', 'Add a task'],
  ['2. list', 'List tasks'],
  ['3. complete <id>', 'Mark a task as completed'],
  ['4. remove <id>', 'Remove a task'],
  ['5. undo', 'Undo the last action'],
  ['   history', 'Show undo history'],
  ['0. exit', 'Quit'],
];

export function printMenu(): void {
  console.log(chalk.bold('--- Task Manager ---'));
  for (const [usage, description] of MENU_ENTRIES) {
    console.log(`${usage.padEnd(22)}${chalk.dim(description)}`);
  }
}

export function createMenuCommand(): Command {
  return new Command('menu')
    .description('Show the menu')
    .action(() => printMenu());
}

export function createExitCommand(ctx: ShellContext): Command {
  return new Command('exit')
    .aliases(['0', 'quit'])
    .description('Leave the task manager')
    .action(() => {
      out.info('Goodbye!');
      ctx.close();
    });
}
