import { Command } from 'commander';
import chalk from 'chalk';
import type { ShellContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createListCommand(ctx: ShellContext): Command {
  return new Command('list')
    .aliases(['2', 'ls'])
    .description('List all tasks')
    .action(() => $try(() => {
      const tasks = ctx.manager.listTasks();
      if (tasks.length === 0) {
        out.info('No tasks yet. Use add to create one');
        return;
      }

      console.log(chalk.bold.underline('Tasks'));
      for (const task of tasks) {
        console.log(out.formatTask(task));
      }
    }));
}
