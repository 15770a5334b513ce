import { Command } from 'commander';
import type { ShellContext } from '../context.js';
import * as out from '../output.js';
import { normalizeDescription, $try } from '../helpers.js';

export function createAddCommand(ctx: ShellContext): Command {
  return new Command('add')
    .alias('1')
    .description('Add a new task')
    .argument('[description...]', 'Task description')
    .helpOption(false)
    .allowUnknownOption()
    .action((words: string[]) => $try(() => {
      const description = normalizeDescription(words);
      if (description == null) {
        out.error('Task description cannot be empty');
        return;
      }
      const taskId = ctx.manager.addTask(description);
      out.success(`Task '${description}' (ID: ${taskId}) added`);
    }));
}
