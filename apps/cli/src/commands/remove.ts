import { Command } from 'commander';
import type { ShellContext } from '../context.js';
import * as out from '../output.js';
import { parseTaskId, $try } from '../helpers.js';

export function createRemoveCommand(ctx: ShellContext): Command {
  return new Command('remove')
    .aliases(['4', 'rm'])
    .description('Remove a task')
    .argument('<taskId>', 'The id of the task to remove', parseTaskId)
    .allowExcessArguments(false)
    .action((taskId: number) => $try(() => {
      out.printRemoveResult(ctx.manager.removeTask(taskId));
    }));
}
