import { Command } from 'commander';
import type { ShellContext } from '../context.js';
import * as out from '../output.js';
import { parseTaskId, $try } from '../helpers.js';

export function createCompleteCommand(ctx: ShellContext): Command {
  return new Command('complete')
    .aliases(['3', 'done'])
    .description('Mark a task as completed')
    .argument('<taskId>', 'The id of the task to complete', parseTaskId)
    .allowExcessArguments(false)
    .action((taskId: number) => $try(() => {
      out.printCompleteResult(ctx.manager.completeTask(taskId));
    }));
}
