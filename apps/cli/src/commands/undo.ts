import { Command } from 'commander';
import chalk from 'chalk';
import { getActionDescription } from '@taskstack/core';
import type { ShellContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

const HISTORY_SHOWN = 10;

export function createUndoCommand(ctx: ShellContext): Command {
  return new Command('undo')
    .alias('5')
    .description('Undo the last action')
    .action(() => $try(() => {
      const result = ctx.manager.undo();
      if (result.type !== 'nothing-to-undo') {
        out.debug(`consumed ${getActionDescription(result.action)}`);
      }
      out.printUndoResult(result);
    }));
}

export function createHistoryCommand(ctx: ShellContext): Command {
  return new Command('history')
    .description('Show undo history')
    .option('-c, --clear', 'Clear all undo history')
    .action((opts: { clear?: boolean }) => $try(() => {
      if (opts.clear) {
        ctx.manager.clearHistory();
        out.success('Undo history cleared');
        return;
      }

      const history = ctx.manager.history;
      if (history.length === 0) {
        out.info('No history');
        return;
      }

      console.log(`${chalk.bold('Undo stack')} ${chalk.dim(`(${history.length} actions)`)}`);
      for (const action of history.slice(0, HISTORY_SHOWN)) {
        console.log(`  ${getActionDescription(action)}`);
      }
      if (history.length > HISTORY_SHOWN) {
        console.log(chalk.dim(`  ... and ${history.length - HISTORY_SHOWN} more`));
      }
    }));
}
