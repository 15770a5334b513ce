/**
 * Interactive session: each input line is parsed by a fresh commander
 * program and dispatched to the matching command.
 */

import type { Interface } from 'node:readline';
import { Command, CommanderError } from 'commander';
import type { TaskManager } from '@taskstack/core';
import type { ShellContext } from './context.js';
import * as out from './output.js';
import { splitArgs } from './helpers.js';
import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createCompleteCommand } from './commands/complete.js';
import { createRemoveCommand } from './commands/remove.js';
import { createUndoCommand, createHistoryCommand } from './commands/undo.js';
import { createMenuCommand, createExitCommand, printMenu } from './commands/menu.js';

export const PROMPT = 'taskstack> ';

/** Build the per-line command program. Parse errors throw instead of exiting. */
export function createShellProgram(ctx: ShellContext): Command {
  const output = {
    writeOut: (str: string) => out.info(str.trimEnd()),
    writeErr: (str: string) => out.error(str.trimEnd()),
  };
  const program = new Command()
    .name('taskstack')
    .exitOverride()
    .configureOutput(output);

  program.addCommand(createAddCommand(ctx));
  program.addCommand(createListCommand(ctx));
  program.addCommand(createCompleteCommand(ctx));
  program.addCommand(createRemoveCommand(ctx));
  program.addCommand(createUndoCommand(ctx));
  program.addCommand(createHistoryCommand(ctx));
  program.addCommand(createMenuCommand());
  program.addCommand(createExitCommand(ctx));

  // addCommand does not pass exitOverride/output settings down. Set them
  // directly so each command keeps its own help option.
  for (const sub of program.commands) {
    sub.exitOverride().configureOutput(output);
  }
  return program;
}

export class TaskShell {
  private closed = false;
  private readonly ctx: ShellContext;

  constructor(manager: TaskManager) {
    this.ctx = {
      manager,
      close: () => { this.closed = true; },
    };
  }

  get isClosed(): boolean { return this.closed; }

  /** Handle one line of input. Returns false once the session has ended. */
  execute(line: string): boolean {
    const args = splitArgs(line);
    if (args.length === 0 || this.closed) return !this.closed;

    try {
      createShellProgram(this.ctx).parse(args, { from: 'user' });
    } catch (err: unknown) {
      // Commander has already printed its own message
      if (!(err instanceof CommanderError)) {
        out.error(err instanceof Error ? err.message : String(err));
      }
    }
    return !this.closed;
  }
}

/** Drive a shell from a readline interface until `exit` or end of input. Leaving the loop closes the interface. */
export async function runShell(shell: TaskShell, rl: Interface): Promise<void> {
  printMenu();
  rl.setPrompt(PROMPT);
  rl.prompt();

  for await (const line of rl) {
    if (!shell.execute(line)) break;
    rl.prompt();
  }

  if (!shell.isClosed) out.info('Goodbye!');
}
