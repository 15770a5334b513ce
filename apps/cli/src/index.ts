#!/usr/bin/env node

import { createInterface } from 'node:readline';
import { Command } from 'commander';
import { TaskManager, getActionDescription } from '@taskstack/core';
import type { CliOptions, ShellConfig } from './config.js';
import { resolveConfig } from './config.js';
import { TaskShell, runShell } from './shell.js';
import * as out from './output.js';

const program = new Command()
  .name('taskstack')
  .description('Interactive in-memory task manager with undo')
  .version('1.0.0')
  .option('--history-limit <n>', 'Maximum number of undoable actions to keep (default: unbounded)')
  .option('--verbose', 'Print history bookkeeping')
  .action(async (opts: CliOptions) => {
    let config: ShellConfig;
    try {
      config = resolveConfig(opts);
    } catch (err: unknown) {
      out.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
      return;
    }

    out.setVerbose(config.verbose);
    const manager = new TaskManager({
      historyLimit: config.historyLimit,
      onRecord: (action) => out.debug(`recorded ${getActionDescription(action)}`),
    });

    const rl = createInterface({
      input: process.stdin,
      output: process.stdout,
      terminal: process.stdin.isTTY,
    });
    await runShell(new TaskShell(manager), rl);
  });

await program.parseAsync();
