/**
 * Shell configuration: command-line options first, then environment.
 */

export interface CliOptions {
  historyLimit?: string;
  verbose?: boolean;
}

export interface ShellConfig {
  /** Maximum undo entries kept; undefined means unbounded */
  historyLimit: number | undefined;
  verbose: boolean;
}

function parseHistoryLimit(raw: string): number {
  const limit = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(limit) || limit < 1) {
    throw new Error(`Invalid history limit: ${raw} (expected a positive integer)`);
  }
  return limit;
}

function parseFlag(raw: string | undefined): boolean {
  if (raw == null) return false;
  return ['1', 'true', 'yes'].includes(raw.toLowerCase());
}

export function resolveConfig(opts: CliOptions, env: NodeJS.ProcessEnv = process.env): ShellConfig {
  const rawLimit = opts.historyLimit ?? env['TASKSTACK_HISTORY_LIMIT'];
  return {
    historyLimit: rawLimit ? parseHistoryLimit(rawLimit) : undefined,
    verbose: opts.verbose ?? parseFlag(env['TASKSTACK_VERBOSE']),
  };
}
