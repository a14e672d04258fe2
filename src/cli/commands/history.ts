/**
 * CLI command: pulse history
 *
 * Lists the recorded runs of a project within one session.
 */

import { Command } from 'commander';
import path from 'node:path';
import { loadConfig, HISTORY_DOMAIN, type LoadConfigOptions } from '../../config/index.js';
import { FileHistorySink } from '../../history/file-sink.js';
import { createIsolation } from '../../history/isolation.js';
import { printError, printHeader, printInfo, printTable } from '../output.js';
import { describeFailure, parseIntegerOption, resolveSessionId } from './common.js';

export interface HistoryCommandOptions {
  sessionId?: string;
  projectId?: string;
  limit?: number;
  json?: boolean;
}

/**
 * Print the history of a project, newest run first.
 *
 * @returns The process exit code.
 */
export async function runHistoryCommand(
  projectDir: string,
  options: HistoryCommandOptions = {},
  configOptions: LoadConfigOptions = {}
): Promise<number> {
  const root = path.resolve(projectDir);
  const config = await loadConfig(root, configOptions);
  const env = configOptions.env ?? process.env;

  try {
    const isolation = createIsolation(resolveSessionId(options.sessionId, env) ?? '', HISTORY_DOMAIN);
    const sink = new FileHistorySink(path.resolve(root, config.history.dir));
    const records = await sink.history({
      projectIdentifier: options.projectId ?? root,
      isolation,
      limit: options.limit ?? config.history.limit,
    });

    if (options.json) {
      console.log(JSON.stringify(records, null, 2));
      return 0;
    }

    printHeader(`History for ${options.projectId ?? root}`);
    if (records.length === 0) {
      printInfo(`No runs recorded in session ${isolation.sessionId}`);
      return 0;
    }
    printTable(
      ['Timestamp', 'Score', 'Issues', 'High', 'Rules'],
      records.map((record) => [
        record.timestamp,
        String(record.healthScore),
        String(record.summary.issuesFound),
        String(record.summary.highSeverityCount),
        record.rulesetVersion ?? '-',
      ])
    );
    return 0;
  } catch (error) {
    printError(describeFailure(error));
    return 1;
  }
}

/**
 * Create the `pulse history` CLI command.
 *
 * @returns Commander command instance.
 */
export function createHistoryCommand(): Command {
  return new Command('history')
    .description('Show recorded analysis runs for a project')
    .argument('[directory]', 'Project directory', '.')
    .option('--session-id <id>', 'Session id (default: $PULSE_SESSION_ID)')
    .option('--project-id <id>', 'Project identifier (default: absolute path)')
    .option('-n, --limit <n>', 'Number of runs to show', parseIntegerOption)
    .option('--json', 'Output as JSON')
    .action(async (directory: string, opts: HistoryCommandOptions) => {
      process.exitCode = await runHistoryCommand(directory, opts);
    });
}
