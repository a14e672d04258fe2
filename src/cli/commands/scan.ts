/**
 * CLI command: pulse scan
 *
 * Scans a project and writes the snapshot exchange document, so that
 * evaluation can run later or elsewhere.
 */

import { Command } from 'commander';
import path from 'node:path';
import { snapshotToJson } from '../../analysis/exchange.js';
import { scanProject } from '../../analysis/structure-scanner.js';
import { loadConfig, type LoadConfigOptions } from '../../config/index.js';
import { printError, printInfo, printKeyValue, printWarning } from '../output.js';
import { createRunLogger, describeFailure, parseIntegerOption, writeOutput } from './common.js';

export interface ScanCommandOptions {
  output?: string;
  timeout?: number;
  verbose?: boolean;
}

/**
 * Scan and emit the snapshot document.
 *
 * @returns The process exit code.
 */
export async function runScanCommand(
  projectDir: string,
  options: ScanCommandOptions = {},
  configOptions: LoadConfigOptions = {}
): Promise<number> {
  const root = path.resolve(projectDir);
  const config = await loadConfig(root, configOptions);
  const logger = createRunLogger(config, { verbose: options.verbose });

  try {
    const snapshot = await scanProject(root, {
      concurrency: config.scan.concurrency,
      timeoutMs: options.timeout ?? config.scan.timeout_ms,
      extraIgnores: config.scan.extra_ignores,
      logger,
    });

    for (const skip of snapshot.skipped) {
      printWarning(`Skipped ${skip.path}: ${skip.reason}`);
    }

    const written = await writeOutput(snapshotToJson(snapshot), options.output);
    if (written) {
      printInfo(`Snapshot written to ${written}`);
      printKeyValue('Files', snapshot.files.size);
      printKeyValue('Directories', snapshot.directories.size);
      printKeyValue('Project types', snapshot.projectTypes.join(', ') || 'unknown');
    }
    return 0;
  } catch (error) {
    printError(describeFailure(error));
    return 1;
  }
}

/**
 * Create the `pulse scan` CLI command.
 *
 * @returns Commander command instance.
 */
export function createScanCommand(): Command {
  return new Command('scan')
    .description('Scan a project and write its snapshot as JSON')
    .argument('[directory]', 'Project directory', '.')
    .option('-o, --output <file>', 'Write the snapshot to a file instead of stdout')
    .option('--timeout <ms>', 'Abort the scan after this many milliseconds', parseIntegerOption)
    .option('-v, --verbose', 'Print debug log entries')
    .action(async (directory: string, opts: ScanCommandOptions) => {
      process.exitCode = await runScanCommand(directory, opts);
    });
}
