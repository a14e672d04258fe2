/**
 * Config command
 * Show the effective CLI configuration
 */

import { Command } from 'commander';
import path from 'node:path';
import { findConfigPath, getConfigValue, loadConfig, type LoadConfigOptions } from '../../config/index.js';
import { CONFIG_FILE_NAMES, DEFAULT_CONFIG } from '../../config/defaults.js';
import type { Config } from '../../config/schema.js';
import { printError, printHeader, printInfo, printKeyValue, printSection } from '../output.js';

export interface ConfigShowOptions {
  json?: boolean;
  cwd?: string;
}

/**
 * Print the merged configuration, or one dotted key of it.
 *
 * @returns The process exit code.
 */
export async function runConfigShowCommand(
  key: string | undefined,
  options: ConfigShowOptions = {},
  configOptions: LoadConfigOptions = {}
): Promise<number> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const config = await loadConfig(cwd, configOptions);

  if (key) {
    const value = getConfigValue(config, key);
    if (value === undefined) {
      printError(`Configuration key not found: ${key}`);
      return 1;
    }
    console.log(typeof value === 'object' && value !== null ? JSON.stringify(value, null, 2) : String(value));
    return 0;
  }

  if (options.json) {
    console.log(JSON.stringify(config, null, 2));
    return 0;
  }

  printHeader('Current Configuration');
  const configPath = await findConfigPath(cwd);
  if (configPath) {
    printInfo(`Config file: ${configPath}`);
  } else {
    printInfo(`Using defaults (no ${CONFIG_FILE_NAMES[0]} found)`);
  }
  console.log();
  printConfig(config);
  return 0;
}

/**
 * Print configuration grouped by section
 */
function printConfig(config: Config): void {
  for (const [name, section] of Object.entries(config)) {
    printSection(name);
    for (const [key, value] of Object.entries(section)) {
      printKeyValue(`  ${key}`, Array.isArray(value) ? value.join(', ') || '(none)' : String(value));
    }
    console.log();
  }
}

/**
 * Create the config command
 */
export function createConfigCommand(): Command {
  const config = new Command('config').description('Show CLI configuration');

  config
    .command('show')
    .description('Show the effective configuration, or one dotted key of it')
    .argument('[key]', 'Configuration key (e.g., thresholds.fail_below)')
    .option('--json', 'Output as JSON')
    .option('--cwd <dir>', 'Directory to resolve the project config from')
    .action(async (key: string | undefined, opts: ConfigShowOptions) => {
      process.exitCode = await runConfigShowCommand(key, opts);
    });

  config
    .command('defaults')
    .description('Show default configuration values')
    .option('--json', 'Output as JSON')
    .action((opts: { json?: boolean }) => {
      if (opts.json) {
        console.log(JSON.stringify(DEFAULT_CONFIG, null, 2));
        return;
      }
      printHeader('Default Configuration');
      printConfig(DEFAULT_CONFIG);
    });

  config
    .command('path')
    .description('Show the project configuration file path')
    .option('--cwd <dir>', 'Directory to search from')
    .action(async (opts: { cwd?: string }) => {
      const configPath = await findConfigPath(opts.cwd ? path.resolve(opts.cwd) : undefined);
      if (configPath) {
        console.log(configPath);
      } else {
        printInfo('No configuration file found');
        printInfo(`Create one at: ${CONFIG_FILE_NAMES.join(', ')}`);
      }
    });

  return config;
}
