/**
 * Rules command
 * Inspect and validate rule documents
 */

import { Command } from 'commander';
import type { Rule, RuleLoadResult } from '../../types/rules.js';
import { DEFAULT_RULES_PATH, loadDefaultRuleSet, loadRuleSetFile } from '../../analysis/rule-loader.js';
import { printError, printHeader, printInfo, printLoadWarnings, printSuccess, printTable } from '../output.js';
import { describeFailure } from './common.js';

export interface RulesListOptions {
  json?: boolean;
}

export interface RulesValidateOptions {
  strict?: boolean;
}

async function loadRules(rulesPath: string | undefined): Promise<RuleLoadResult> {
  return rulesPath ? loadRuleSetFile(rulesPath) : loadDefaultRuleSet();
}

/**
 * Table row for one rule
 */
export function describeRule(rule: Rule): string[] {
  return [rule.id, rule.kind, rule.category, rule.severity, rule.confidence, rule.targets.join(', ')];
}

/**
 * List the rules a document defines.
 *
 * @returns The process exit code.
 */
export async function runRulesListCommand(
  rulesPath: string | undefined,
  options: RulesListOptions = {}
): Promise<number> {
  try {
    const result = await loadRules(rulesPath);

    if (options.json) {
      console.log(JSON.stringify(result.rules, null, 2));
      return 0;
    }

    printHeader(`Rules (${rulesPath ?? DEFAULT_RULES_PATH})`);
    if (result.version) printInfo(`Rule set version ${result.version}`);
    printTable(
      ['ID', 'Kind', 'Category', 'Severity', 'Confidence', 'Targets'],
      result.rules.map(describeRule)
    );
    printLoadWarnings(result.warnings);
    return 0;
  } catch (error) {
    printError(describeFailure(error));
    return 1;
  }
}

/**
 * Validate a rule document. Rejected entries fail the run only in strict mode.
 *
 * @returns The process exit code.
 */
export async function runRulesValidateCommand(
  rulesPath: string | undefined,
  options: RulesValidateOptions = {}
): Promise<number> {
  try {
    const result = await loadRules(rulesPath);
    printLoadWarnings(result.warnings);

    if (result.warnings.length > 0 && options.strict) {
      printError(`${result.warnings.length} rule(s) rejected`);
      return 1;
    }

    printSuccess(`${result.rules.length} rule(s) loaded, ${result.warnings.length} rejected`);
    return 0;
  } catch (error) {
    printError(describeFailure(error));
    return 1;
  }
}

/**
 * Create the rules command
 */
export function createRulesCommand(): Command {
  const rules = new Command('rules').description('Inspect and validate rule documents');

  rules
    .command('list')
    .description('List the rules in a document (default: bundled rules)')
    .argument('[path]', 'Rule document (YAML or JSON)')
    .option('--json', 'Output as JSON')
    .action(async (rulesPath: string | undefined, opts: RulesListOptions) => {
      process.exitCode = await runRulesListCommand(rulesPath, opts);
    });

  rules
    .command('validate')
    .description('Check a rule document and report rejected entries')
    .argument('[path]', 'Rule document (YAML or JSON)')
    .option('--strict', 'Exit with status 1 when any entry is rejected')
    .action(async (rulesPath: string | undefined, opts: RulesValidateOptions) => {
      process.exitCode = await runRulesValidateCommand(rulesPath, opts);
    });

  return rules;
}
