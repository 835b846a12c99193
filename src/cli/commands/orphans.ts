/**
 * Orphans command - Find source files nothing imports
 */

import { Command, Option } from 'commander';
import path from 'path';
import { loadConfig } from '../../config.js';
import { InputError } from '../../errors.js';
import { renderOrphanText, toOrphanJson } from '../../orphan-report.js';
import type { TextStyle } from '../../orphan-report.js';
import { scanForOrphans } from '../../scanner.js';
import { OUTPUT_FORMATS, applyVerbosity, isOutputFormat, splitList } from '../options.js';
import type { CommandResult, VerbosityOptions } from '../options.js';

export interface OrphansCommandOptions extends VerbosityOptions {
  format?: string;
  ignore?: string;
  entry?: string;
  config?: string;
}

export async function runOrphans(
  directory: string,
  options: OrphansCommandOptions,
  style?: TextStyle,
): Promise<CommandResult> {
  applyVerbosity(options);
  const root = path.resolve(directory);

  try {
    const config = await loadConfig(root, options.config);
    const format = isOutputFormat(options.format) ? options.format : config.outputFormat;
    const entry = splitList(options.entry);

    const report = await scanForOrphans(root, {
      ignorePatterns: [...config.ignorePatterns, ...splitList(options.ignore)],
      entryPointPatterns: entry.length > 0 ? entry : config.entryPointPatterns,
    });

    const stdout = format === 'json'
      ? JSON.stringify(toOrphanJson(report), null, 2)
      : renderOrphanText(report, style);
    return { exitCode: 0, stdout, stderr: '' };
  } catch (error) {
    if (error instanceof InputError) {
      return { exitCode: 1, stdout: '', stderr: `Error: ${error.message}` };
    }
    throw error;
  }
}

export const orphansCommand = new Command('orphans')
  .description('Find source files with no inbound imports')
  .argument('[directory]', 'Directory to scan', '.')
  .addOption(new Option('-f, --format <format>', 'Output format').choices([...OUTPUT_FORMATS]))
  .option('-i, --ignore <globs>', 'Comma-separated globs to ignore (added to the defaults)')
  .option('-e, --entry <globs>', 'Comma-separated entry-point filename globs (replace the defaults)')
  .option('-c, --config <file>', 'Path to a deadwood.config.json')
  .option('-v, --verbose', 'Verbose output')
  .option('-q, --quiet', 'Only log errors')
  .action(async (directory: string, options: OrphansCommandOptions) => {
    const chalk = (await import('chalk')).default;
    const ora = (await import('ora')).default;

    const silent = options.format === 'json' || !process.stderr.isTTY;
    const spinner = ora({ text: 'Building import graph...', isSilent: silent }).start();

    const result = await runOrphans(directory, options, {
      heading: text => chalk.cyan.bold(text),
      muted: text => chalk.gray(text),
      warn: text => chalk.yellow(text),
    });

    if (result.exitCode !== 0) {
      spinner.fail(chalk.red(result.stderr));
      if (silent) console.error(chalk.red(result.stderr));
      process.exit(result.exitCode);
    }

    spinner.stop();
    console.log(result.stdout);
  });
