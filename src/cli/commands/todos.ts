/**
 * Todos command - List TODO-style comments
 */

import { Command, Option } from 'commander';
import path from 'path';
import { loadConfig } from '../../config.js';
import { InputError } from '../../errors.js';
import { findTodos, renderTodoText } from '../../todo-finder.js';
import { OUTPUT_FORMATS, applyVerbosity, isOutputFormat, splitList } from '../options.js';
import type { CommandResult, VerbosityOptions } from '../options.js';

export interface TodosCommandOptions extends VerbosityOptions {
  format?: string;
  patterns?: string;
  ignore?: string;
  config?: string;
}

export async function runTodos(directory: string, options: TodosCommandOptions): Promise<CommandResult> {
  applyVerbosity(options);
  const root = path.resolve(directory);

  try {
    const config = await loadConfig(root, options.config);
    const format = isOutputFormat(options.format) ? options.format : config.outputFormat;
    const patterns = splitList(options.patterns).map(p => p.toUpperCase());

    const report = await findTodos(root, {
      patterns: patterns.length > 0 ? patterns : config.todoPatterns,
      ignorePatterns: [...config.ignorePatterns, ...splitList(options.ignore)],
    });

    const stdout = format === 'json' ? JSON.stringify(report.todos, null, 2) : renderTodoText(report);
    return { exitCode: 0, stdout, stderr: '' };
  } catch (error) {
    if (error instanceof InputError) {
      return { exitCode: 1, stdout: '', stderr: `Error: ${error.message}` };
    }
    throw error;
  }
}

export const todosCommand = new Command('todos')
  .description('Find TODO, FIXME and similar markers in comments')
  .argument('[directory]', 'Directory to scan', '.')
  .addOption(new Option('-f, --format <format>', 'Output format').choices([...OUTPUT_FORMATS]))
  .option('-p, --patterns <markers>', 'Comma-separated markers (default: TODO,FIXME,HACK,XXX,BUG,OPTIMIZE)')
  .option('-i, --ignore <globs>', 'Comma-separated globs to ignore (added to the defaults)')
  .option('-c, --config <file>', 'Path to a deadwood.config.json')
  .option('-v, --verbose', 'Verbose output')
  .option('-q, --quiet', 'Only log errors')
  .action(async (directory: string, options: TodosCommandOptions) => {
    const chalk = (await import('chalk')).default;

    const result = await runTodos(directory, options);
    if (result.exitCode !== 0) {
      console.error(chalk.red(result.stderr));
      process.exit(result.exitCode);
    }

    console.log(result.stdout);
  });
