/**
 * Init command - Write a default deadwood.config.json
 */

import { Command } from 'commander';
import path from 'path';
import { writeDefaultConfig } from '../../config.js';
import { InputError } from '../../errors.js';
import { assertDirectory } from '../../file-walker.js';

export const initCommand = new Command('init')
  .description('Create deadwood.config.json with the default settings')
  .argument('[directory]', 'Project directory', '.')
  .option('-f, --force', 'Overwrite an existing configuration')
  .action(async (directory: string, options: { force?: boolean }) => {
    const chalk = (await import('chalk')).default;
    const root = path.resolve(directory);

    try {
      await assertDirectory(root);
      const configPath = await writeDefaultConfig(root, options.force ?? false);
      console.log(chalk.green(`✓ Wrote ${path.relative(process.cwd(), configPath) || configPath}`));
    } catch (error) {
      if (!(error instanceof InputError)) throw error;
      console.error(chalk.red(`Error: ${error.message}`));
      process.exit(1);
    }
  });
