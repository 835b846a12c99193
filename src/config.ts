/**
 * Project configuration (`deadwood.config.json`), validated with zod.
 */

import * as fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { InputError, describeError } from './errors.js';
import { createLogger } from './logger.js';
import { DEFAULT_ENTRY_POINT_PATTERNS } from './orphan-report.js';
import { DEFAULT_TODO_PATTERNS } from './todo-finder.js';

const log = createLogger('config');

export const CONFIG_FILE_NAME = 'deadwood.config.json';

export const ConfigSchema = z
  .object({
    ignorePatterns: z.array(z.string().min(1)).default([]),
    entryPointPatterns: z.array(z.string().min(1)).optional(),
    outputFormat: z.enum(['text', 'json']).default('text'),
    todoPatterns: z.array(z.string().regex(/^\w+$/, 'markers must be word characters')).optional(),
  })
  .strict();

export type DeadwoodConfig = z.infer<typeof ConfigSchema>;

export function defaultConfig(): DeadwoodConfig {
  return {
    ignorePatterns: [],
    entryPointPatterns: [...DEFAULT_ENTRY_POINT_PATTERNS],
    outputFormat: 'text',
    todoPatterns: [...DEFAULT_TODO_PATTERNS],
  };
}

export function parseConfig(raw: unknown, source: string): DeadwoodConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InputError(`Invalid config in ${source}: ${issues}`, source);
  }
  return result.data;
}

/**
 * Load the config for `root`. An explicit path must exist; the implicit
 * `deadwood.config.json` beside the scanned tree is optional.
 */
export async function loadConfig(root: string, explicitPath?: string): Promise<DeadwoodConfig> {
  const configPath = explicitPath ? path.resolve(explicitPath) : path.join(root, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (explicitPath) {
      throw new InputError(`Config file not found: ${configPath}`, configPath);
    }
    log.debug('No config file, using defaults', { configPath, reason: describeError(error) });
    return parseConfig({}, configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new InputError(`Config file is not valid JSON: ${configPath} (${describeError(error)})`, configPath);
  }

  log.debug('Loaded config', { configPath });
  return parseConfig(raw, configPath);
}

export async function writeDefaultConfig(root: string, force = false): Promise<string> {
  const configPath = path.join(root, CONFIG_FILE_NAME);

  if (!force) {
    try {
      await fs.access(configPath);
      throw new InputError(`${CONFIG_FILE_NAME} already exists. Use --force to overwrite.`, configPath);
    } catch (error) {
      if (error instanceof InputError) throw error;
    }
  }

  await fs.writeFile(configPath, JSON.stringify(defaultConfig(), null, 2) + '\n');
  return configPath;
}
