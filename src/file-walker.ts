import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import fg from 'fast-glob';
import { FileReadError, InputError } from './errors.js';
import { createLogger } from './logger.js';
import type { IndexedFile, ReadResult, SourceFile } from './types.js';

const log = createLogger('file-walker');

export const SKIP_DIRS = [
  'node_modules', 'vendor', 'venv', '.venv', '__pycache__', '.git',
  'dist', 'build', '.next', 'target', 'bin', 'obj', 'coverage',
  'test', 'tests',
];

const READ_BATCH_SIZE = 32;

export interface WalkOptions {
  extensions: readonly string[];
  ignorePatterns?: readonly string[];
  /** Directory names pruned at any depth; defaults to `SKIP_DIRS`. */
  skipDirs?: readonly string[];
}

export function comparePaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function normalizePath(value: string): string {
  return value.replace(/\\/g, '/').replace(/^\.\/+/, '').replace(/\/+/g, '/');
}

/**
 * Expand a user ignore pattern into fast-glob ignore globs. A bare name
 * matches at any depth; a pattern containing `/` is anchored at the root.
 */
export function toIgnoreGlobs(pattern: string): string[] {
  const trimmed = normalizePath(pattern.trim()).replace(/\/+$/, '');
  if (!trimmed) return [];
  if (!trimmed.includes('/')) return [`**/${trimmed}`, `**/${trimmed}/**`];
  return [trimmed, `${trimmed}/**`];
}

export async function assertDirectory(root: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.stat(root);
  } catch {
    throw new InputError(`Directory not found: ${root}`, root);
  }
  if (!stats.isDirectory()) {
    throw new InputError(`Not a directory: ${root}`, root);
  }
}

export async function indexFiles(root: string, options: WalkOptions): Promise<IndexedFile[]> {
  const ignore = [...(options.skipDirs ?? SKIP_DIRS), ...(options.ignorePatterns ?? [])].flatMap(toIgnoreGlobs);
  const patterns = options.extensions.map(ext => `**/*${ext}`);

  const entries = await fg(patterns, {
    cwd: root,
    ignore,
    dot: false,
    onlyFiles: true,
    unique: true,
    followSymbolicLinks: false,
    suppressErrors: true,
  });

  const paths = [...new Set(entries.map(normalizePath))].sort();
  log.debug('Indexed files', { root, count: paths.length });

  return paths.map(relPath => ({
    path: relPath,
    absolutePath: path.join(root, relPath),
    extension: path.posix.extname(relPath).toLowerCase(),
  }));
}

export async function readSources(files: IndexedFile[]): Promise<ReadResult> {
  const out: SourceFile[] = [];
  const skipped: ReadResult['skipped'] = [];

  for (let i = 0; i < files.length; i += READ_BATCH_SIZE) {
    const batch = files.slice(i, i + READ_BATCH_SIZE);
    const contents = await Promise.all(batch.map(async file => {
      try {
        return await fs.readFile(file.absolutePath, 'utf-8');
      } catch (error) {
        const failure = new FileReadError(file.path, error);
        log.warn('Skipping unreadable file', { path: failure.filePath }, failure);
        skipped.push({ path: failure.filePath, reason: failure.reason });
        return null;
      }
    }));

    batch.forEach((file, idx) => {
      out.push({ ...file, content: contents[idx] ?? null });
    });
  }

  skipped.sort((a, b) => comparePaths(a.path, b.path));
  return { files: out, skipped };
}
