import * as fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { SourceFile } from '../types.js';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'deadwood-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content);
  }
}

/** In-memory source file, as readSources would hand it over. */
export function source(filePath: string, content: string | null): SourceFile {
  return {
    path: filePath,
    absolutePath: `/virtual/${filePath}`,
    extension: path.posix.extname(filePath),
    content,
  };
}
