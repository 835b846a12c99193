// ── TODO Finder ──
// Line scan for TODO-style markers over the same file index the orphan
// scan uses, with a wider extension set.

import { assertDirectory, comparePaths, indexFiles, readSources } from './file-walker.js';
import { SOURCE_EXTENSIONS } from './import-extractor.js';
import { createLogger } from './logger.js';
import type { TodoItem, TodoOptions, TodoReport } from './types.js';

const log = createLogger('todo-finder');

export const DEFAULT_TODO_PATTERNS = ['TODO', 'FIXME', 'HACK', 'XXX', 'BUG', 'OPTIMIZE'];

export const TODO_EXTENSIONS: readonly string[] = [
  ...SOURCE_EXTENSIONS,
  '.go', '.java', '.c', '.cpp', '.h', '.hpp', '.cs', '.rb', '.rs', '.php',
  '.swift', '.kt', '.scala', '.sh', '.yaml', '.yml', '.sql', '.vue', '.svelte',
];

// Test directories hold TODOs too, so only dependency and build output is pruned
export const TODO_SKIP_DIRS: readonly string[] = [
  'node_modules', 'vendor', 'venv', '.venv', '__pycache__', '.git',
  'dist', 'build', '.next', 'target', 'bin', 'obj',
];

const MAX_TEXT_LENGTH = 200;
const TRAILING_CLOSER_RE = /\s*(\*\/|-->|'''|""")?\s*$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function buildMarkerRegExp(patterns: readonly string[]): RegExp {
  const alternatives = patterns.map(p => escapeRegExp(p.trim())).filter(Boolean);
  return new RegExp(`\\b(${alternatives.join('|')})\\b[:\\s]*(.*)$`, 'i');
}

export function scanTodosInText(file: string, content: string, markerRe: RegExp): TodoItem[] {
  const todos: TodoItem[] = [];

  content.split(/\r?\n/).forEach((line, idx) => {
    const match = markerRe.exec(line);
    if (!match) return;

    const text = (match[2] ?? '').trim().replace(TRAILING_CLOSER_RE, '');
    todos.push({
      file,
      line: idx + 1,
      marker: (match[1] ?? '').toUpperCase(),
      text: text.slice(0, MAX_TEXT_LENGTH),
    });
  });

  return todos;
}

export async function findTodos(root: string, options: TodoOptions = {}): Promise<TodoReport> {
  await assertDirectory(root);

  const patterns = options.patterns && options.patterns.length > 0 ? options.patterns : DEFAULT_TODO_PATTERNS;
  const markerRe = buildMarkerRegExp(patterns);

  const indexed = await indexFiles(root, {
    extensions: TODO_EXTENSIONS,
    ignorePatterns: options.ignorePatterns,
    skipDirs: TODO_SKIP_DIRS,
  });
  const { files, skipped } = await readSources(indexed);

  const todos = files
    .flatMap(f => (f.content === null ? [] : scanTodosInText(f.path, f.content, markerRe)))
    .sort((a, b) => comparePaths(a.file, b.file) || a.line - b.line);

  log.debug('TODO scan complete', { root, files: files.length, todos: todos.length });

  return { root, scannedFileCount: files.length, todos, skippedFiles: skipped };
}

export function renderTodoText(report: TodoReport): string {
  if (report.todos.length === 0) return 'No TODO comments found.';

  const byMarker = new Map<string, TodoItem[]>();
  for (const todo of report.todos) {
    const bucket = byMarker.get(todo.marker) ?? [];
    bucket.push(todo);
    byMarker.set(todo.marker, bucket);
  }

  const lines = [`Found ${report.todos.length} TODO comments`, '', '='.repeat(60)];
  for (const marker of [...byMarker.keys()].sort()) {
    const items = byMarker.get(marker) ?? [];
    lines.push('', `## ${marker} (${items.length})`, '');
    for (const todo of items) {
      lines.push(`  ${todo.file}:${todo.line}`, `    ${todo.text.slice(0, 80)}`);
    }
  }

  if (report.skippedFiles.length > 0) {
    lines.push('', `Warnings (${report.skippedFiles.length} files skipped):`);
    for (const skipped of report.skippedFiles) lines.push(`  [!] ${skipped.path}: ${skipped.reason}`);
  }

  return lines.join('\n');
}
