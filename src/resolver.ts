import path from 'path';
import type { Language } from './types.js';

const JS_EXTENSIONS = ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs', '.mts', '.cts'];
const INDEX_FILES = JS_EXTENSIONS.map(ext => `/index${ext}`);

// ESM sources written in TypeScript import `./a.js` for `./a.ts`
const TS_TWINS: Record<string, string[]> = {
  '.js': ['.ts', '.tsx'],
  '.jsx': ['.tsx'],
  '.mjs': ['.mts'],
  '.cjs': ['.cts'],
};

export interface KnownFiles {
  paths: ReadonlySet<string>;
  sorted: readonly string[];
}

export function createKnownFiles(paths: Iterable<string>): KnownFiles {
  const set = new Set(paths);
  return { paths: set, sorted: [...set].sort() };
}

function joinWithin(baseDir: string, relative: string): string | null {
  const joined = path.posix.normalize(path.posix.join(baseDir, relative));
  if (joined === '..' || joined.startsWith('../') || path.posix.isAbsolute(joined)) return null;
  return joined.replace(/\/+$/, '') || '.';
}

function resolveToKnownFile(candidate: string, known: KnownFiles): string | null {
  if (known.paths.has(candidate)) return candidate;

  for (const ext of JS_EXTENSIONS) {
    if (known.paths.has(candidate + ext)) return candidate + ext;
  }
  for (const idx of INDEX_FILES) {
    const withIndex = candidate === '.' ? idx.slice(1) : candidate + idx;
    if (known.paths.has(withIndex)) return withIndex;
  }

  const ext = path.posix.extname(candidate);
  const twins = TS_TWINS[ext];
  if (twins) {
    const stem = candidate.slice(0, -ext.length);
    for (const twin of twins) {
      if (known.paths.has(stem + twin)) return stem + twin;
    }
  }

  return null;
}

function resolveJavaScript(specifier: string, importer: string, known: KnownFiles): string | null {
  if (!specifier.startsWith('./') && !specifier.startsWith('../') && specifier !== '.' && specifier !== '..') {
    return null;
  }
  const target = joinWithin(path.posix.dirname(importer), specifier);
  return target ? resolveToKnownFile(target, known) : null;
}

function probePython(modulePath: string, known: KnownFiles): string | null {
  for (const candidate of [`${modulePath}.py`, `${modulePath}/__init__.py`]) {
    if (known.paths.has(candidate)) return candidate;
  }
  return null;
}

function resolvePython(specifier: string, importer: string, known: KnownFiles): string | null {
  const dots = /^\.*/.exec(specifier)?.[0].length ?? 0;
  const rest = specifier.slice(dots).replace(/\./g, '/');

  if (dots > 0) {
    let baseDir = path.posix.dirname(importer);
    for (let i = 1; i < dots; i++) {
      if (baseDir === '.') return null;
      baseDir = path.posix.dirname(baseDir);
    }
    if (!rest) {
      const init = baseDir === '.' ? '__init__.py' : `${baseDir}/__init__.py`;
      return known.paths.has(init) ? init : null;
    }
    const target = joinWithin(baseDir, rest);
    return target ? probePython(target, known) : null;
  }

  if (!rest) return null;

  // Absolute module: any indexed file whose path ends with the module path
  const suffixes = [`${rest}.py`, `${rest}/__init__.py`];
  for (const file of known.sorted) {
    for (const suffix of suffixes) {
      if (file === suffix || file.endsWith(`/${suffix}`)) return file;
    }
  }
  return null;
}

/**
 * Map a raw specifier found in `importer` to an indexed file, or `null`
 * when it points outside the scanned tree (packages, aliases, missing files).
 */
export function resolveImport(
  specifier: string,
  importer: string,
  language: Language,
  known: KnownFiles,
): string | null {
  const spec = specifier.trim();
  if (!spec) return null;

  if (language === 'python') return resolvePython(spec, importer, known);
  return resolveJavaScript(spec, importer, known);
}
