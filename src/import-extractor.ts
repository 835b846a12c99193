// ── Import Extractor ──
// Static, lexical import scanning. One extractor per language family,
// picked by file extension. Dynamic `import(...)` and computed `require`
// calls are never matched.

import type { Language } from './types.js';

export interface ImportExtractor {
  language: Language;
  extract(source: string): Iterable<string>;
}

// `import x from 'y'`, `import 'y'`, `export { x } from 'y'`, `import type ...`
const JS_STATIC_RE = /(?:^|[;}])[ \t]*(?:import|export)\s+(?:[^'"`;]*?\s+from\s+)?['"]([^'"\n]+)['"]/gm;
const JS_REQUIRE_RE = /\brequire\s*\(\s*['"]([^'"\n]+)['"]\s*\)/g;

const PY_IMPORT_RE = /^\s*import\s+(.+)$/;
const PY_FROM_RE = /^\s*from\s+(\.+[\w.]*|[\w.]+)\s+import\s+(.+)$/;

function* unique(specifiers: Iterable<string>): Generator<string> {
  const seen = new Set<string>();
  for (const spec of specifiers) {
    if (!spec || seen.has(spec)) continue;
    seen.add(spec);
    yield spec;
  }
}

function* scanJavaScript(source: string): Generator<string> {
  for (const match of source.matchAll(JS_STATIC_RE)) {
    if (match[1]) yield match[1].trim();
  }
  for (const match of source.matchAll(JS_REQUIRE_RE)) {
    if (match[1]) yield match[1].trim();
  }
}

function importedNames(clause: string): string[] {
  const cleaned = clause.split('#')[0]?.replace(/[()\\]/g, ' ') ?? '';
  return cleaned
    .split(',')
    .map(part => part.trim().split(/\s+/)[0] ?? '')
    .filter(name => /^\w+$/.test(name));
}

function* scanPython(source: string): Generator<string> {
  for (const line of source.split(/\r?\n/)) {
    const from = PY_FROM_RE.exec(line);
    if (from) {
      const module = from[1] ?? '';
      yield module;
      // an imported name may itself be a submodule: `from pkg import mod`
      const sep = /^\.+$/.test(module) ? '' : '.';
      for (const name of importedNames(from[2] ?? '')) yield `${module}${sep}${name}`;
      continue;
    }

    const plain = PY_IMPORT_RE.exec(line);
    if (plain) {
      for (const name of (plain[1] ?? '').split('#')[0]?.split(',') ?? []) {
        const module = name.trim().split(/\s+/)[0];
        if (module && /^[\w.]+$/.test(module)) yield module;
      }
    }
  }
}

const javascript: ImportExtractor = {
  language: 'javascript',
  extract: source => unique(scanJavaScript(source)),
};

const python: ImportExtractor = {
  language: 'python',
  extract: source => unique(scanPython(source)),
};

const EXTRACTORS = new Map<string, ImportExtractor>([
  ['.js', javascript],
  ['.jsx', javascript],
  ['.ts', javascript],
  ['.tsx', javascript],
  ['.mjs', javascript],
  ['.cjs', javascript],
  ['.mts', javascript],
  ['.cts', javascript],
  ['.py', python],
]);

export const SOURCE_EXTENSIONS: readonly string[] = [...EXTRACTORS.keys()];

export function extractorFor(extension: string): ImportExtractor | undefined {
  return EXTRACTORS.get(extension.toLowerCase());
}

export function extractImports(extension: string, source: string): string[] {
  const extractor = extractorFor(extension);
  return extractor ? [...extractor.extract(source)] : [];
}
