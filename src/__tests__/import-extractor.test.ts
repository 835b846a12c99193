import { describe, it, expect } from 'vitest';
import { extractImports, extractorFor, SOURCE_EXTENSIONS } from '../import-extractor.js';

// ─────────────────────────────────────────
describe('import extractor — javascript family', () => {
  it('collects static import, export-from and require specifiers in order', () => {
    const code = [
      "import React from 'react';",
      "import { a, b } from './a';",
      'import type { T } from "./types";',
      "import './side-effect.css';",
      "export { helper } from '../lib/helper';",
      "export * from './all';",
      "const fs = require('fs');",
    ].join('\n');

    expect(extractImports('.ts', code)).toEqual([
      'react',
      './a',
      './types',
      './side-effect.css',
      '../lib/helper',
      './all',
      'fs',
    ]);
  });

  it('reads import clauses that span several lines', () => {
    const code = "import {\n  one,\n  two,\n} from './multi';\n";
    expect(extractImports('.tsx', code)).toEqual(['./multi']);
  });

  it('does not match dynamic import expressions', () => {
    const code = "const lazy = import('./lazy');\nconst name = './x';\nconst mod = require(name);\n";
    expect(extractImports('.js', code)).toEqual([]);
  });

  it('ignores exported declarations that carry string values', () => {
    const code = "export const label = 'hello';\nexport default function () { return 'x'; }\n";
    expect(extractImports('.ts', code)).toEqual([]);
  });

  it('yields a repeated specifier once', () => {
    const code = "import a from './x';\nimport b from './x';\nconst c = require('./x');\n";
    expect(extractImports('.mjs', code)).toEqual(['./x']);
  });

  it('handles several statements on one line', () => {
    const code = "import a from './a';import b from './b';";
    expect(extractImports('.js', code)).toEqual(['./a', './b']);
  });
});

// ─────────────────────────────────────────
describe('import extractor — python', () => {
  it('collects plain, dotted, relative and from-imports', () => {
    const code = [
      'import os',
      'import pkg.util as u, sys',
      'from . import sibling, other as o',
      'from .models import User',
      'from ..core.base import Base',
    ].join('\n');

    expect(extractImports('.py', code)).toEqual([
      'os',
      'pkg.util',
      'sys',
      '.',
      '.sibling',
      '.other',
      '.models',
      '.models.User',
      '..core.base',
      '..core.base.Base',
    ]);
  });

  it('skips star imports and trailing comments', () => {
    const code = 'from shapes import *  # everything\nimport json  # stdlib\n';
    expect(extractImports('.py', code)).toEqual(['shapes', 'json']);
  });
});

// ─────────────────────────────────────────
describe('extractor lookup', () => {
  it('selects the extractor by extension, case-insensitively', () => {
    expect(extractorFor('.TSX')?.language).toBe('javascript');
    expect(extractorFor('.py')?.language).toBe('python');
    expect(extractorFor('.go')).toBeUndefined();
  });

  it('returns nothing for unsupported extensions', () => {
    expect(extractImports('.go', 'import "fmt"')).toEqual([]);
  });

  it('lists every scanned source extension', () => {
    expect(SOURCE_EXTENSIONS).toEqual(['.js', '.jsx', '.ts', '.tsx', '.mjs', '.cjs', '.mts', '.cts', '.py']);
  });
});
