import { describe, it, expect } from 'vitest';
import { buildImportGraph } from '../graph-builder.js';
import {
  DEFAULT_ENTRY_POINT_PATTERNS,
  buildOrphanReport,
  classifyNodes,
  isEntryPoint,
  renderOrphanText,
  toOrphanJson,
} from '../orphan-report.js';
import { source } from './helpers.js';

const RULE = '-'.repeat(60);

function chainGraph() {
  return buildImportGraph([
    source('index.js', "import a from './a.js';\n"),
    source('a.js', "import b from './b.js';\n"),
    source('b.js', ''),
    source('orphan.js', ''),
  ]);
}

// ─────────────────────────────────────────
describe('entry point matching', () => {
  it('matches default patterns against the basename, ignoring case', () => {
    expect(isEntryPoint('src/index.ts', DEFAULT_ENTRY_POINT_PATTERNS)).toBe(true);
    expect(isEntryPoint('tools/Main.PY', DEFAULT_ENTRY_POINT_PATTERNS)).toBe(true);
    expect(isEntryPoint('vite.config.mts', DEFAULT_ENTRY_POINT_PATTERNS)).toBe(true);
    expect(isEntryPoint('manage.py', DEFAULT_ENTRY_POINT_PATTERNS)).toBe(true);
    expect(isEntryPoint('pkg/__init__.py', DEFAULT_ENTRY_POINT_PATTERNS)).toBe(true);
    expect(isEntryPoint('src/global.d.ts', DEFAULT_ENTRY_POINT_PATTERNS)).toBe(true);
  });

  it('does not match look-alike names', () => {
    expect(isEntryPoint('lib/indexer.ts', DEFAULT_ENTRY_POINT_PATTERNS)).toBe(false);
    expect(isEntryPoint('src/domain.ts', DEFAULT_ENTRY_POINT_PATTERNS)).toBe(false);
  });

  it('matches nothing with an empty pattern list', () => {
    expect(isEntryPoint('index.js', [])).toBe(false);
  });
});

// ─────────────────────────────────────────
describe('classifyNodes', () => {
  it('returns nodes sorted by path with in-degree and entry flag', () => {
    expect(classifyNodes(chainGraph(), DEFAULT_ENTRY_POINT_PATTERNS)).toEqual([
      { path: 'a.js', language: 'javascript', inDegree: 1, isEntryPoint: false },
      { path: 'b.js', language: 'javascript', inDegree: 1, isEntryPoint: false },
      { path: 'index.js', language: 'javascript', inDegree: 0, isEntryPoint: true },
      { path: 'orphan.js', language: 'javascript', inDegree: 0, isEntryPoint: false },
    ]);
  });
});

// ─────────────────────────────────────────
describe('buildOrphanReport', () => {
  it('separates entry points from true orphans', () => {
    const report = buildOrphanReport('/repo', chainGraph(), DEFAULT_ENTRY_POINT_PATTERNS);
    expect(report).toEqual({
      root: '/repo',
      status: 'ok',
      scannedFileCount: 4,
      edgesTotal: 2,
      orphans: ['orphan.js'],
      entryPointsExcluded: ['index.js'],
      isolatedCycles: [],
      skippedFiles: [],
    });
  });

  it('never reports members of a mutual import cycle as orphans', () => {
    const graph = buildImportGraph([
      source('a.js', "import './b.js';\n"),
      source('b.js', "import './a.js';\n"),
    ]);
    const report = buildOrphanReport('/repo', graph, DEFAULT_ENTRY_POINT_PATTERNS);
    expect(report.orphans).toEqual([]);
    expect(report.entryPointsExcluded).toEqual([]);
    expect(report.isolatedCycles).toEqual([['a.js', 'b.js']]);
  });

  it('flags a cluster of overlapping cycles that nothing outside imports', () => {
    const graph = buildImportGraph([
      source('index.js', ''),
      source('a.js', "import './b.js';\n"),
      source('b.js', "import './a.js';\nimport './c.js';\n"),
      source('c.js', "import './b.js';\n"),
    ]);
    const report = buildOrphanReport('/repo', graph, DEFAULT_ENTRY_POINT_PATTERNS);
    expect(report.orphans).toEqual([]);
    expect(report.isolatedCycles).toEqual([['a.js', 'b.js', 'c.js']]);
  });

  it('does not flag a cycle reached from outside', () => {
    const graph = buildImportGraph([
      source('index.js', "import './a.js';\n"),
      source('a.js', "import './b.js';\n"),
      source('b.js', "import './a.js';\n"),
    ]);
    expect(buildOrphanReport('/repo', graph, DEFAULT_ENTRY_POINT_PATTERNS).isolatedCycles).toEqual([]);
  });

  it('does not flag a cycle that contains an entry point', () => {
    const graph = buildImportGraph([
      source('index.js', "import './a.js';\n"),
      source('a.js', "import './index.js';\n"),
    ]);
    const report = buildOrphanReport('/repo', graph, DEFAULT_ENTRY_POINT_PATTERNS);
    expect(report.isolatedCycles).toEqual([]);
    expect(report.entryPointsExcluded).toEqual([]);
    expect(report.orphans).toEqual([]);
  });

  it('uses configured entry patterns instead of the defaults', () => {
    const graph = buildImportGraph([source('index.js', ''), source('jobs/sync.worker.ts', '')]);
    const report = buildOrphanReport('/repo', graph, ['*.worker.ts']);
    expect(report.entryPointsExcluded).toEqual(['jobs/sync.worker.ts']);
    expect(report.orphans).toEqual(['index.js']);
  });

  it('marks an empty scan distinctly from a clean one', () => {
    const report = buildOrphanReport('/repo', new Map(), DEFAULT_ENTRY_POINT_PATTERNS);
    expect(report.status).toBe('empty');
    expect(report.scannedFileCount).toBe(0);
  });
});

// ─────────────────────────────────────────
describe('renderers', () => {
  it('renders the text report', () => {
    const report = buildOrphanReport('/repo', chainGraph(), DEFAULT_ENTRY_POINT_PATTERNS);
    expect(renderOrphanText(report).split('\n')).toEqual([
      'Scanned 4 files (2 import edges).',
      'Found 1 potential orphan files.',
      RULE,
      '',
      'Likely Entry Points (Whitelisted):',
      '  [OK] index.js',
      '',
      'Potential True Orphans (No Inbound References):',
      '  [?] orphan.js',
      '',
      RULE,
      'Tip: Verify these files are truly unused before deleting.',
    ]);
  });

  it('renders isolated cycles and skipped files', () => {
    const graph = buildImportGraph([
      source('a.js', "import './b.js';\n"),
      source('b.js', "import './a.js';\n"),
    ]);
    const report = buildOrphanReport('/repo', graph, DEFAULT_ENTRY_POINT_PATTERNS, [
      { path: 'locked.js', reason: 'EACCES' },
    ]);
    expect(renderOrphanText(report).split('\n')).toEqual([
      'Scanned 2 files (2 import edges).',
      'Found 0 potential orphan files.',
      RULE,
      '',
      'Potential True Orphans (No Inbound References):',
      '  (None found)',
      '',
      'Isolated Import Cycles (Only Imported by Each Other):',
      '  [~] a.js, b.js',
      '',
      'Warnings (1 files skipped):',
      '  [!] locked.js: EACCES',
      '',
      RULE,
      'Tip: Verify these files are truly unused before deleting.',
    ]);
  });

  it('says nothing was scanned for an empty tree', () => {
    const report = buildOrphanReport('/repo', new Map(), DEFAULT_ENTRY_POINT_PATTERNS);
    expect(renderOrphanText(report)).toBe('No source files scanned under /repo.');
  });

  it('maps the report to the JSON document shape', () => {
    const report = buildOrphanReport('/repo', chainGraph(), DEFAULT_ENTRY_POINT_PATTERNS);
    expect(toOrphanJson(report)).toEqual({
      scanned_file_count: 4,
      orphans: ['orphan.js'],
      entry_points_excluded: ['index.js'],
      edges_total: 2,
      isolated_cycles: [],
      skipped_files: [],
      nothing_scanned: false,
    });
  });
});
