import path from 'path';
import micromatch from 'micromatch';
import { comparePaths } from './file-walker.js';
import { countEdges, findImportClusters } from './graph-builder.js';
import { extractorFor } from './import-extractor.js';
import type {
  FileNode,
  ImportGraph,
  OrphanReport,
  OrphanReportJson,
  SkippedFile,
} from './types.js';

// Files conventionally run directly rather than imported
export const DEFAULT_ENTRY_POINT_PATTERNS = [
  'index.{js,ts,jsx,tsx,mjs,cjs}',
  'main.{js,ts,py}',
  'server.{js,ts}',
  'app.{js,ts}',
  'cli.{js,ts,py}',
  'setup.py',
  'manage.py',
  '__main__.py',
  'vite.config.*',
  'webpack.config.*',
  'jest.config.*',
  'vitest.config.*',
  // loaded implicitly: package initialisers and ambient declarations
  '__init__.py',
  '*.d.ts',
];

const RULE = '-'.repeat(60);

export function isEntryPoint(filePath: string, patterns: readonly string[]): boolean {
  if (patterns.length === 0) return false;
  return micromatch.isMatch(path.posix.basename(filePath), [...patterns], { nocase: true, dot: true });
}

export function classifyNodes(graph: ImportGraph, entryPointPatterns: readonly string[]): FileNode[] {
  return [...graph.entries()]
    .map(([filePath, entry]) => ({
      path: filePath,
      language: extractorFor(path.posix.extname(filePath))?.language ?? null,
      inDegree: entry.importedBy.size,
      isEntryPoint: isEntryPoint(filePath, entryPointPatterns),
    }))
    .sort((a, b) => comparePaths(a.path, b.path));
}

/**
 * Import clusters (strongly connected components) whose members are only
 * imported from inside the cluster and that hold no entry point. Such files
 * are never orphans (in-degree >= 1) but nothing outside the cluster reaches
 * them. Overlapping cycles are reported as one cluster.
 */
export function findIsolatedCycles(graph: ImportGraph, nodes: FileNode[]): string[][] {
  const entryPoints = new Set(nodes.filter(n => n.isEntryPoint).map(n => n.path));

  return findImportClusters(graph).filter(cluster => {
    const members = new Set(cluster);
    if (cluster.some(file => entryPoints.has(file))) return false;
    return cluster.every(file => {
      const importers = graph.get(file)?.importedBy ?? new Set<string>();
      return [...importers].every(importer => members.has(importer));
    });
  });
}

export function buildOrphanReport(
  root: string,
  graph: ImportGraph,
  entryPointPatterns: readonly string[],
  skippedFiles: SkippedFile[] = [],
): OrphanReport {
  const nodes = classifyNodes(graph, entryPointPatterns);
  const unreferenced = nodes.filter(n => n.inDegree === 0);

  return {
    root,
    status: nodes.length === 0 ? 'empty' : 'ok',
    scannedFileCount: nodes.length,
    edgesTotal: countEdges(graph),
    orphans: unreferenced.filter(n => !n.isEntryPoint).map(n => n.path),
    entryPointsExcluded: unreferenced.filter(n => n.isEntryPoint).map(n => n.path),
    isolatedCycles: findIsolatedCycles(graph, nodes),
    skippedFiles,
  };
}

export function toOrphanJson(report: OrphanReport): OrphanReportJson {
  return {
    scanned_file_count: report.scannedFileCount,
    orphans: report.orphans,
    entry_points_excluded: report.entryPointsExcluded,
    edges_total: report.edgesTotal,
    isolated_cycles: report.isolatedCycles,
    skipped_files: report.skippedFiles,
    nothing_scanned: report.status === 'empty',
  };
}

export interface TextStyle {
  heading: (text: string) => string;
  muted: (text: string) => string;
  warn: (text: string) => string;
}

const PLAIN: TextStyle = {
  heading: text => text,
  muted: text => text,
  warn: text => text,
};

export function renderOrphanText(report: OrphanReport, style: TextStyle = PLAIN): string {
  if (report.status === 'empty') {
    return `No source files scanned under ${report.root}.`;
  }

  const lines: string[] = [
    `Scanned ${report.scannedFileCount} files (${report.edgesTotal} import edges).`,
    `Found ${report.orphans.length} potential orphan files.`,
    style.muted(RULE),
  ];

  if (report.entryPointsExcluded.length > 0) {
    lines.push('', style.heading('Likely Entry Points (Whitelisted):'));
    for (const f of report.entryPointsExcluded) lines.push(`  [OK] ${f}`);
  }

  lines.push('', style.heading('Potential True Orphans (No Inbound References):'));
  if (report.orphans.length === 0) {
    lines.push('  (None found)');
  } else {
    for (const f of report.orphans) lines.push(`  [?] ${f}`);
  }

  if (report.isolatedCycles.length > 0) {
    lines.push('', style.heading('Isolated Import Cycles (Only Imported by Each Other):'));
    for (const cluster of report.isolatedCycles) lines.push(`  [~] ${cluster.join(', ')}`);
  }

  if (report.skippedFiles.length > 0) {
    lines.push('', style.warn(`Warnings (${report.skippedFiles.length} files skipped):`));
    for (const skipped of report.skippedFiles) lines.push(`  [!] ${skipped.path}: ${skipped.reason}`);
  }

  lines.push('', style.muted(RULE), 'Tip: Verify these files are truly unused before deleting.');
  return lines.join('\n');
}
