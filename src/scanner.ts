import path from 'path';
import { assertDirectory, indexFiles, readSources } from './file-walker.js';
import { buildImportGraph } from './graph-builder.js';
import { SOURCE_EXTENSIONS } from './import-extractor.js';
import { createLogger } from './logger.js';
import { DEFAULT_ENTRY_POINT_PATTERNS, buildOrphanReport } from './orphan-report.js';
import type { OrphanReport, ScanOptions } from './types.js';

const log = createLogger('scanner');

/**
 * index -> read -> extract/resolve -> aggregate -> report.
 * Throws InputError for a bad root; every other problem lands in the report.
 */
export async function scanForOrphans(root: string, options: ScanOptions = {}): Promise<OrphanReport> {
  const resolvedRoot = path.resolve(root);
  await assertDirectory(resolvedRoot);

  const indexed = await indexFiles(resolvedRoot, {
    extensions: SOURCE_EXTENSIONS,
    ignorePatterns: options.ignorePatterns,
  });
  log.info(`Scanning ${indexed.length} files...`, { root: resolvedRoot });

  const { files, skipped } = await readSources(indexed);
  const graph = buildImportGraph(files);
  const report = buildOrphanReport(
    resolvedRoot,
    graph,
    options.entryPointPatterns ?? DEFAULT_ENTRY_POINT_PATTERNS,
    skipped,
  );

  log.debug('Orphan scan complete', {
    files: report.scannedFileCount,
    edges: report.edgesTotal,
    orphans: report.orphans.length,
    skipped: skipped.length,
  });

  return report;
}
