// ── deadwood — Public API ──

export * from './types.js';
export { InputError, FileReadError } from './errors.js';
export { createLogger, setLogLevel } from './logger.js';
export type { LogLevel, Logger } from './logger.js';
export { indexFiles, readSources, assertDirectory, toIgnoreGlobs, SKIP_DIRS } from './file-walker.js';
export { extractImports, extractorFor, SOURCE_EXTENSIONS } from './import-extractor.js';
export type { ImportExtractor } from './import-extractor.js';
export { resolveImport, createKnownFiles } from './resolver.js';
export { buildImportGraph, findImportClusters, findImportCycles, listEdges, inDegree } from './graph-builder.js';
export {
  buildOrphanReport,
  classifyNodes,
  renderOrphanText,
  toOrphanJson,
  DEFAULT_ENTRY_POINT_PATTERNS,
} from './orphan-report.js';
export { scanForOrphans } from './scanner.js';
export { findTodos, renderTodoText, DEFAULT_TODO_PATTERNS, TODO_SKIP_DIRS } from './todo-finder.js';
export { loadConfig, parseConfig, writeDefaultConfig, CONFIG_FILE_NAME } from './config.js';
export type { DeadwoodConfig } from './config.js';
