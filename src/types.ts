/**
 * deadwood - Type Definitions
 */

export type Language = 'javascript' | 'python';

export type OutputFormat = 'text' | 'json';

export interface IndexedFile {
  path: string;
  absolutePath: string;
  extension: string;
}

export interface SourceFile extends IndexedFile {
  content: string | null;
}

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface ReadResult {
  files: SourceFile[];
  skipped: SkippedFile[];
}

export interface ImportEdge {
  from: string;
  to: string;
}

export interface AdjEntry {
  imports: Set<string>;
  importedBy: Set<string>;
}

export type ImportGraph = Map<string, AdjEntry>;

export interface FileNode {
  path: string;
  language: Language | null;
  inDegree: number;
  isEntryPoint: boolean;
}

export type ScanStatus = 'ok' | 'empty';

export interface OrphanReport {
  root: string;
  status: ScanStatus;
  scannedFileCount: number;
  edgesTotal: number;
  orphans: string[];
  entryPointsExcluded: string[];
  isolatedCycles: string[][];
  skippedFiles: SkippedFile[];
}

export interface OrphanReportJson {
  scanned_file_count: number;
  orphans: string[];
  entry_points_excluded: string[];
  edges_total: number;
  isolated_cycles: string[][];
  skipped_files: SkippedFile[];
  nothing_scanned: boolean;
}

export interface ScanOptions {
  ignorePatterns?: string[];
  entryPointPatterns?: string[];
}

export interface TodoItem {
  file: string;
  line: number;
  marker: string;
  text: string;
}

export interface TodoReport {
  root: string;
  scannedFileCount: number;
  todos: TodoItem[];
  skippedFiles: SkippedFile[];
}

export interface TodoOptions {
  patterns?: string[];
  ignorePatterns?: string[];
}
