import { extractorFor } from './import-extractor.js';
import { comparePaths } from './file-walker.js';
import { createKnownFiles, resolveImport } from './resolver.js';
import type { AdjEntry, ImportEdge, ImportGraph, SourceFile } from './types.js';

/**
 * Build the importer -> imported adjacency for every scanned file in one pass.
 * Files with no readable content still get a node; they just import nothing.
 */
export function buildImportGraph(files: SourceFile[]): ImportGraph {
  const adj: ImportGraph = new Map();
  const known = createKnownFiles(files.map(f => f.path));

  for (const f of files) {
    if (!adj.has(f.path)) adj.set(f.path, { imports: new Set(), importedBy: new Set() });
  }

  for (const f of files) {
    const extractor = extractorFor(f.extension);
    if (!extractor || f.content === null) continue;

    const entry = adj.get(f.path);
    if (!entry) continue;

    for (const spec of extractor.extract(f.content)) {
      const resolved = resolveImport(spec, f.path, extractor.language, known);
      if (!resolved || resolved === f.path) continue;

      const target = adj.get(resolved);
      if (!target) continue;

      entry.imports.add(resolved);
      target.importedBy.add(f.path);
    }
  }

  return adj;
}

export function inDegree(graph: ImportGraph, filePath: string): number {
  return graph.get(filePath)?.importedBy.size ?? 0;
}

export function listEdges(graph: ImportGraph): ImportEdge[] {
  const edges: ImportEdge[] = [];
  for (const [from, entry] of graph) {
    for (const to of entry.imports) edges.push({ from, to });
  }
  return edges.sort((a, b) => comparePaths(a.from, b.from) || comparePaths(a.to, b.to));
}

export function countEdges(graph: ImportGraph): number {
  let total = 0;
  for (const entry of graph.values()) total += entry.imports.size;
  return total;
}

function rotateToSmallest(cycle: string[]): string[] {
  let start = 0;
  cycle.forEach((file, idx) => {
    if (comparePaths(file, cycle[start] ?? file) < 0) start = idx;
  });
  return [...cycle.slice(start), ...cycle.slice(0, start)];
}

/**
 * Find import cycles by DFS. Each cycle is reported once, rotated so it
 * starts at its lexically smallest file.
 */
export function findImportCycles(adj: ImportGraph): string[][] {
  const cycles: string[][] = [];
  const visited = new Set<string>();
  const inStack = new Set<string>();
  const stack: string[] = [];
  const found = new Set<string>();

  function dfs(node: string) {
    visited.add(node);
    inStack.add(node);
    stack.push(node);

    const entry: AdjEntry | undefined = adj.get(node);
    if (entry) {
      for (const dep of [...entry.imports].sort(comparePaths)) {
        if (!adj.has(dep)) continue;

        if (!visited.has(dep)) {
          dfs(dep);
        } else if (inStack.has(dep)) {
          const cycleStart = stack.indexOf(dep);
          if (cycleStart >= 0) {
            const cyclePath = stack.slice(cycleStart);
            const key = [...cyclePath].sort(comparePaths).join('|');
            if (!found.has(key)) {
              found.add(key);
              cycles.push(rotateToSmallest(cyclePath));
            }
          }
        }
      }
    }

    stack.pop();
    inStack.delete(node);
  }

  for (const node of [...adj.keys()].sort(comparePaths)) {
    if (!visited.has(node)) dfs(node);
  }

  return cycles.sort((a, b) => comparePaths(a.join('|'), b.join('|')));
}

/**
 * Strongly connected components with more than one file (Tarjan). Members
 * of each cluster are sorted; clusters are sorted by their first member.
 * Unlike `findImportCycles`, overlapping cycles collapse into one cluster.
 */
export function findImportClusters(adj: ImportGraph): string[][] {
  const clusters: string[][] = [];
  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  let counter = 0;

  function strongConnect(node: string) {
    index.set(node, counter);
    lowLink.set(node, counter);
    counter++;
    stack.push(node);
    onStack.add(node);

    for (const dep of [...(adj.get(node)?.imports ?? [])].sort(comparePaths)) {
      if (!adj.has(dep)) continue;

      if (!index.has(dep)) {
        strongConnect(dep);
        lowLink.set(node, Math.min(lowLink.get(node) ?? 0, lowLink.get(dep) ?? 0));
      } else if (onStack.has(dep)) {
        lowLink.set(node, Math.min(lowLink.get(node) ?? 0, index.get(dep) ?? 0));
      }
    }

    if (lowLink.get(node) !== index.get(node)) return;

    const members: string[] = [];
    let member: string | undefined;
    do {
      member = stack.pop();
      if (member === undefined) break;
      onStack.delete(member);
      members.push(member);
    } while (member !== node);

    if (members.length > 1) clusters.push(members.sort(comparePaths));
  }

  for (const node of [...adj.keys()].sort(comparePaths)) {
    if (!index.has(node)) strongConnect(node);
  }

  return clusters.sort((a, b) => comparePaths(a[0] ?? '', b[0] ?? ''));
}
