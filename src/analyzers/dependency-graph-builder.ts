import { DependencyGraph, SourceFile } from '../types';

/**
 * One sampled file together with the raw import targets captured from its text.
 * `importTargets` is empty for files that could not be read.
 */
export interface GraphSourceEntry {
  file: SourceFile;
  importTargets: string[];
}

/**
 * Build the file-level dependency graph keyed by file stem.
 *
 * A target resolves to the first sampled file whose stem contains it, or whose
 * root-relative path contains it with `.` read as a path separator. Targets that
 * resolve to nothing are dropped. When two files share a stem the later one's
 * edge list replaces the earlier one.
 */
export function buildDependencyGraph(entries: GraphSourceEntry[]): DependencyGraph {
  const graph: DependencyGraph = new Map();
  const files = entries.map(entry => entry.file);

  for (const { file, importTargets } of entries) {
    const edges: string[] = [];

    for (const target of importTargets) {
      const referenced = resolveImportTarget(target, files);
      if (referenced) {
        edges.push(referenced.stem);
      }
    }

    graph.set(file.stem, edges);
  }

  return graph;
}

/**
 * Matching is against the root-relative path, so a relative Python import
 * (`from . import x`, captured as `.`, read as `/`) resolves to the first sampled
 * file in any subdirectory.
 */
export function resolveImportTarget(target: string, files: SourceFile[]): SourceFile | undefined {
  const pathFragment = target.replace(/\./g, '/');
  return files.find(
    candidate => candidate.stem.includes(target) || candidate.relativePath.includes(pathFragment)
  );
}

export function countEdges(graph: DependencyGraph): number {
  let edges = 0;
  for (const targets of graph.values()) {
    edges += targets.length;
  }
  return edges;
}
