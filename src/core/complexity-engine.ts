import * as path from 'path';
import { calculateCyclomaticComplexity } from '../analyzers/complexity-scorer';
import { countEdges, buildDependencyGraph } from '../analyzers/dependency-graph-builder';
import { calculateDependencyDepths, summarizeDepths } from '../analyzers/depth-analyzer';
import { detectCycles } from '../analyzers/cycle-detector';
import { extractCodeUnits } from '../analyzers/function-extractor';
import { countImports, extractImportTargets } from '../analyzers/import-counter';
import { FileUnreadableError } from '../errors/file-unreadable-error';
import {
  CodeUnit,
  ComplexityAnalysis,
  ComplexityMetrics,
  CouplingMetrics,
  DependencyMetrics,
  ReadinessConfig,
  SourceFile,
} from '../types';
import { Logger } from '../utils/cli-utils';
import { readSourceFile } from '../utils/file-utils';
import { collectSourceFiles } from './source-collector';

interface SampledFile {
  file: SourceFile;
  content: string | null; // null when the file could not be read
}

/**
 * Complexity & dependency analysis of one repository.
 *
 * Every check reads its own capped prefix of the collected file list, so the
 * complexity, coupling and graph stages may look at different files.
 */
export class ComplexityEngine {
  constructor(
    private readonly config: ReadinessConfig,
    private readonly logger: Logger = new Logger()
  ) {}

  async analyze(rootPath: string): Promise<ComplexityAnalysis> {
    const root = path.resolve(rootPath);
    const files = await collectSourceFiles(root, this.config, this.logger);
    const { sampleSizes } = this.config;

    const complexity = this.measureComplexity(await this.readSample(files, sampleSizes.complexity));
    const coupling = this.measureCoupling(await this.readSample(files, sampleSizes.coupling));
    const dependencies = this.analyzeDependencies(await this.readSample(files, sampleSizes.dependencyGraph));

    return {
      rootPath: root,
      fileCount: files.length,
      complexity,
      coupling,
      dependencies,
    };
  }

  /**
   * Extract and score every unit in the sampled files; null when no unit was found
   */
  measureComplexity(sample: SampledFile[]): ComplexityMetrics | null {
    const units: CodeUnit[] = [];
    let analyzedFiles = 0;

    for (const { file, content } of sample) {
      if (content === null) continue;
      analyzedFiles++;

      for (const unit of extractCodeUnits(content, file.language)) {
        units.push({
          filePath: file.relativePath,
          startOffset: unit.startOffset,
          text: unit.text,
          complexity: calculateCyclomaticComplexity(unit.text),
        });
      }
    }

    this.logger.debug(`Extracted ${units.length} code units from ${analyzedFiles} files`);
    if (units.length === 0) {
      return null;
    }

    const scores = units.map(unit => unit.complexity);
    return {
      analyzedFiles,
      unitCount: units.length,
      scores,
      average: mean(scores),
      max: Math.max(...scores),
    };
  }

  /**
   * Import statement counts per readable file; null when no file could be read
   */
  measureCoupling(sample: SampledFile[]): CouplingMetrics | null {
    const files = sample
      .filter((entry): entry is { file: SourceFile; content: string } => entry.content !== null)
      .map(({ file, content }) => ({
        file: file.relativePath,
        imports: countImports(content, file.language),
      }));

    this.logger.debug(`Counted imports in ${files.length} files`);
    if (files.length === 0) {
      return null;
    }

    const counts = files.map(entry => entry.imports);
    return {
      files,
      average: mean(counts),
      max: Math.max(...counts),
    };
  }

  /**
   * Build the graph once and run cycle detection and depth analysis over it.
   * Unreadable files still become nodes, with no edges.
   */
  analyzeDependencies(sample: SampledFile[]): DependencyMetrics {
    const graph = buildDependencyGraph(
      sample.map(({ file, content }) => ({
        file,
        importTargets: content === null ? [] : extractImportTargets(content, file.language),
      }))
    );
    this.logger.debug(`Dependency graph: ${graph.size} nodes, ${countEdges(graph)} edges`);

    const cycles = detectCycles(graph);
    const depths = calculateDependencyDepths(graph);

    return {
      graph,
      cycles,
      depths,
      ...summarizeDepths(depths),
    };
  }

  private async readSample(files: SourceFile[], sampleSize: number): Promise<SampledFile[]> {
    const sample: SampledFile[] = [];

    for (const file of files.slice(0, sampleSize)) {
      try {
        sample.push({ file, content: await readSourceFile(file.path) });
      } catch (error) {
        if (!(error instanceof FileUnreadableError)) {
          throw error;
        }
        this.logger.debug(`Skipping unreadable file: ${error.message}`);
        sample.push({ file, content: null });
      }
    }

    return sample;
  }
}

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
