/**
 * Language tag derived from a source file's extension
 */
export type LanguageTag =
  | 'csharp'
  | 'javascript'
  | 'typescript'
  | 'python'
  | 'java'
  | 'go'
  | 'rust'
  | 'cpp'
  | 'c'
  | 'other';

/**
 * A source file found by the collector. Immutable once created.
 */
export interface SourceFile {
  path: string; // absolute
  relativePath: string; // POSIX separators, relative to the assessed root
  extension: string;
  language: LanguageTag;
  stem: string; // file name without extension, used as the dependency graph key
}

/**
 * A function/method-like span extracted from one file
 */
export interface CodeUnit {
  filePath: string;
  startOffset: number;
  text: string;
  complexity: number;
}

/**
 * Directed graph keyed by file stem. Edge order follows import order in the source.
 */
export type DependencyGraph = Map<string, string[]>;

/**
 * Closed walk of file stems, in traversal order
 */
export type Cycle = string[];

export interface CategoryFindings {
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
}

/**
 * Banded outcome of a single check: points awarded plus the findings it produced
 */
export interface CheckOutcome {
  points: number;
  findings: CategoryFindings;
}

export interface CategoryResult {
  category: string;
  title: string;
  score: number;
  maxScore: number;
  findings: CategoryFindings;
}

export type Grade = 'A' | 'B' | 'C' | 'D' | 'F';

export interface AssessmentResult {
  repositoryName: string;
  repositoryPath: string;
  assessedAt: string; // ISO timestamp
  categories: CategoryResult[]; // graded categories
  bonusCategories: CategoryResult[];
  totalScore: number;
  maxScore: number;
  bonusScore: number;
  percentage: number;
  grade: Grade;
}

// Engine metrics

export interface ComplexityMetrics {
  analyzedFiles: number;
  unitCount: number;
  scores: number[];
  average: number;
  max: number;
}

export interface FileCoupling {
  file: string; // relative path
  imports: number;
}

export interface CouplingMetrics {
  files: FileCoupling[];
  average: number;
  max: number;
}

export interface DependencyMetrics {
  graph: DependencyGraph;
  cycles: Cycle[];
  depths: Map<string, number>;
  maxDepth: number | null;
  averageDepth: number | null;
}

export interface ComplexityAnalysis {
  rootPath: string;
  fileCount: number;
  complexity: ComplexityMetrics | null;
  coupling: CouplingMetrics | null;
  dependencies: DependencyMetrics;
}

// Configuration

export interface SampleSizes {
  complexity: number;
  coupling: number;
  dependencyGraph: number;
}

export interface ComplexityBandThresholds {
  excellent: number; // average below → best band
  good: number;
  moderate: number;
  veryHigh: number; // any single unit above → standalone weakness
}

export interface CouplingBandThresholds {
  low: number;
  moderate: number;
  high: number;
  excessive: number; // any single file above → standalone weakness
}

export interface CycleBandThresholds {
  moderate: number; // up to this many cycles is a moderate weakness
}

export interface DepthBandThresholds {
  shallow: number;
  moderate: number;
  deep: number;
}

export interface EngineThresholds {
  complexity: ComplexityBandThresholds;
  coupling: CouplingBandThresholds;
  cycles: CycleBandThresholds;
  depth: DepthBandThresholds;
}

export interface ReadinessConfig {
  sourceExtensions: string[];
  excludeDirectories: string[];
  excludePatterns: string[];
  sampleSizes: SampleSizes;
  thresholds: EngineThresholds;
  report: {
    outputDir: string;
  };
}

/**
 * Raw configuration as read from a config file, before validation
 */
export interface UserConfig {
  sourceExtensions?: unknown;
  excludeDirectories?: unknown;
  excludePatterns?: unknown;
  sampleSizes?: unknown;
  thresholds?: unknown;
  report?: unknown;
}
