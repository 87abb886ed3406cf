// repo-readiness - static readiness assessment of source repositories
export * from './types';
export * from './core/config';

// Engines
export { ReadinessEngine, calculateGrade } from './core/readiness-engine';
export { ComplexityEngine } from './core/complexity-engine';
export { RepositoryIndex } from './core/repository-index';
export { collectSourceFiles } from './core/source-collector';

// Assessors
export { createDefaultAssessors } from './assessors';
export type { AssessmentContext, Assessor } from './assessors';
export { assessComplexity, scoreComplexityAnalysis } from './assessors/code-complexity-assessor';

// Analysis primitives
export { extractCodeUnits } from './analyzers/function-extractor';
export { calculateCyclomaticComplexity } from './analyzers/complexity-scorer';
export { countImports, extractImportTargets } from './analyzers/import-counter';
export { buildDependencyGraph, resolveImportTarget } from './analyzers/dependency-graph-builder';
export { detectCycles } from './analyzers/cycle-detector';
export { calculateDependencyDepths } from './analyzers/depth-analyzer';
export { SCCAnalyzer } from './analyzers/scc-analyzer';

// Reporting
export { generateMarkdownReport, writeMarkdownReport } from './reporting/markdown-report';

// Errors
export { AssessmentError } from './errors/assessment-error';
export { FileUnreadableError } from './errors/file-unreadable-error';
export { ErrorCode } from './utils/error-handler';
