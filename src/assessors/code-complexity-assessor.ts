import { ComplexityEngine } from '../core/complexity-engine';
import {
  CategoryResult,
  CheckOutcome,
  ComplexityAnalysis,
  ComplexityBandThresholds,
  ComplexityMetrics,
  CouplingBandThresholds,
  CouplingMetrics,
  CycleBandThresholds,
  DepthBandThresholds,
  EngineThresholds,
  ReadinessConfig,
} from '../types';
import { Logger } from '../utils/cli-utils';
import { AssessmentContext, Assessor } from './assessor';
import { CategoryDescriptor, NO_OUTCOME, combineOutcomes, strength, weakness } from './category-result';

export const CODE_COMPLEXITY: CategoryDescriptor = {
  category: 'CodeComplexity',
  title: 'Code Complexity & Dependencies',
  maxScore: 25,
};

export const NO_CODE_FILES_FINDING = 'No code files found to analyze';

/**
 * Cyclomatic complexity band (8 points at best); a very complex single unit adds a weakness
 */
export function bandComplexity(metrics: ComplexityMetrics | null, thresholds: ComplexityBandThresholds): CheckOutcome[] {
  if (!metrics) return [NO_OUTCOME];

  const average = metrics.average.toFixed(1);
  const outcomes: CheckOutcome[] = [];

  if (metrics.average < thresholds.excellent) {
    outcomes.push(strength(8, `Excellent: Average cyclomatic complexity is ${average} (very simple)`));
  } else if (metrics.average < thresholds.good) {
    outcomes.push(strength(6, `Good: Average cyclomatic complexity is ${average} (manageable)`));
  } else if (metrics.average < thresholds.moderate) {
    outcomes.push(
      weakness(
        3,
        `Moderate complexity: Average cyclomatic complexity is ${average}`,
        'Consider refactoring complex methods to reduce cyclomatic complexity'
      )
    );
  } else {
    outcomes.push(
      weakness(
        0,
        `High complexity: Average cyclomatic complexity is ${average} (hard for AI)`,
        'Reduce cyclomatic complexity - AI struggles with highly complex methods'
      )
    );
  }

  if (metrics.max > thresholds.veryHigh) {
    outcomes.push(weakness(0, `Some methods have very high complexity (max: ${metrics.max})`));
  }

  return outcomes;
}

/**
 * File coupling band (6 points at best); one file with excessive imports adds a weakness
 */
export function bandCoupling(metrics: CouplingMetrics | null, thresholds: CouplingBandThresholds): CheckOutcome[] {
  if (!metrics) return [NO_OUTCOME];

  const average = metrics.average.toFixed(1);
  const outcomes: CheckOutcome[] = [];

  if (metrics.average < thresholds.low) {
    outcomes.push(strength(6, `Low coupling: Average ${average} dependencies per file`));
  } else if (metrics.average < thresholds.moderate) {
    outcomes.push(strength(4, `Moderate coupling: Average ${average} dependencies per file`));
  } else if (metrics.average < thresholds.high) {
    outcomes.push(
      weakness(
        2,
        `High coupling: Average ${average} dependencies per file`,
        'Reduce file coupling to improve AI context understanding'
      )
    );
  } else {
    outcomes.push(
      weakness(
        0,
        `Very high coupling: Average ${average} dependencies per file`,
        'Refactor to reduce dependencies - exceeds AI context window capacity'
      )
    );
  }

  if (metrics.max > thresholds.excessive) {
    outcomes.push(weakness(0, `Some files have excessive dependencies (max: ${metrics.max})`));
  }

  return outcomes;
}

/**
 * Circular dependency band (6 points when there are none)
 */
export function bandCycles(cycleCount: number, thresholds: CycleBandThresholds): CheckOutcome {
  if (cycleCount === 0) {
    return strength(6, 'No circular dependencies detected');
  }
  if (cycleCount <= thresholds.moderate) {
    return weakness(
      3,
      `Found ${cycleCount} circular dependency cycle(s)`,
      'Break circular dependencies to improve code clarity'
    );
  }
  return weakness(
    0,
    `Found ${cycleCount} circular dependency cycles (confuses AI)`,
    'Significant refactoring needed - circular dependencies prevent clear reasoning'
  );
}

/**
 * Dependency depth band on the deepest chain (5 points at best); nothing for an empty graph
 */
export function bandDepth(maxDepth: number | null, thresholds: DepthBandThresholds): CheckOutcome {
  if (maxDepth === null) return NO_OUTCOME;

  if (maxDepth <= thresholds.shallow) {
    return strength(5, `Shallow dependency chains: Max depth ${maxDepth} (easy to understand)`);
  }
  if (maxDepth <= thresholds.moderate) {
    return strength(3, `Moderate dependency depth: Max ${maxDepth} hops`);
  }
  if (maxDepth <= thresholds.deep) {
    return weakness(
      1,
      `Deep dependency chains: Max depth ${maxDepth}`,
      'Flatten dependency chains for better AI comprehension'
    );
  }
  return weakness(
    0,
    `Very deep dependency chains: Max depth ${maxDepth} (exceeds comprehension budget)`,
    'Critical: Dependency depth requires understanding too much context for AI'
  );
}

/**
 * Combine the four banded checks into the category result
 */
export function scoreComplexityAnalysis(analysis: ComplexityAnalysis, thresholds: EngineThresholds): CategoryResult {
  if (analysis.fileCount === 0) {
    return combineOutcomes(CODE_COMPLEXITY, [weakness(0, NO_CODE_FILES_FINDING)]);
  }

  return combineOutcomes(CODE_COMPLEXITY, [
    ...bandComplexity(analysis.complexity, thresholds.complexity),
    ...bandCoupling(analysis.coupling, thresholds.coupling),
    bandCycles(analysis.dependencies.cycles.length, thresholds.cycles),
    bandDepth(analysis.dependencies.maxDepth, thresholds.depth),
  ]);
}

export class CodeComplexityAssessor implements Assessor {
  readonly category = CODE_COMPLEXITY.category;
  readonly title = CODE_COMPLEXITY.title;
  readonly maxScore = CODE_COMPLEXITY.maxScore;

  async assess(context: AssessmentContext): Promise<CategoryResult> {
    return assessComplexity(context.repositoryPath, context.config, context.logger);
  }
}

/**
 * Single entry point: assess complexity for the repository at `rootPath`
 */
export async function assessComplexity(
  rootPath: string,
  config: ReadinessConfig,
  logger: Logger = new Logger()
): Promise<CategoryResult> {
  const analysis = await new ComplexityEngine(config, logger).analyze(rootPath);
  return scoreComplexityAnalysis(analysis, config.thresholds);
}
