import * as path from 'path';
import { AssessmentContext, Assessor, createDefaultAssessors } from '../assessors';
import { emptyResult } from '../assessors/category-result';
import { AssessmentError } from '../errors/assessment-error';
import { AssessmentResult, CategoryResult, Grade, ReadinessConfig } from '../types';
import { Logger } from '../utils/cli-utils';
import { ErrorCode } from '../utils/error-handler';
import { directoryExists } from '../utils/file-utils';
import { RepositoryIndex } from './repository-index';

const GRADE_BANDS: ReadonlyArray<readonly [minRatio: number, grade: Grade]> = [
  [0.9, 'A'],
  [0.8, 'B'],
  [0.7, 'C'],
  [0.6, 'D'],
];

export function calculateGrade(totalScore: number, maxScore: number): Grade {
  for (const [minRatio, grade] of GRADE_BANDS) {
    if (totalScore >= maxScore * minRatio) {
      return grade;
    }
  }
  return 'F';
}

function sumOf(categories: CategoryResult[], value: (category: CategoryResult) => number): number {
  return categories.reduce((sum, category) => sum + value(category), 0);
}

/**
 * Runs every category assessor over one repository and totals the result.
 * Bonus categories are totalled apart and never count towards the grade.
 */
export class ReadinessEngine {
  constructor(
    private readonly config: ReadinessConfig,
    private readonly logger: Logger = new Logger(),
    private readonly assessors: Assessor[] = createDefaultAssessors()
  ) {}

  async assess(repositoryPath: string, now: Date = new Date()): Promise<AssessmentResult> {
    const root = path.resolve(repositoryPath);
    if (!(await directoryExists(root))) {
      throw new AssessmentError(ErrorCode.DIRECTORY_NOT_FOUND, `Repository directory not found: ${root}`, {
        repositoryPath: root,
      });
    }

    const context: AssessmentContext = {
      repositoryPath: root,
      config: this.config,
      logger: this.logger,
      index: await RepositoryIndex.create(root, this.config, this.logger),
    };

    const categories: CategoryResult[] = [];
    const bonusCategories: CategoryResult[] = [];
    for (const [i, assessor] of this.assessors.entries()) {
      const label = assessor.bonus ? `${assessor.title} (bonus)` : assessor.title;
      this.logger.info(`[${i + 1}/${this.assessors.length}] Assessing ${label}...`);
      const result = await this.runAssessor(assessor, context);
      if (assessor.bonus) {
        bonusCategories.push(result);
      } else {
        categories.push(result);
      }
    }

    const totalScore = sumOf(categories, category => category.score);
    const maxScore = sumOf(categories, category => category.maxScore);

    return {
      repositoryName: path.basename(root),
      repositoryPath: root,
      assessedAt: now.toISOString(),
      categories,
      bonusCategories,
      totalScore,
      maxScore,
      bonusScore: sumOf(bonusCategories, category => category.score),
      percentage: maxScore === 0 ? 0 : Math.round((totalScore / maxScore) * 1000) / 10,
      grade: calculateGrade(totalScore, maxScore),
    };
  }

  /**
   * A failing assessor is reported and scores zero; the run goes on
   */
  private async runAssessor(assessor: Assessor, context: AssessmentContext): Promise<CategoryResult> {
    try {
      return await assessor.assess(context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Error in ${assessor.category}: ${message}`, error);
      return emptyResult(assessor);
    }
  }
}
