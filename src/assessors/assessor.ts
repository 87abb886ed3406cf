import { RepositoryIndex } from '../core/repository-index';
import { CategoryResult, ReadinessConfig } from '../types';
import { Logger } from '../utils/cli-utils';

/**
 * What every category assessor receives for one run
 */
export interface AssessmentContext {
  repositoryPath: string; // absolute
  config: ReadinessConfig;
  logger: Logger;
  index: RepositoryIndex;
}

/**
 * A scored category of the readiness assessment
 */
export interface Assessor {
  readonly category: string;
  readonly title: string;
  readonly maxScore: number;
  readonly bonus?: boolean; // reported on its own, never part of the grade
  assess(context: AssessmentContext): Promise<CategoryResult>;
}
