import * as path from 'path';
import { CategoryResult, CheckOutcome } from '../types';
import { countLines } from '../utils/file-utils';
import { AssessmentContext, Assessor } from './assessor';
import { CategoryDescriptor, NO_OUTCOME, combineOutcomes, outcome, strength, weakness } from './category-result';

export const CUSTOM_INSTRUCTIONS: CategoryDescriptor = {
  category: 'CustomInstructions',
  title: 'Custom Instructions',
  maxScore: 15,
};

const INSTRUCTION_FILES = ['.github/copilot-instructions.md', '.copilot-instructions.md', 'COPILOT.md', 'AGENTS.md'];
const KEY_TOPICS = ['coding standards', 'naming', 'testing', 'security', 'architecture'];

/**
 * Repository-specific guidance for coding assistants
 */
export class CustomInstructionsAssessor implements Assessor {
  readonly category = CUSTOM_INSTRUCTIONS.category;
  readonly title = CUSTOM_INSTRUCTIONS.title;
  readonly maxScore = CUSTOM_INSTRUCTIONS.maxScore;

  async assess({ index }: AssessmentContext): Promise<CategoryResult> {
    const found = await index.firstFile(INSTRUCTION_FILES);
    const content = found === undefined ? null : await index.readText(found);

    if (found === undefined || content === null) {
      return combineOutcomes(CUSTOM_INSTRUCTIONS, [
        weakness(
          0,
          'No custom instructions file found',
          'Create .github/copilot-instructions.md with project-specific guidance'
        ),
      ]);
    }

    return combineOutcomes(CUSTOM_INSTRUCTIONS, [
      strength(3, `Custom instructions file found: ${path.posix.basename(found)}`),
      countLines(content) >= 50 ? strength(2, 'Comprehensive instructions content') : NO_OUTCOME,
      checkTopics(content),
    ]);
  }
}

function checkTopics(content: string): CheckOutcome {
  const text = content.toLowerCase();
  const topicsFound = KEY_TOPICS.filter(topic => text.includes(topic)).length;

  return topicsFound >= 3
    ? strength(topicsFound, `Covers ${topicsFound} key topics`)
    : outcome(topicsFound);
}
