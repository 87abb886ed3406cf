import * as path from 'path';
import { CategoryResult } from '../types';
import { AssessmentContext, Assessor } from './assessor';
import { CategoryDescriptor, NO_OUTCOME, combineOutcomes, recommendation, strength } from './category-result';

export const AGENT_SKILLS: CategoryDescriptor = {
  category: 'AgentSkills',
  title: 'Agent Skills',
  maxScore: 4,
};

const SKILL_PATTERNS = ['SKILL.md', 'skill.yaml', 'skill.yml', '*.skill.md'];
const SKILLS_DIRECTORY = '.copilot/skills';
const DOCUMENTED_SKILL_LENGTH = 100;

/**
 * Bonus category: reusable skill definitions for assistants
 */
export class AgentSkillsAssessor implements Assessor {
  readonly category = AGENT_SKILLS.category;
  readonly title = AGENT_SKILLS.title;
  readonly maxScore = AGENT_SKILLS.maxScore;
  readonly bonus = true;

  async assess({ index }: AssessmentContext): Promise<CategoryResult> {
    const hasSkillsDirectory = await index.hasDirectory(SKILLS_DIRECTORY);
    const skills = [
      ...new Set([
        ...SKILL_PATTERNS.flatMap(pattern => index.findByName(pattern)),
        ...index.files.filter(file => file.startsWith(`${SKILLS_DIRECTORY}/`)),
      ]),
    ];
    const directory = hasSkillsDirectory
      ? strength(2, `Skills directory found: ${SKILLS_DIRECTORY}/ (+2 bonus)`)
      : NO_OUTCOME;

    const [first] = skills;
    if (first === undefined) {
      return combineOutcomes(AGENT_SKILLS, [
        directory,
        recommendation('Consider creating skills for reusable operations (optional, awards bonus points)'),
      ]);
    }

    const content = await index.readText(first);
    return combineOutcomes(AGENT_SKILLS, [
      directory,
      // Definitions earn the same 2 points as the directory, once
      strength(hasSkillsDirectory ? 0 : 2, `Found ${skills.length} skill definition(s)`),
      content !== null && content.length > DOCUMENTED_SKILL_LENGTH
        ? strength(2, `Documented skill: ${path.posix.basename(first)} (+2 bonus)`)
        : NO_OUTCOME,
    ]);
  }
}
