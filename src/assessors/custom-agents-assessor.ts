import * as path from 'path';
import { CategoryResult, CheckOutcome } from '../types';
import { AssessmentContext, Assessor } from './assessor';
import { CategoryDescriptor, NO_OUTCOME, combineOutcomes, strength, weakness } from './category-result';

export const CUSTOM_AGENTS: CategoryDescriptor = {
  category: 'CustomAgents',
  title: 'Custom Agents',
  maxScore: 8,
};

const AGENT_PATTERNS = ['*.agent.md', '*.agent.yaml', '*.agent.yml'];
const AGENTS_DIRECTORY = '.github/agents/';
const INSPECTED_AGENTS = 3;

/**
 * Bonus category: specialised agent definitions checked into the repository
 */
export class CustomAgentsAssessor implements Assessor {
  readonly category = CUSTOM_AGENTS.category;
  readonly title = CUSTOM_AGENTS.title;
  readonly maxScore = CUSTOM_AGENTS.maxScore;
  readonly bonus = true;

  async assess({ index }: AssessmentContext): Promise<CategoryResult> {
    const agents = unique([
      ...AGENT_PATTERNS.flatMap(pattern => index.findByName(pattern)),
      ...index.files.filter(file => file.startsWith(AGENTS_DIRECTORY)),
    ]);

    if (agents.length === 0) {
      return combineOutcomes(CUSTOM_AGENTS, [
        weakness(0, 'No custom agents found', 'Consider creating specialized agents for domain-specific tasks'),
      ]);
    }

    const configured: CheckOutcome[] = [];
    for (const agent of agents.slice(0, INSPECTED_AGENTS)) {
      const content = await index.readText(agent);
      configured.push(
        isConfigured(content) ? strength(2, `Well-configured agent: ${path.posix.basename(agent)}`) : NO_OUTCOME
      );
    }

    return combineOutcomes(CUSTOM_AGENTS, [strength(2, `Found ${agents.length} custom agent(s)`), ...configured]);
  }
}

function isConfigured(content: string | null): boolean {
  return content !== null && (content.includes('name:') || content.includes('description:') || content.includes('# '));
}

function unique(files: string[]): string[] {
  return [...new Set(files)];
}
