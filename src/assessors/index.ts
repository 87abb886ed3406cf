import { AgentSkillsAssessor } from './agent-skills-assessor';
import { Assessor } from './assessor';
import { BuildAssessor } from './build-assessor';
import { CodeComplexityAssessor } from './code-complexity-assessor';
import { ContextFriendlinessAssessor } from './context-friendliness-assessor';
import { CustomAgentsAssessor } from './custom-agents-assessor';
import { CustomInstructionsAssessor } from './custom-instructions-assessor';
import { DocumentationAssessor } from './documentation-assessor';
import { RunAssessor } from './run-assessor';
import { TestAssessor } from './test-assessor';
import { TypeSafetyAssessor } from './type-safety-assessor';

export type { AssessmentContext, Assessor } from './assessor';

/**
 * Every category in report order; the bonus categories come last
 */
export function createDefaultAssessors(): Assessor[] {
  return [
    new BuildAssessor(),
    new RunAssessor(),
    new TestAssessor(),
    new CodeComplexityAssessor(),
    new DocumentationAssessor(),
    new CustomInstructionsAssessor(),
    new TypeSafetyAssessor(),
    new ContextFriendlinessAssessor(),
    new CustomAgentsAssessor(),
    new AgentSkillsAssessor(),
  ];
}
