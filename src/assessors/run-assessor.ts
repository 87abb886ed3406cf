import { CategoryResult, CheckOutcome } from '../types';
import { AssessmentContext, Assessor } from './assessor';
import { CategoryDescriptor, NO_OUTCOME, combineOutcomes, strength, weakness } from './category-result';

export const RUN: CategoryDescriptor = { category: 'Run', title: 'Run', maxScore: 15 };

const ENTRY_POINTS = ['Program.cs', 'main.py', 'index.js', 'index.ts', 'main.go', 'Main.java', 'main.rs'];
const ENV_TEMPLATES = ['.env.example', '.env.template', 'appsettings.json', 'config.example.json'];

export class RunAssessor implements Assessor {
  readonly category = RUN.category;
  readonly title = RUN.title;
  readonly maxScore = RUN.maxScore;

  async assess({ index }: AssessmentContext): Promise<CategoryResult> {
    const entryPoint = ENTRY_POINTS.find(name => index.findByName(name).length > 0);
    const envTemplate = await index.firstFile(ENV_TEMPLATES);
    const packageJson = await index.readText('package.json');

    return combineOutcomes(RUN, [
      entryPoint === undefined
        ? weakness(0, 'No clear entry point found', 'Add a clear entry point file (e.g., Program.cs, main.py)')
        : strength(3, `Entry point identified: ${entryPoint}`),
      envTemplate === undefined ? NO_OUTCOME : strength(4, `Environment template found: ${envTemplate}`),
      (await index.hasFile('.vscode/launch.json'))
        ? strength(2, 'VS Code launch configuration found')
        : NO_OUTCOME,
      checkStartScript(packageJson),
    ]);
  }
}

function checkStartScript(packageJson: string | null): CheckOutcome {
  return packageJson !== null && packageJson.includes('"start"')
    ? strength(2, 'npm start script configured')
    : NO_OUTCOME;
}

