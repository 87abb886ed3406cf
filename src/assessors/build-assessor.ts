import * as path from 'path';
import { RepositoryIndex } from '../core/repository-index';
import { CategoryResult, CheckOutcome } from '../types';
import { AssessmentContext, Assessor } from './assessor';
import { CategoryDescriptor, NO_OUTCOME, combineOutcomes, recommendation, strength, weakness } from './category-result';

export const BUILD: CategoryDescriptor = { category: 'Build', title: 'Build', maxScore: 20 };

const BUILD_MANIFESTS = [
  '*.csproj',
  '*.sln',
  'package.json',
  'Cargo.toml',
  'pom.xml',
  'build.gradle',
  'Makefile',
  'CMakeLists.txt',
];
const CI_PATHS = ['.github/workflows', '.gitlab-ci.yml', 'azure-pipelines.yml', 'Jenkinsfile', '.circleci'];
const BUILD_SCRIPTS = ['build.ps1', 'build.sh', 'build.cmd', 'build.bat'];

/**
 * Can the project be built from what is in the repository?
 */
export class BuildAssessor implements Assessor {
  readonly category = BUILD.category;
  readonly title = BUILD.title;
  readonly maxScore = BUILD.maxScore;

  async assess({ index }: AssessmentContext): Promise<CategoryResult> {
    const ciPath = await index.firstExisting(CI_PATHS);
    const buildScript = await index.firstFile(BUILD_SCRIPTS);

    return combineOutcomes(BUILD, [
      checkManifest(index),
      checkReadme(await index.readText('README.md')),
      ciPath === undefined ? NO_OUTCOME : strength(4, `CI/CD configuration found: ${ciPath}`),
      buildScript === undefined ? NO_OUTCOME : strength(3, `Build script found: ${buildScript}`),
    ]);
  }
}

function checkManifest(index: RepositoryIndex): CheckOutcome {
  for (const pattern of BUILD_MANIFESTS) {
    const [first] = index.findByName(pattern);
    if (first !== undefined) {
      return strength(5, `Build configuration found: ${path.posix.basename(first)}`);
    }
  }
  return weakness(
    0,
    'No build configuration file detected',
    'Add a build configuration (e.g., .csproj, package.json, Makefile)'
  );
}

function checkReadme(readme: string | null): CheckOutcome {
  if (readme === null) return NO_OUTCOME;

  const text = readme.toLowerCase();
  return text.includes('build') || text.includes('compile')
    ? strength(4, 'README contains build instructions')
    : recommendation('Add build instructions to README.md');
}
