import { RepositoryIndex } from '../core/repository-index';
import { CategoryResult, CheckOutcome } from '../types';
import { AssessmentContext, Assessor } from './assessor';
import { CategoryDescriptor, NO_OUTCOME, combineOutcomes, strength, weakness } from './category-result';

export const TEST: CategoryDescriptor = { category: 'Test', title: 'Test', maxScore: 20 };

/**
 * Framework keyword and the manifest it is declared in
 */
const TEST_FRAMEWORKS: ReadonlyArray<readonly [keyword: string, manifest: string]> = [
  ['xunit', '*.csproj'],
  ['nunit', '*.csproj'],
  ['mstest', '*.csproj'],
  ['jest', 'package.json'],
  ['mocha', 'package.json'],
  ['pytest', 'requirements.txt'],
  ['junit', 'pom.xml'],
];
const TEST_FILE_PATTERNS = ['*Test*.cs', '*Tests*.cs', '*.test.js', '*.spec.js', 'test_*.py', '*_test.py'];
const TEST_DIRECTORIES = ['tests', 'test', 'Tests', '__tests__', 'spec'];

export class TestAssessor implements Assessor {
  readonly category = TEST.category;
  readonly title = TEST.title;
  readonly maxScore = TEST.maxScore;

  async assess({ index }: AssessmentContext): Promise<CategoryResult> {
    const packageJson = await index.readText('package.json');
    const testDirectory = await index.firstDirectory(TEST_DIRECTORIES);

    return combineOutcomes(TEST, [
      await checkFramework(index),
      checkTestFiles(index),
      packageJson !== null && packageJson.includes('"test"')
        ? strength(5, 'npm test script configured')
        : NO_OUTCOME,
      testDirectory === undefined ? NO_OUTCOME : strength(3, `Organized test directory: ${testDirectory}/`),
    ]);
  }
}

async function checkFramework(index: RepositoryIndex): Promise<CheckOutcome> {
  for (const [keyword, manifest] of TEST_FRAMEWORKS) {
    for (const file of index.findByName(manifest)) {
      const content = await index.readText(file);
      if (content !== null && content.toLowerCase().includes(keyword)) {
        return strength(5, `Test framework detected: ${keyword}`);
      }
    }
  }
  return weakness(0, 'No test framework detected', 'Add a test framework (xUnit, Jest, pytest, etc.)');
}

/**
 * Counted per pattern, so a file matching two patterns counts twice
 */
function checkTestFiles(index: RepositoryIndex): CheckOutcome {
  const testFileCount = TEST_FILE_PATTERNS.reduce(
    (count, pattern) => count + index.findByName(pattern).length,
    0
  );

  return testFileCount > 0
    ? strength(5, `Found ${testFileCount} test file(s)`)
    : weakness(0, 'No test files found', 'Add unit tests for your code');
}
