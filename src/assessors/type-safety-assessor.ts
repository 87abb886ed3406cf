import { RepositoryIndex } from '../core/repository-index';
import { CategoryResult, CheckOutcome } from '../types';
import { AssessmentContext, Assessor } from './assessor';
import {
  CategoryDescriptor,
  NO_OUTCOME,
  combineOutcomes,
  mergeOutcomes,
  recommendation,
  strength,
  weakness,
} from './category-result';

export const TYPE_SAFETY: CategoryDescriptor = { category: 'TypeSafety', title: 'Type Safety', maxScore: 10 };

const PYTHON_SAMPLE = 10;
const PYTHON_IGNORED_SEGMENTS = ['venv', '__pycache__'];
const PYTHON_TYPE_CHECKERS = ['mypy.ini', '.mypy.ini', 'pyrightconfig.json', 'pyproject.toml'];
const ANNOTATION_PATTERN = /:\s*(int|str|float|bool|List|Dict|Optional|Union|Any)\b/;
const RETURN_ANNOTATION_PATTERN = /->\s*(int|str|float|bool|List|Dict|Optional|None)/;

/**
 * Result of one typing check; `typed` marks evidence that the code base is typed at all
 */
interface TypingCheck {
  outcome: CheckOutcome;
  typed: boolean;
}

const NOTHING: TypingCheck = { outcome: NO_OUTCOME, typed: false };

export class TypeSafetyAssessor implements Assessor {
  readonly category = TYPE_SAFETY.category;
  readonly title = TYPE_SAFETY.title;
  readonly maxScore = TYPE_SAFETY.maxScore;

  async assess({ index }: AssessmentContext): Promise<CategoryResult> {
    const tsconfig = await checkTsConfig(index);
    const tsFiles = index.findByName('*.ts').filter(file => !file.endsWith('.d.ts'));
    const jsFiles = index.findByName('*.js');

    const checks: TypingCheck[] = [
      tsconfig,
      tsFiles.length > 0 && !tsconfig.typed
        ? { outcome: strength(3, `TypeScript files found (${tsFiles.length} files)`), typed: true }
        : NOTHING,
      { outcome: checkTypeScriptRatio(tsFiles.length, jsFiles.length), typed: false },
      ...(await checkPython(index)),
      await checkNullableReferenceTypes(index),
    ];

    const outcomes = checks.map(check => check.outcome);
    if (!checks.some(check => check.typed)) {
      outcomes.push(
        weakness(
          0,
          'No type safety features detected',
          'Consider using TypeScript, Python type hints, or C# nullable types for better suggestions'
        )
      );
    }

    return combineOutcomes(TYPE_SAFETY, outcomes);
  }
}

async function checkTsConfig(index: RepositoryIndex): Promise<TypingCheck> {
  const content = await index.readText('tsconfig.json');
  if (content === null) return NOTHING;

  const strict = content.includes('"strict": true') || content.includes('"strict":true');
  return {
    outcome: mergeOutcomes(
      strength(4, 'TypeScript configured (tsconfig.json)'),
      strict
        ? strength(3, 'TypeScript strict mode enabled')
        : recommendation('Enable TypeScript strict mode for better suggestions')
    ),
    typed: true,
  };
}

export function checkTypeScriptRatio(tsCount: number, jsCount: number): CheckOutcome {
  if (tsCount === 0 || jsCount === 0) return NO_OUTCOME;

  const ratio = tsCount / (tsCount + jsCount);
  if (ratio >= 0.8) {
    return strength(2, `High TypeScript coverage (${Math.round(ratio * 100)}%)`);
  }
  if (ratio < 0.5) {
    return recommendation('Consider migrating more JavaScript files to TypeScript');
  }
  return NO_OUTCOME;
}

/**
 * Type hints in a sample of Python files ("half" rounds down), then a type checker configuration
 */
async function checkPython(index: RepositoryIndex): Promise<TypingCheck[]> {
  const sample = index
    .findByName('*.py')
    .filter(file => !file.split('/').some(segment => PYTHON_IGNORED_SEGMENTS.includes(segment)))
    .slice(0, PYTHON_SAMPLE);
  if (sample.length === 0) return [];

  let withHints = 0;
  for (const file of sample) {
    const content = await index.readText(file);
    if (content !== null && (ANNOTATION_PATTERN.test(content) || RETURN_ANNOTATION_PATTERN.test(content))) {
      withHints++;
    }
  }

  let hints: TypingCheck;
  if (withHints >= Math.floor(sample.length / 2)) {
    hints = { outcome: strength(4, 'Python type hints used'), typed: true };
  } else if (withHints > 0) {
    hints = {
      outcome: mergeOutcomes(
        strength(2, 'Some Python type hints present'),
        recommendation('Add type hints to more Python files for better suggestions')
      ),
      typed: false,
    };
  } else {
    hints = {
      outcome: recommendation('Add Python type hints (def func(x: int) -> str:) for better context'),
      typed: false,
    };
  }

  return [hints, { outcome: await checkPythonTypeChecker(index), typed: false }];
}

async function checkPythonTypeChecker(index: RepositoryIndex): Promise<CheckOutcome> {
  for (const checker of PYTHON_TYPE_CHECKERS) {
    const content = await index.readText(checker);
    if (content === null) continue;
    if (checker === 'pyproject.toml' && !content.includes('[tool.mypy]') && !content.includes('[tool.pyright]')) {
      continue;
    }
    return strength(2, `Python type checker configured: ${checker}`);
  }
  return NO_OUTCOME;
}

async function checkNullableReferenceTypes(index: RepositoryIndex): Promise<TypingCheck> {
  for (const project of index.findByName('*.csproj')) {
    const content = await index.readText(project);
    if (content !== null && content.includes('<Nullable>enable</Nullable>')) {
      return { outcome: strength(4, 'C# nullable reference types enabled'), typed: true };
    }
  }
  return NOTHING;
}
