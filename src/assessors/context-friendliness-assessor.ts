import * as path from 'path';
import { RepositoryIndex } from '../core/repository-index';
import { CategoryResult, CheckOutcome } from '../types';
import { countLines } from '../utils/file-utils';
import { AssessmentContext, Assessor } from './assessor';
import {
  CategoryDescriptor,
  NO_OUTCOME,
  combineOutcomes,
  mergeOutcomes,
  outcome,
  recommendation,
  strength,
  weakness,
} from './category-result';

export const CONTEXT_FRIENDLINESS: CategoryDescriptor = {
  category: 'ContextFriendliness',
  title: 'Context Friendliness',
  maxScore: 25,
};

const CODE_EXTENSIONS = ['.cs', '.js', '.ts', '.py', '.java', '.go', '.rs', '.tsx', '.jsx'];
const GITIGNORE_ESSENTIALS = ['node_modules', 'bin', 'obj', '.env', 'dist', '__pycache__', 'venv'];
const MINIFIED_PATTERNS = ['*.min.js', '*.bundle.js', '*.min.css'];
const SMALL_FILE_LINES = 300;
const DEPTH_SAMPLE = 100;
const MAX_DIRECTORY_DEPTH = 5;

/**
 * How well the code fits an assistant's context window: small files, ignore files
 * that keep artifacts out, no minified bundles and a shallow directory tree
 */
export class ContextFriendlinessAssessor implements Assessor {
  readonly category = CONTEXT_FRIENDLINESS.category;
  readonly title = CONTEXT_FRIENDLINESS.title;
  readonly maxScore = CONTEXT_FRIENDLINESS.maxScore;

  async assess({ index }: AssessmentContext): Promise<CategoryResult> {
    const hasAssistantIgnore = await index.hasFile('.copilotignore');

    return combineOutcomes(CONTEXT_FRIENDLINESS, [
      assessFileSizes(await readLineCounts(index)),
      checkGitignore(await index.readText('.gitignore')),
      hasAssistantIgnore ? strength(4, '.copilotignore configured for focused context') : NO_OUTCOME,
      checkMinifiedFiles(index),
      checkDirectoryDepth(index.files.slice(0, DEPTH_SAMPLE)),
    ]);
  }
}

async function readLineCounts(index: RepositoryIndex): Promise<number[]> {
  const counts: number[] = [];

  for (const extension of CODE_EXTENSIONS) {
    for (const file of index.findByName(`*${extension}`)) {
      const content = await index.readText(file);
      if (content !== null) {
        counts.push(countLines(content));
      }
    }
  }

  return counts;
}

/**
 * Average size band plus a bonus when most files stay under 300 lines
 */
export function assessFileSizes(lineCounts: number[]): CheckOutcome {
  if (lineCounts.length === 0) return NO_OUTCOME;

  const average = lineCounts.reduce((sum, lines) => sum + lines, 0) / lineCounts.length;
  const averageText = average.toFixed(0);
  let size: CheckOutcome;
  if (average <= 200) {
    size = strength(8, `Excellent file sizes (avg ${averageText} lines)`);
  } else if (average <= 300) {
    size = strength(5, `Good file sizes (avg ${averageText} lines)`);
  } else {
    size = weakness(
      0,
      `Large average file size (${averageText} lines)`,
      'Split large files into smaller modules for better assistant context'
    );
  }

  const smallShare = lineCounts.filter(lines => lines <= SMALL_FILE_LINES).length / lineCounts.length;
  const small =
    smallShare >= 0.8
      ? strength(3, `${Math.round(smallShare * 100)}% of files are under ${SMALL_FILE_LINES} lines`)
      : NO_OUTCOME;

  return mergeOutcomes(size, small);
}

export function checkGitignore(content: string | null): CheckOutcome {
  if (content === null) {
    return weakness(0, 'No .gitignore found', 'Add .gitignore to exclude build artifacts and dependencies');
  }

  const text = content.toLowerCase();
  const essentials = GITIGNORE_ESSENTIALS.filter(entry => text.includes(entry)).length;

  return essentials >= 3
    ? strength(4, '.gitignore properly configured')
    : outcome(2, { recommendations: ['Ensure .gitignore excludes build artifacts and dependencies'] });
}

function checkMinifiedFiles(index: RepositoryIndex): CheckOutcome {
  const minified = MINIFIED_PATTERNS.flatMap(pattern => index.findByName(pattern)).map(file =>
    path.posix.basename(file)
  );

  if (minified.length === 0) {
    return strength(3, 'No minified/bundled files in source');
  }
  return weakness(
    0,
    `Minified files in source: ${minified.slice(0, 3).join(', ')}`,
    'Move minified files to dist/ or exclude them from assistant context'
  );
}

/**
 * Deepest directory nesting among the given root-relative POSIX paths
 */
export function checkDirectoryDepth(files: readonly string[]): CheckOutcome {
  const maxDepth = Math.max(0, ...files.map(file => file.split('/').length - 1));

  return maxDepth <= MAX_DIRECTORY_DEPTH
    ? strength(3, `Reasonable directory depth (max ${maxDepth} levels)`)
    : recommendation(`Deep directory structure (${maxDepth} levels) may make navigation harder`);
}
