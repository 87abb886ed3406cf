import { RepositoryIndex } from '../core/repository-index';
import { CategoryResult, CheckOutcome } from '../types';
import { countLines } from '../utils/file-utils';
import { AssessmentContext, Assessor } from './assessor';
import {
  CategoryDescriptor,
  NO_OUTCOME,
  combineOutcomes,
  outcome,
  recommendation,
  strength,
  weakness,
} from './category-result';

export const DOCUMENTATION: CategoryDescriptor = {
  category: 'Documentation',
  title: 'Documentation',
  maxScore: 25,
};

const README_SECTIONS = ['install', 'usage', 'example', 'api', 'contributing', 'license'];
const DOCS_DIRECTORIES = ['docs', 'doc', 'documentation', 'wiki'];
const API_DOCS = ['swagger.json', 'openapi.json', 'openapi.yaml', 'api.md'];
const ARCHITECTURE_DOCS = ['ARCHITECTURE.md', 'DESIGN.md', 'architecture.md', 'design.md'];
const DOC_COMMENT_SAMPLE = 5;

export class DocumentationAssessor implements Assessor {
  readonly category = DOCUMENTATION.category;
  readonly title = DOCUMENTATION.title;
  readonly maxScore = DOCUMENTATION.maxScore;

  async assess({ index }: AssessmentContext): Promise<CategoryResult> {
    const docsDirectory = await index.firstDirectory(DOCS_DIRECTORIES);
    const apiDoc = API_DOCS.find(name => index.findByName(name).length > 0);
    const architectureDoc = await index.firstFile(ARCHITECTURE_DOCS);

    return combineOutcomes(DOCUMENTATION, [
      ...assessReadme(await index.readText('README.md')),
      docsDirectory === undefined ? NO_OUTCOME : strength(3, `Documentation directory found: ${docsDirectory}/`),
      checkMarkdownFiles(index),
      apiDoc === undefined ? NO_OUTCOME : strength(3, `API documentation found: ${apiDoc}`),
      architectureDoc === undefined ? NO_OUTCOME : strength(2, `Architecture documentation: ${architectureDoc}`),
      await checkDocComments(index),
    ]);
  }
}

/**
 * README length band plus coverage of the usual sections
 */
export function assessReadme(readme: string | null): CheckOutcome[] {
  if (readme === null) {
    return [
      weakness(0, 'No README.md found', 'Add a README.md with project description, setup, and usage'),
    ];
  }

  const lines = countLines(readme);
  let length: CheckOutcome;
  if (lines >= 100) {
    length = strength(6, 'Comprehensive README.md (100+ lines)');
  } else if (lines >= 50) {
    length = strength(4, 'Good README.md coverage');
  } else if (lines >= 20) {
    length = strength(2, 'README.md present with basic content');
  } else {
    length = weakness(1, 'README.md is minimal', 'Expand README with setup, usage, and examples');
  }

  const text = readme.toLowerCase();
  const sectionsFound = README_SECTIONS.filter(section => text.includes(section)).length;
  let sections = NO_OUTCOME;
  if (sectionsFound >= 4) {
    sections = strength(3, `README covers ${sectionsFound} key sections`);
  } else if (sectionsFound >= 2) {
    sections = outcome(1);
  }

  return [length, sections];
}

function checkMarkdownFiles(index: RepositoryIndex): CheckOutcome {
  const markdown = index.findTopLevel('*.md').filter(file => file.toLowerCase() !== 'readme.md');

  if (markdown.length >= 3) {
    return strength(3, `Rich documentation: ${markdown.slice(0, 3).join(', ')}`);
  }
  if (markdown.length >= 1) {
    return strength(2, `Additional docs: ${markdown.join(', ')}`);
  }
  return NO_OUTCOME;
}

/**
 * Doc comments in a small sample of C# files; "half" rounds down
 */
async function checkDocComments(index: RepositoryIndex): Promise<CheckOutcome> {
  const sample = index.findByName('*.cs').slice(0, DOC_COMMENT_SAMPLE);
  if (sample.length === 0) return NO_OUTCOME;

  let withXmlDocs = 0;
  let withComments = 0;
  for (const file of sample) {
    const content = await index.readText(file);
    if (content === null) continue;

    if (content.includes('///') || content.includes('<summary>')) withXmlDocs++;
    if (/\/\/\s*\w/.test(content) || content.includes('/*')) withComments++;
  }

  const half = Math.floor(sample.length / 2);
  if (withXmlDocs >= half) {
    return strength(3, 'XML documentation comments present');
  }
  if (withComments >= half) {
    return strength(2, 'Code contains inline comments');
  }
  return recommendation('Add XML documentation (///) to public APIs for better assistant context');
}
