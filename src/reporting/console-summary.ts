import chalk from 'chalk';
import { AssessmentResult, CategoryResult, Grade } from '../types';
import { formatPercentage } from '../utils/format-utils';
import { createTable, formatList } from '../utils/table-formatter';

const GRADE_COLORS: Record<Grade, (text: string) => string> = {
  A: chalk.green,
  B: chalk.cyan,
  C: chalk.yellow,
  D: chalk.magenta,
  F: chalk.red,
};

function scoreColor(category: CategoryResult): (text: string) => string {
  const ratio = category.maxScore === 0 ? 0 : category.score / category.maxScore;
  if (ratio >= 0.8) return chalk.green;
  if (ratio >= 0.5) return chalk.yellow;
  return chalk.red;
}

/**
 * Colored per-category table followed by the total and grade; bonus points are shown apart
 */
export function formatAssessmentSummary(result: AssessmentResult): string {
  const table = createTable([
    { header: 'Category', width: 32 },
    { header: 'Score', width: 7, align: 'right' },
    { header: 'Ratio', width: 7, align: 'right' },
  ]);

  const rows = [
    ...result.categories.map(category => ({ category, title: category.title })),
    ...result.bonusCategories.map(category => ({ category, title: `${category.title} (bonus)` })),
  ];
  for (const { category, title } of rows) {
    const color = scoreColor(category);
    table.addRow({
      Category: title,
      Score: color(`${category.score}/${category.maxScore}`),
      Ratio: formatPercentage(category.score, category.maxScore),
    });
  }

  const gradeColor = GRADE_COLORS[result.grade];
  return [
    chalk.cyan.bold(`Repository Readiness: ${result.repositoryName}`),
    '',
    table.render(),
    '',
    `Total Score: ${result.totalScore}/${result.maxScore} (${result.percentage}%)`,
    ...(result.bonusCategories.length > 0 ? [`Bonus Points: +${result.bonusScore}`] : []),
    gradeColor(chalk.bold(`Final Grade: ${result.grade}`)),
  ].join('\n');
}

/**
 * Weaknesses and recommendations of every category that has any
 */
export function formatFindingsDigest(result: AssessmentResult, maxItems = 5): string {
  const sections: string[] = [];

  for (const category of [...result.categories, ...result.bonusCategories]) {
    const { weaknesses, recommendations } = category.findings;
    if (weaknesses.length === 0 && recommendations.length === 0) continue;

    sections.push(chalk.bold(category.title));
    if (weaknesses.length > 0) {
      sections.push(formatList(weaknesses, { bullet: chalk.red('✗'), maxItems }));
    }
    if (recommendations.length > 0) {
      sections.push(formatList(recommendations, { bullet: chalk.yellow('→'), maxItems }));
    }
  }

  return sections.join('\n');
}
