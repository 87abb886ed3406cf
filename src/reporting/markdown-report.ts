/**
 * Markdown rendering of an assessment result.
 *
 * Rendering is pure; writing the file is a separate step so the text can be
 * checked without touching the file system.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { AssessmentError } from '../errors/assessment-error';
import { AssessmentResult, CategoryResult, Grade } from '../types';
import { ErrorCode } from '../utils/error-handler';
import { ensureDir } from '../utils/file-utils';
import { formatLocalTimestamp } from '../utils/format-utils';

const READINESS_SUMMARY: Record<Grade, string> = {
  A: 'excellently prepared for assisted development with minimal improvements needed',
  B: 'well-prepared for assisted development with some minor enhancements recommended',
  C: 'moderately prepared but requires several improvements for an optimal experience',
  D: 'poorly prepared and needs significant work before assistants can be fully effective',
  F: 'not ready for effective assisted development and requires major restructuring',
};

/**
 * Generate the complete markdown report
 */
export function generateMarkdownReport(result: AssessmentResult, generatedAt: Date): string {
  const lines: string[] = [];

  generateReportHeader(lines, result, generatedAt);
  generateExecutiveSummary(lines, result);
  result.categories.forEach(category => generateCategorySection(lines, category));
  if (result.bonusCategories.length > 0) {
    lines.push('## Bonus Categories');
    lines.push('');
    result.bonusCategories.forEach(category => generateCategorySection(lines, category));
  }
  lines.push('---');
  lines.push('');
  lines.push('**Report generated by repo-readiness (static analysis only)**');
  lines.push('');

  return lines.join('\n');
}

function generateReportHeader(lines: string[], result: AssessmentResult, generatedAt: Date): void {
  lines.push('# Repository Readiness Report');
  lines.push('');
  lines.push(`**Repository:** ${result.repositoryName}`);
  lines.push(`**Path:** ${result.repositoryPath}`);
  lines.push(`**Date:** ${formatLocalTimestamp(generatedAt, 'display')}`);
  lines.push(`**Overall Grade:** ${result.grade} (${result.totalScore}/${result.maxScore})`);
  if (result.bonusCategories.length > 0) {
    lines.push(`**Bonus Points:** +${result.bonusScore}`);
  }
  lines.push('');
  lines.push('---');
  lines.push('');
}

function generateExecutiveSummary(lines: string[], result: AssessmentResult): void {
  lines.push('## Executive Summary');
  lines.push('');
  lines.push(
    `The overall grade of **${result.grade}** (${result.percentage}%) indicates that the repository is ${READINESS_SUMMARY[result.grade]}.`
  );
  lines.push('');
}

/**
 * One category: score heading plus the three finding lists
 */
export function generateCategorySection(lines: string[], category: CategoryResult): void {
  lines.push(`### ${category.title}: ${category.score}/${category.maxScore}`);
  lines.push('');
  pushList(lines, 'Strengths', category.findings.strengths, 'None identified');
  pushList(lines, 'Weaknesses', category.findings.weaknesses, 'None identified');
  pushList(lines, 'Recommendations', category.findings.recommendations, 'No specific recommendations');
}

function pushList(lines: string[], heading: string, items: string[], emptyText: string): void {
  lines.push(`**${heading}:**`);
  if (items.length === 0) {
    lines.push(`- ${emptyText}`);
  } else {
    items.forEach(item => lines.push(`- ${item}`));
  }
  lines.push('');
}

export function reportFileName(repositoryName: string, generatedAt: Date): string {
  return `${repositoryName}-readiness-report_${formatLocalTimestamp(generatedAt, 'file')}.md`;
}

/**
 * Write the report under `outputDir` and return its path
 */
export async function writeMarkdownReport(
  result: AssessmentResult,
  outputDir: string,
  generatedAt: Date = new Date()
): Promise<string> {
  const outputPath = path.join(path.resolve(outputDir), reportFileName(result.repositoryName, generatedAt));

  try {
    await ensureDir(path.dirname(outputPath));
    await fs.writeFile(outputPath, generateMarkdownReport(result, generatedAt), 'utf8');
  } catch (error) {
    throw new AssessmentError(
      ErrorCode.REPORT_WRITE_FAILED,
      `Failed to write report to ${outputPath}`,
      { outputPath },
      error instanceof Error ? error : undefined
    );
  }

  return outputPath;
}
