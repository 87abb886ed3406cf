import { CategoryFindings, CategoryResult, CheckOutcome } from '../types';

export interface CategoryDescriptor {
  category: string;
  title: string;
  maxScore: number;
}

export function emptyFindings(): CategoryFindings {
  return { strengths: [], weaknesses: [], recommendations: [] };
}

/**
 * Outcome of one banded check
 */
export function outcome(points: number, findings: Partial<CategoryFindings> = {}): CheckOutcome {
  return {
    points,
    findings: {
      strengths: findings.strengths ?? [],
      weaknesses: findings.weaknesses ?? [],
      recommendations: findings.recommendations ?? [],
    },
  };
}

export const NO_OUTCOME: CheckOutcome = outcome(0);

export function strength(points: number, text: string): CheckOutcome {
  return outcome(points, { strengths: [text] });
}

export function weakness(points: number, text: string, advice?: string): CheckOutcome {
  return outcome(points, {
    weaknesses: [text],
    recommendations: advice === undefined ? [] : [advice],
  });
}

export function recommendation(text: string): CheckOutcome {
  return outcome(0, { recommendations: [text] });
}

/**
 * Sum points and concatenate findings, keeping the order of `outcomes`
 */
export function mergeOutcomes(...outcomes: CheckOutcome[]): CheckOutcome {
  const findings = emptyFindings();
  let points = 0;

  for (const check of outcomes) {
    points += check.points;
    findings.strengths.push(...check.findings.strengths);
    findings.weaknesses.push(...check.findings.weaknesses);
    findings.recommendations.push(...check.findings.recommendations);
  }

  return { points, findings };
}

/**
 * Merge check outcomes into a category result, capping the score at the category maximum
 */
export function combineOutcomes(descriptor: CategoryDescriptor, outcomes: CheckOutcome[]): CategoryResult {
  const { points, findings } = mergeOutcomes(...outcomes);

  return {
    category: descriptor.category,
    title: descriptor.title,
    score: Math.min(Math.max(points, 0), descriptor.maxScore),
    maxScore: descriptor.maxScore,
    findings,
  };
}

export function emptyResult(descriptor: CategoryDescriptor): CategoryResult {
  return combineOutcomes(descriptor, []);
}
