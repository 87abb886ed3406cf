import { describe, it, expect, vi, afterEach } from 'vitest';
import * as path from 'path';
import { calculateGrade, ReadinessEngine } from '../../src/core/readiness-engine';
import { Assessor } from '../../src/assessors';
import { combineOutcomes, strength } from '../../src/assessors/category-result';
import { Logger } from '../../src/utils/cli-utils';
import { ErrorCode } from '../../src/utils/error-handler';
import { createTempRepo, javaClass, removeTempRepo, testConfig } from '../test-utils';

const fixedAssessor = (category: string, points: number, maxScore: number): Assessor => ({
  category,
  title: category,
  maxScore,
  assess: async () => combineOutcomes({ category, title: category, maxScore }, [strength(points, `${category} ok`)]),
});

const failingAssessor: Assessor = {
  category: 'Broken',
  title: 'Broken',
  maxScore: 10,
  assess: async () => {
    throw new Error('boom');
  },
};

describe('calculateGrade', () => {
  it.each([
    [90, 100, 'A'],
    [89.9, 100, 'B'],
    [80, 100, 'B'],
    [70, 100, 'C'],
    [60, 100, 'D'],
    [59, 100, 'F'],
    [117, 130, 'A'],
  ])('grades %s/%s as %s', (total, max, grade) => {
    expect(calculateGrade(total, max)).toBe(grade);
  });
});

describe('ReadinessEngine', () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) {
      await removeTempRepo(root);
      root = undefined;
    }
  });

  it('totals the categories and derives grade and percentage', async () => {
    root = await createTempRepo();
    const engine = new ReadinessEngine(testConfig(), new Logger(false, true), [
      fixedAssessor('One', 9, 10),
      fixedAssessor('Two', 7, 10),
      fixedAssessor('Three', 4, 10),
    ]);
    const now = new Date('2024-05-06T07:08:09.000Z');

    const result = await engine.assess(root, now);

    expect(result.repositoryName).toBe(path.basename(root));
    expect(result.assessedAt).toBe('2024-05-06T07:08:09.000Z');
    expect(result.totalScore).toBe(20);
    expect(result.maxScore).toBe(30);
    expect(result.percentage).toBe(66.7);
    expect(result.grade).toBe('D');
  });

  it('scores a failing assessor zero and keeps going', async () => {
    root = await createTempRepo();
    const logger = new Logger(false, true);
    const warn = vi.spyOn(logger, 'warn');
    const engine = new ReadinessEngine(testConfig(), logger, [failingAssessor, fixedAssessor('After', 5, 10)]);

    const result = await engine.assess(root);

    expect(result.categories.map(category => [category.category, category.score, category.maxScore])).toEqual([
      ['Broken', 0, 10],
      ['After', 5, 10],
    ]);
    expect(result.categories[0].findings).toEqual({ strengths: [], weaknesses: [], recommendations: [] });
    expect(warn).toHaveBeenCalledWith('Error in Broken: boom', expect.any(Error));
  });

  it('rejects a missing repository directory', async () => {
    root = await createTempRepo();
    const engine = new ReadinessEngine(testConfig(), new Logger(false, true));

    await expect(engine.assess(path.join(root, 'missing'))).rejects.toMatchObject({
      code: ErrorCode.DIRECTORY_NOT_FOUND,
    });
  });

  it('totals bonus categories apart from the graded score', async () => {
    root = await createTempRepo();
    const bonus: Assessor = { ...fixedAssessor('Extra', 3, 5), bonus: true };
    const engine = new ReadinessEngine(testConfig(), new Logger(false, true), [fixedAssessor('One', 9, 10), bonus]);

    const result = await engine.assess(root);

    expect(result.categories.map(category => category.category)).toEqual(['One']);
    expect(result.bonusCategories.map(category => [category.category, category.score])).toEqual([['Extra', 3]]);
    expect(result.totalScore).toBe(9);
    expect(result.maxScore).toBe(10);
    expect(result.bonusScore).toBe(3);
    expect(result.grade).toBe('A');
  });

  it('runs the eight graded and two bonus default categories in report order', async () => {
    root = await createTempRepo({ 'src/Main.java': javaClass('Main', 1, 2) });
    const engine = new ReadinessEngine(testConfig(), new Logger(false, true));

    const result = await engine.assess(root);

    expect(result.categories.map(category => category.category)).toEqual([
      'Build',
      'Run',
      'Test',
      'CodeComplexity',
      'Documentation',
      'CustomInstructions',
      'TypeSafety',
      'ContextFriendliness',
    ]);
    expect(result.bonusCategories.map(category => category.category)).toEqual(['CustomAgents', 'AgentSkills']);
    expect(result.maxScore).toBe(155);
    expect(result.categories[1].findings.strengths).toEqual(['Entry point identified: Main.java']);
  });
});
