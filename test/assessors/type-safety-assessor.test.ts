import { describe, it, expect } from 'vitest';
import { checkTypeScriptRatio, TypeSafetyAssessor } from '../../src/assessors/type-safety-assessor';
import { assessFixture } from '../test-utils';

describe('TypeSafetyAssessor', () => {
  it('rewards a strict TypeScript project', async () => {
    const result = await assessFixture(new TypeSafetyAssessor(), {
      'tsconfig.json': '{ "compilerOptions": { "strict": true } }',
      'src/a.ts': '',
      'src/b.ts': '',
      'src/c.ts': '',
      'src/d.ts': '',
      'src/e.js': '',
    });

    expect(result.score).toBe(9);
    expect(result.findings.strengths).toEqual([
      'TypeScript configured (tsconfig.json)',
      'TypeScript strict mode enabled',
      'High TypeScript coverage (80%)',
    ]);
  });

  it('counts TypeScript files when there is no tsconfig.json', async () => {
    const result = await assessFixture(new TypeSafetyAssessor(), {
      'index.ts': '',
      'types.d.ts': '',
    });

    expect(result.score).toBe(3);
    expect(result.findings.strengths).toEqual(['TypeScript files found (1 files)']);
  });

  it('samples Python files outside virtual environments for type hints', async () => {
    const result = await assessFixture(new TypeSafetyAssessor(), {
      'app/a.py': 'def f(x: int) -> str:\n    return str(x)\n',
      'app/b.py': 'def g(y):\n    return y\n',
      'venv/lib/c.py': 'def h(z):\n    return z\n',
      'mypy.ini': '[mypy]\nstrict = True\n',
    });

    expect(result.score).toBe(6);
    expect(result.findings.strengths).toEqual([
      'Python type hints used',
      'Python type checker configured: mypy.ini',
    ]);
  });

  it('rewards C# nullable reference types', async () => {
    const result = await assessFixture(new TypeSafetyAssessor(), {
      'App.csproj': '<Project><PropertyGroup><Nullable>enable</Nullable></PropertyGroup></Project>',
    });

    expect(result.score).toBe(4);
    expect(result.findings.strengths).toEqual(['C# nullable reference types enabled']);
  });

  it('reports a repository with no typing evidence', async () => {
    const result = await assessFixture(new TypeSafetyAssessor(), { 'app.js': 'module.exports = {};\n' });

    expect(result.score).toBe(0);
    expect(result.findings.weaknesses).toEqual(['No type safety features detected']);
  });
});

describe('checkTypeScriptRatio', () => {
  it('only speaks up for mixed code bases', () => {
    expect(checkTypeScriptRatio(0, 5).points).toBe(0);
    expect(checkTypeScriptRatio(4, 0).findings.strengths).toEqual([]);
    expect(checkTypeScriptRatio(3, 2).findings).toEqual({ strengths: [], weaknesses: [], recommendations: [] });
    expect(checkTypeScriptRatio(1, 3).findings.recommendations).toEqual([
      'Consider migrating more JavaScript files to TypeScript',
    ]);
  });
});
