import { describe, it, expect } from 'vitest';
import { TestAssessor } from '../../src/assessors/test-assessor';
import { assessFixture } from '../test-utils';

describe('TestAssessor', () => {
  it('awards framework, test files, test script and test directory', async () => {
    const result = await assessFixture(new TestAssessor(), {
      'package.json': '{ "devDependencies": { "jest": "^29.0.0" }, "scripts": { "test": "jest" } }',
      'src/a.test.js': '',
      'src/a.spec.js': '',
      'tests/helper.js': '',
    });

    expect(result.score).toBe(18);
    expect(result.findings.strengths).toEqual([
      'Test framework detected: jest',
      'Found 2 test file(s)',
      'npm test script configured',
      'Organized test directory: tests/',
    ]);
  });

  it('counts a file once per pattern it matches', async () => {
    const result = await assessFixture(new TestAssessor(), { 'FooTests.cs': 'class FooTests {}\n' });

    expect(result.score).toBe(5);
    expect(result.findings.strengths).toEqual(['Found 2 test file(s)']);
    expect(result.findings.weaknesses).toEqual(['No test framework detected']);
  });

  it('detects pytest from requirements.txt', async () => {
    const result = await assessFixture(new TestAssessor(), {
      'requirements.txt': 'pytest==8.0.0\n',
      'test_app.py': 'def test_ok():\n    assert True\n',
    });

    expect(result.score).toBe(10);
    expect(result.findings.strengths).toEqual(['Test framework detected: pytest', 'Found 1 test file(s)']);
  });

  it('reports a repository without tests', async () => {
    const result = await assessFixture(new TestAssessor(), { 'main.go': 'package main\n' });

    expect(result.score).toBe(0);
    expect(result.findings.weaknesses).toEqual(['No test framework detected', 'No test files found']);
    expect(result.findings.recommendations).toEqual([
      'Add a test framework (xUnit, Jest, pytest, etc.)',
      'Add unit tests for your code',
    ]);
  });
});
