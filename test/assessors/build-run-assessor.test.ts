import { describe, it, expect } from 'vitest';
import { BuildAssessor } from '../../src/assessors/build-assessor';
import { RunAssessor } from '../../src/assessors/run-assessor';
import { assessFixture } from '../test-utils';

describe('BuildAssessor', () => {
  it('awards every build signal', async () => {
    const result = await assessFixture(new BuildAssessor(), {
      'package.json': '{ "scripts": { "build": "tsc" } }',
      'README.md': '# Demo\n\nRun the build with npm.\n',
      '.github/workflows/ci.yml': 'on: push\n',
      'build.sh': '#!/bin/sh\n',
    });

    expect(result.score).toBe(16);
    expect(result.findings.strengths).toEqual([
      'Build configuration found: package.json',
      'README contains build instructions',
      'CI/CD configuration found: .github/workflows',
      'Build script found: build.sh',
    ]);
  });

  it('finds project files in subdirectories', async () => {
    const result = await assessFixture(new BuildAssessor(), { 'src/App/App.csproj': '<Project />' });

    expect(result.score).toBe(5);
    expect(result.findings.strengths).toEqual(['Build configuration found: App.csproj']);
  });

  it('recommends build instructions for a README without them', async () => {
    const result = await assessFixture(new BuildAssessor(), {
      'Makefile': 'all:\n',
      'README.md': '# Demo\n',
    });

    expect(result.score).toBe(5);
    expect(result.findings.recommendations).toEqual(['Add build instructions to README.md']);
  });

  it('reports a missing build configuration', async () => {
    const result = await assessFixture(new BuildAssessor(), { 'notes.txt': 'nothing here\n' });

    expect(result.score).toBe(0);
    expect(result.findings.weaknesses).toEqual(['No build configuration file detected']);
    expect(result.findings.recommendations).toEqual([
      'Add a build configuration (e.g., .csproj, package.json, Makefile)',
    ]);
  });
});

describe('RunAssessor', () => {
  it('awards entry point, environment template, launch configuration and start script', async () => {
    const result = await assessFixture(new RunAssessor(), {
      'src/Program.cs': 'class Program {}\n',
      '.env.example': 'API_KEY=test-secret\n',
      '.vscode/launch.json': '{}',
      'package.json': '{ "scripts": { "start": "node ." } }',
    });

    expect(result.score).toBe(11);
    expect(result.findings.strengths).toEqual([
      'Entry point identified: Program.cs',
      'Environment template found: .env.example',
      'VS Code launch configuration found',
      'npm start script configured',
    ]);
  });

  it('reports a missing entry point', async () => {
    const result = await assessFixture(new RunAssessor(), { 'lib/util.py': '' });

    expect(result.score).toBe(0);
    expect(result.findings.weaknesses).toEqual(['No clear entry point found']);
  });
});
