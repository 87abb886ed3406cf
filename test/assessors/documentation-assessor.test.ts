import { describe, it, expect } from 'vitest';
import { assessReadme, DocumentationAssessor } from '../../src/assessors/documentation-assessor';
import { mergeOutcomes } from '../../src/assessors/category-result';
import { assessFixture, fillerLines } from '../test-utils';

describe('assessReadme', () => {
  it('reports a missing README', () => {
    const { points, findings } = mergeOutcomes(...assessReadme(null));

    expect(points).toBe(0);
    expect(findings.weaknesses).toEqual(['No README.md found']);
    expect(findings.recommendations).toEqual(['Add a README.md with project description, setup, and usage']);
  });

  it('rewards a long README covering the usual sections', () => {
    const readme = ['## Install', '## Usage', '## Example', '## License', ...fillerLines(96)].join('\n');

    const { points, findings } = mergeOutcomes(...assessReadme(readme));

    expect(points).toBe(9);
    expect(findings.strengths).toEqual(['Comprehensive README.md (100+ lines)', 'README covers 4 key sections']);
  });

  it('gives a point without a finding for two or three sections', () => {
    const { points, findings } = mergeOutcomes(...assessReadme('# Tool\n\nInstall it, then see usage.\n'));

    expect(points).toBe(2);
    expect(findings.strengths).toEqual([]);
    expect(findings.weaknesses).toEqual(['README.md is minimal']);
    expect(findings.recommendations).toEqual(['Expand README with setup, usage, and examples']);
  });

  it('bands by line count', () => {
    expect(mergeOutcomes(...assessReadme(fillerLines(50).join('\n'))).findings.strengths).toEqual([
      'Good README.md coverage',
    ]);
    expect(mergeOutcomes(...assessReadme(fillerLines(20).join('\n'))).findings.strengths).toEqual([
      'README.md present with basic content',
    ]);
  });
});

describe('DocumentationAssessor', () => {
  it('adds docs directory, extra markdown, API and architecture documents', async () => {
    const result = await assessFixture(new DocumentationAssessor(), {
      'README.md': fillerLines(20).join('\n'),
      'ARCHITECTURE.md': '# Layers\n',
      'CHANGELOG.md': '# Changes\n',
      'docs/guide.md': '# Guide\n',
      'openapi.yaml': 'openapi: 3.0.0\n',
    });

    expect(result.score).toBe(12);
    expect(result.findings.strengths).toEqual([
      'README.md present with basic content',
      'Documentation directory found: docs/',
      'Additional docs: ARCHITECTURE.md, CHANGELOG.md',
      'API documentation found: openapi.yaml',
      'Architecture documentation: ARCHITECTURE.md',
    ]);
  });

  it('checks XML doc comments in a sample of C# files', async () => {
    const result = await assessFixture(new DocumentationAssessor(), {
      'A.cs': '/// <summary>Alpha</summary>\nclass A {}\n',
      'B.cs': 'class B {}\n',
      'C.cs': 'class C {}\n',
    });

    expect(result.score).toBe(3);
    expect(result.findings.strengths).toEqual(['XML documentation comments present']);
  });

  it('recommends XML docs when C# files carry neither kind of comment', async () => {
    const result = await assessFixture(new DocumentationAssessor(), {
      'A.cs': 'class A {}\n',
      'B.cs': 'class B {}\n',
    });

    expect(result.findings.recommendations).toContain(
      'Add XML documentation (///) to public APIs for better assistant context'
    );
  });
});
