import { describe, it, expect, afterEach } from 'vitest';
import * as path from 'path';
import { ConfigManager, createDefaultConfig } from '../../src/core/config';
import { AssessmentError } from '../../src/errors/assessment-error';
import { ErrorCode } from '../../src/utils/error-handler';
import { createTempRepo, removeTempRepo } from '../test-utils';

describe('ConfigManager', () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) {
      await removeTempRepo(root);
      root = undefined;
    }
  });

  it('uses the defaults when no configuration file exists', async () => {
    root = await createTempRepo({ 'README.md': '# demo\n' });
    const manager = new ConfigManager();

    const config = await manager.load({ searchFrom: root });

    expect(config).toEqual(createDefaultConfig());
    expect(manager.getConfigPath()).toBeNull();
  });

  it('merges a .repo-readinessrc.json found in the repository', async () => {
    root = await createTempRepo({
      '.repo-readinessrc.json': JSON.stringify({
        sourceExtensions: ['py', '.go'],
        sampleSizes: { complexity: 5 },
        thresholds: { depth: { shallow: 1 } },
        report: { outputDir: 'out' },
      }),
    });
    const manager = new ConfigManager();

    const config = await manager.load({ searchFrom: root });

    expect(config.sourceExtensions).toEqual(['.py', '.go']);
    expect(config.sampleSizes).toEqual({ complexity: 5, coupling: 30, dependencyGraph: 50 });
    expect(config.thresholds.depth).toEqual({ shallow: 1, moderate: 5, deep: 8 });
    expect(config.report.outputDir).toBe('out');
    expect(manager.getConfigPath()).toBe(path.join(root, '.repo-readinessrc.json'));
  });

  it('ignores values that fail validation', async () => {
    root = await createTempRepo({
      '.repo-readinessrc.json': JSON.stringify({
        excludeDirectories: 'vendor',
        sampleSizes: { complexity: 0, coupling: 2.5, dependencyGraph: 'many' },
        thresholds: { complexity: { excellent: -1, good: 12 }, unknownCheck: { x: 1 } },
        report: { outputDir: '' },
      }),
    });

    const config = await new ConfigManager().load({ searchFrom: root });
    const defaults = createDefaultConfig();

    expect(config.excludeDirectories).toEqual(defaults.excludeDirectories);
    expect(config.sampleSizes).toEqual(defaults.sampleSizes);
    expect(config.thresholds.complexity).toEqual({ excellent: 5, good: 12, moderate: 15, veryHigh: 20 });
    expect(config.report.outputDir).toBe('readiness-reports');
  });

  it('reads an explicit --config path', async () => {
    root = await createTempRepo({
      'settings/readiness.json': JSON.stringify({ excludePatterns: ['**/generated/**'] }),
    });

    const config = await new ConfigManager().load({ configPath: path.join(root, 'settings/readiness.json') });

    expect(config.excludePatterns).toEqual(['**/generated/**']);
  });

  it('fails with CONFIG_NOT_FOUND for a missing explicit path', async () => {
    root = await createTempRepo();

    const error = await new ConfigManager()
      .load({ configPath: path.join(root, 'missing.json') })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AssessmentError);
    expect(error).toMatchObject({ code: ErrorCode.CONFIG_NOT_FOUND });
  });

  it('fails with INVALID_CONFIG for malformed JSON', async () => {
    root = await createTempRepo({ '.repo-readinessrc.json': '{ "sampleSizes": ' });

    await expect(new ConfigManager().load({ searchFrom: root })).rejects.toMatchObject({
      code: ErrorCode.INVALID_CONFIG,
    });
  });

  it('caches the loaded configuration until cleared', async () => {
    root = await createTempRepo({ '.repo-readinessrc.json': JSON.stringify({ excludePatterns: [] }) });
    const manager = new ConfigManager();

    const first = await manager.load({ searchFrom: root });
    const second = await manager.load();
    manager.clearCache();
    const third = await manager.load({ searchFrom: root });

    expect(second).toBe(first);
    expect(third).not.toBe(first);
    expect(third.excludePatterns).toEqual([]);
  });
});
