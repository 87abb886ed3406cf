import { cosmiconfigSync } from 'cosmiconfig';
import * as path from 'path';
import { AssessmentError } from '../errors/assessment-error';
import { ReadinessConfig, UserConfig } from '../types';
import { ErrorCode } from '../utils/error-handler';

export const CONFIG_MODULE_NAME = 'repo-readiness';

export function createDefaultConfig(): ReadinessConfig {
  return {
    sourceExtensions: ['.cs', '.js', '.ts', '.tsx', '.jsx', '.py', '.java', '.go', '.rs', '.cpp', '.c', '.h'],
    excludeDirectories: ['node_modules', '.git', 'bin', 'obj', 'dist', 'build'],
    excludePatterns: ['**/*.min.*'],
    sampleSizes: {
      complexity: 20,
      coupling: 30,
      dependencyGraph: 50,
    },
    thresholds: {
      complexity: { excellent: 5, good: 10, moderate: 15, veryHigh: 20 },
      coupling: { low: 5, moderate: 10, high: 15, excessive: 20 },
      cycles: { moderate: 2 },
      depth: { shallow: 3, moderate: 5, deep: 8 },
    },
    report: {
      outputDir: 'readiness-reports',
    },
  };
}

export interface ConfigLoadOptions {
  configPath?: string | undefined; // explicit file, skips the search
  searchFrom?: string | undefined; // directory the upward search starts in
}

export class ConfigManager {
  private config: ReadinessConfig | undefined;
  private configPath: string | null = null;
  private explorer = cosmiconfigSync(CONFIG_MODULE_NAME, {
    searchPlaces: [
      `.${CONFIG_MODULE_NAME}rc`,
      `.${CONFIG_MODULE_NAME}rc.json`,
      `.${CONFIG_MODULE_NAME}rc.yaml`,
      `.${CONFIG_MODULE_NAME}rc.yml`,
      `.${CONFIG_MODULE_NAME}rc.js`,
      `${CONFIG_MODULE_NAME}.config.js`,
      'package.json',
    ],
  });

  async load(options: ConfigLoadOptions = {}): Promise<ReadinessConfig> {
    if (this.config) {
      return this.config;
    }

    const result = this.readConfigFile(options);

    if (result && !result.isEmpty) {
      this.config = this.validateAndMergeConfig(result.config);
      this.configPath = result.filepath;
    } else {
      this.config = createDefaultConfig();
      this.configPath = result?.filepath ?? null;
    }

    return this.config;
  }

  getDefaults(): ReadinessConfig {
    return createDefaultConfig();
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  /**
   * Clear configuration cache
   */
  clearCache(): void {
    this.config = undefined;
    this.configPath = null;
    this.explorer.clearCaches();
  }

  private readConfigFile(options: ConfigLoadOptions): { config: unknown; filepath: string; isEmpty?: boolean } | null {
    try {
      if (options.configPath) {
        return this.explorer.load(path.resolve(options.configPath));
      }
      return this.explorer.search(options.searchFrom);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      if (options.configPath && isMissingFileError(error)) {
        throw new AssessmentError(
          ErrorCode.CONFIG_NOT_FOUND,
          `Configuration file not found: ${options.configPath}`,
          { configPath: options.configPath },
          cause
        );
      }
      throw new AssessmentError(
        ErrorCode.INVALID_CONFIG,
        `Failed to parse configuration: ${cause?.message ?? String(error)}`,
        options.configPath ? { configPath: options.configPath } : undefined,
        cause
      );
    }
  }

  /**
   * Start from the defaults and take each user value that passes its check
   */
  private validateAndMergeConfig(raw: unknown): ReadinessConfig {
    const config = createDefaultConfig();
    if (!isRecord(raw)) {
      return config;
    }
    const userConfig: UserConfig = raw;

    this.mergeArrayConfigs(config, userConfig);
    this.mergeSampleSizesConfig(config, userConfig);
    this.mergeThresholdsConfig(config, userConfig);
    this.mergeReportConfig(config, userConfig);

    return config;
  }

  private mergeArrayConfigs(config: ReadinessConfig, userConfig: UserConfig): void {
    const extensions = stringArray(userConfig.sourceExtensions);
    if (extensions) {
      config.sourceExtensions = extensions.map(ext => (ext.startsWith('.') ? ext : `.${ext}`));
    }

    const directories = stringArray(userConfig.excludeDirectories);
    if (directories) {
      config.excludeDirectories = directories;
    }

    const patterns = stringArray(userConfig.excludePatterns);
    if (patterns) {
      config.excludePatterns = patterns;
    }
  }

  private mergeSampleSizesConfig(config: ReadinessConfig, userConfig: UserConfig): void {
    const sizes = userConfig.sampleSizes;
    if (!isRecord(sizes)) return;

    config.sampleSizes.complexity = positiveInteger(sizes['complexity']) ?? config.sampleSizes.complexity;
    config.sampleSizes.coupling = positiveInteger(sizes['coupling']) ?? config.sampleSizes.coupling;
    config.sampleSizes.dependencyGraph =
      positiveInteger(sizes['dependencyGraph']) ?? config.sampleSizes.dependencyGraph;
  }

  private mergeThresholdsConfig(config: ReadinessConfig, userConfig: UserConfig): void {
    const thresholds = userConfig.thresholds;
    if (!isRecord(thresholds)) return;

    const { complexity, coupling, cycles, depth } = config.thresholds;
    mergeNumbers(complexity, thresholds['complexity']);
    mergeNumbers(coupling, thresholds['coupling']);
    mergeNumbers(cycles, thresholds['cycles']);
    mergeNumbers(depth, thresholds['depth']);
  }

  private mergeReportConfig(config: ReadinessConfig, userConfig: UserConfig): void {
    const report = userConfig.report;
    if (!isRecord(report)) return;

    const outputDir = report['outputDir'];
    if (typeof outputDir === 'string' && outputDir.length > 0) {
      config.report.outputDir = outputDir;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

function positiveInteger(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 ? value : undefined;
}

/**
 * Overwrite each known key of `target` with a finite, non-negative number from `source`
 */
function mergeNumbers<T extends object>(target: T, source: unknown): void {
  if (!isRecord(source)) return;

  for (const key of Object.keys(target)) {
    const value = source[key];
    if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
      Reflect.set(target, key, value);
    }
  }
}

function isMissingFileError(error: unknown): boolean {
  return isRecord(error) && error['code'] === 'ENOENT';
}
