import * as path from 'path';
import { minimatch } from 'minimatch';
import { ReadinessConfig } from '../types';
import { Logger } from '../utils/cli-utils';
import { directoryExists, fileExists, findFiles, tryReadText } from '../utils/file-utils';

/**
 * Snapshot of every file under a repository root (minus excluded directories),
 * taken once per run and shared by the file-existence assessors.
 */
export class RepositoryIndex {
  private constructor(
    readonly rootPath: string,
    readonly files: readonly string[],
    private readonly logger: Logger | undefined
  ) {}

  static async create(
    rootPath: string,
    config: Pick<ReadinessConfig, 'excludeDirectories'>,
    logger?: Logger
  ): Promise<RepositoryIndex> {
    const root = path.resolve(rootPath);
    const files = await findFiles(root, { excludeDirectories: config.excludeDirectories, logger });
    logger?.debug(`Indexed ${files.length} files under ${root}`);
    return new RepositoryIndex(root, files, logger);
  }

  /**
   * Files anywhere in the tree whose name matches a glob such as `*.csproj`
   */
  findByName(pattern: string): string[] {
    return this.files.filter(file => minimatch(path.posix.basename(file), pattern, { dot: true }));
  }

  /**
   * Files directly under the root whose name matches a glob
   */
  findTopLevel(pattern: string): string[] {
    return this.files.filter(file => !file.includes('/') && minimatch(file, pattern, { dot: true }));
  }

  resolve(relativePath: string): string {
    return path.join(this.rootPath, relativePath);
  }

  async hasFile(relativePath: string): Promise<boolean> {
    return fileExists(this.resolve(relativePath));
  }

  async hasDirectory(relativePath: string): Promise<boolean> {
    return directoryExists(this.resolve(relativePath));
  }

  /**
   * Text of a file relative to the root; null when missing or unreadable
   */
  async readText(relativePath: string): Promise<string | null> {
    return tryReadText(this.resolve(relativePath), this.logger);
  }

  /**
   * First candidate (in order) that exists as a regular file
   */
  async firstFile(candidates: readonly string[]): Promise<string | undefined> {
    for (const candidate of candidates) {
      if (await this.hasFile(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  async firstDirectory(candidates: readonly string[]): Promise<string | undefined> {
    for (const candidate of candidates) {
      if (await this.hasDirectory(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  /**
   * First candidate (in order) that exists as a file or a directory
   */
  async firstExisting(candidates: readonly string[]): Promise<string | undefined> {
    for (const candidate of candidates) {
      if ((await this.hasFile(candidate)) || (await this.hasDirectory(candidate))) {
        return candidate;
      }
    }
    return undefined;
  }
}
